import { readFileSync } from 'fs';
import type { Atom, Molecule, Vector3 } from 'types';
import { createAtom } from 'src/utils/atom-utils';
import { createMolecule } from 'src/utils/molecule';

function parseCoordinate(token: string | undefined, lineNumber: number): number {
  const value = token === undefined ? NaN : Number(token);
  if (!Number.isFinite(value)) {
    throw new Error(`Malformed XYZ: invalid coordinate '${token ?? ''}' on line ${lineNumber}`);
  }
  return value;
}

/**
 * Parse XYZ content into a molecule without bonds.
 * Atoms get ids 0..n-1 in file order and title-cased element symbols.
 * Throws when the header count disagrees with the number of coordinate lines.
 */
export function parseXYZ(content: string): Molecule {
  const lines = content.split(/\r?\n/);
  while (lines.length > 1 && lines[lines.length - 1]?.trim() === '') {
    lines.pop();
  }

  const header = lines[0]?.trim() ?? '';
  if (!/^\d+$/.test(header)) {
    throw new Error(`Malformed XYZ: invalid atom count '${header}'`);
  }
  const atomCount = Number.parseInt(header, 10);

  const body = lines.slice(2);
  if (body.length !== atomCount) {
    throw new Error(
      `The number of atom lines in the xyz content, ${body.length}, does not match the number of atoms in the header, ${atomCount}`
    );
  }

  const atoms: Atom[] = [];
  const positions: Vector3[] = [];
  body.forEach((line, i) => {
    const lineNumber = i + 3;
    const [element, x, y, z] = line.trim().split(/\s+/);
    if (!element) {
      throw new Error(`Malformed XYZ: missing element on line ${lineNumber}`);
    }
    atoms.push(createAtom(i, element));
    positions.push([
      parseCoordinate(x, lineNumber),
      parseCoordinate(y, lineNumber),
      parseCoordinate(z, lineNumber),
    ]);
  });

  return createMolecule(atoms, [], positions);
}

export function readXYZFile(path: string): Molecule {
  return parseXYZ(readFileSync(path, 'utf-8'));
}
