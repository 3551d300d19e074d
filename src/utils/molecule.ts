import type { Atom, Bond, Molecule, PositionMatrix, Vector3 } from 'types';
import {
  addVectors,
  computeCentroid,
  copyPositionMatrix,
  rotatePositions,
  subtractVectors,
} from 'src/utils/geometry';

interface RowIndexEntry {
  atomCount: number;
  index: Map<number, number>;
}

const rowIndexCache = new WeakMap<readonly Atom[], RowIndexEntry>();

function checkRowCount(atomCount: number, positions: PositionMatrix): void {
  if (positions.length !== atomCount) {
    throw new Error(
      `Position matrix has ${positions.length} rows but the molecule has ${atomCount} atoms`
    );
  }
}

/**
 * Map from atom id to its row in the position matrix, shared by all molecules built
 * on the same atom array. Rebuilt when the array has grown or shrunk since.
 */
export function getAtomRowIndex(atoms: readonly Atom[]): Map<number, number> {
  const cached = rowIndexCache.get(atoms);
  if (cached && cached.atomCount === atoms.length) return cached.index;

  const index = new Map<number, number>();
  atoms.forEach((atom, row) => index.set(atom.id, row));
  rowIndexCache.set(atoms, { atomCount: atoms.length, index });
  return index;
}

export function createMolecule(
  atoms: readonly Atom[],
  bonds: readonly Bond[],
  positions: PositionMatrix
): Molecule {
  checkRowCount(atoms.length, positions);

  // The molecule owns its own arrays; derived caches are keyed on them.
  const atomList = [...atoms];
  const bondList = [...bonds];

  const rows = getAtomRowIndex(atomList);
  if (rows.size !== atomList.length) {
    throw new Error('Atom ids must be unique within a molecule');
  }
  for (const bond of bondList) {
    if (!rows.has(bond.atom1Id) || !rows.has(bond.atom2Id)) {
      throw new Error(`Bond ${bond.id} references unknown atom (${bond.atom1Id}-${bond.atom2Id})`);
    }
  }

  return { atoms: atomList, bonds: bondList, positions: copyPositionMatrix(positions) };
}

/**
 * Copy of the coordinates, one row per atom in stored order.
 */
export function getPositionMatrix(mol: Molecule): Vector3[] {
  return copyPositionMatrix(mol.positions);
}

/**
 * Clone sharing atoms and bonds, with `positions` as its coordinates.
 */
export function withPositionMatrix(mol: Molecule, positions: PositionMatrix): Molecule {
  checkRowCount(mol.atoms.length, positions);
  return { atoms: mol.atoms, bonds: mol.bonds, positions: copyPositionMatrix(positions) };
}

export function withDisplacement(mol: Molecule, displacement: Vector3): Molecule {
  return {
    atoms: mol.atoms,
    bonds: mol.bonds,
    positions: mol.positions.map(p => addVectors(p, displacement)),
  };
}

/**
 * Clone translated so that its centroid sits at `position`.
 */
export function withCentroid(mol: Molecule, position: Vector3): Molecule {
  return withDisplacement(mol, subtractVectors(position, getCentroid(mol)));
}

/**
 * Centroid of the atoms in `atomIds`, or of all atoms when omitted.
 */
export function getCentroid(mol: Molecule, atomIds?: readonly number[]): Vector3 {
  if (atomIds === undefined) {
    return computeCentroid(mol.positions);
  }
  if (atomIds.length === 0) {
    throw new Error('atomIds was of length 0');
  }

  const rows = getAtomRowIndex(mol.atoms);
  const points = atomIds.map(id => {
    const row = rows.get(id);
    const point = row === undefined ? undefined : mol.positions[row];
    if (point === undefined) {
      throw new Error(`Atom ${id} is not part of the molecule`);
    }
    return point;
  });
  return computeCentroid(points);
}

export function getNumAtoms(mol: Molecule): number {
  return mol.atoms.length;
}

export function getAtoms(mol: Molecule): readonly Atom[] {
  return mol.atoms;
}

export function getBonds(mol: Molecule): readonly Bond[] {
  return mol.bonds;
}

export function translateMolecule(mol: Molecule, vector: Vector3): Molecule {
  return withDisplacement(mol, vector);
}

/**
 * Rigid rotation by `angle` radians about `axis` passing through `origin`.
 */
export function rotateMolecule(mol: Molecule, angle: number, axis: Vector3, origin: Vector3): Molecule {
  return {
    atoms: mol.atoms,
    bonds: mol.bonds,
    positions: rotatePositions(mol.positions, angle, axis, origin),
  };
}
