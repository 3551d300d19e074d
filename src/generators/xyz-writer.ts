import { writeFileSync } from 'fs';
import type { Molecule } from 'types';
import { XYZ_DECIMALS } from 'src/constants';
import { zipStrict } from 'src/utils/pair-utils';
import { isSupraMolecule } from 'src/utils/supramolecule';

function formatComment(mol: Molecule): string {
  if (isSupraMolecule(mol) && (mol.cid !== null || mol.potential !== null)) {
    return `cid:${mol.cid}, pot:${mol.potential}`;
  }
  return '';
}

/**
 * Basic XYZ content: atom count, a comment line carrying conformer metadata when there is
 * any, then one `<element> <x> <y> <z>` line per atom. Connectivity is not kept.
 */
export function generateXYZ(mol: Molecule): string {
  const lines = zipStrict(mol.atoms, mol.positions).map(
    ([atom, [x, y, z]]) =>
      `${atom.element} ${x.toFixed(XYZ_DECIMALS)} ${y.toFixed(XYZ_DECIMALS)} ${z.toFixed(XYZ_DECIMALS)}`
  );
  return [String(mol.atoms.length), formatComment(mol), ...lines].join('\n') + '\n';
}

export function writeXYZFile(mol: Molecule, path: string): void {
  writeFileSync(path, generateXYZ(mol), 'utf-8');
}
