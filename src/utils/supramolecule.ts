import type {
  Atom,
  Bond,
  ConformerMetadata,
  Molecule,
  PositionMatrix,
  SupraMolecule,
  Vector3,
} from 'types';
import { createBond, withAtomId } from 'src/utils/atom-utils';
import { computeComponentAtomIds } from 'src/utils/molecular-graph';
import { createMolecule, getAtomRowIndex, withDisplacement, withPositionMatrix } from 'src/utils/molecule';

/**
 * Split a molecule into one Molecule per connected component of its bond graph.
 * Each component keeps the original atom ids, the bonds fully inside it and its position rows.
 */
export function defineComponents(mol: Molecule): Molecule[] {
  const rows = getAtomRowIndex(mol.atoms);

  return computeComponentAtomIds(mol).map(ids => {
    const idSet = new Set(ids);
    const atoms = mol.atoms.filter(atom => idSet.has(atom.id));
    const bonds = mol.bonds.filter(bond => idSet.has(bond.atom1Id) && idSet.has(bond.atom2Id));
    const positions = atoms.map(atom => {
      const row = rows.get(atom.id);
      const point = row === undefined ? undefined : mol.positions[row];
      if (point === undefined) {
        throw new Error(`No position row for atom ${atom.id}`);
      }
      return point;
    });
    return createMolecule(atoms, bonds, positions);
  });
}

export function createSupraMolecule(
  atoms: readonly Atom[],
  bonds: readonly Bond[],
  positions: PositionMatrix,
  metadata: ConformerMetadata = {}
): SupraMolecule {
  const mol = createMolecule(atoms, bonds, positions);
  return {
    ...mol,
    components: defineComponents(mol),
    cid: metadata.cid ?? null,
    potential: metadata.potential ?? null,
  };
}

/**
 * Assemble a supramolecule from already disjoint component molecules.
 *
 * Atoms and bonds are renumbered into one contiguous id space (0, 1, 2, ... in component order)
 * and position rows are stacked in the same order. The given components are recorded as the
 * partition as-is; nothing checks that they are really disjoint.
 */
export function initFromComponents(
  components: readonly Molecule[],
  metadata: ConformerMetadata = {}
): SupraMolecule {
  const atoms: Atom[] = [];
  const bonds: Bond[] = [];
  const positions: Vector3[] = [];
  let nextAtomId = 0;
  let nextBondId = 0;

  for (const component of components) {
    const idMap = new Map<number, number>();
    for (const atom of component.atoms) {
      idMap.set(atom.id, nextAtomId);
      atoms.push(withAtomId(atom, nextAtomId));
      nextAtomId++;
    }

    for (const bond of component.bonds) {
      const atom1Id = idMap.get(bond.atom1Id);
      const atom2Id = idMap.get(bond.atom2Id);
      if (atom1Id === undefined || atom2Id === undefined) {
        throw new Error(`Bond ${bond.id} references an atom outside its component`);
      }
      bonds.push(createBond(nextBondId, atom1Id, atom2Id));
      nextBondId++;
    }

    for (const [x, y, z] of component.positions) {
      positions.push([x, y, z]);
    }
  }

  return {
    atoms,
    bonds,
    positions,
    components: [...components],
    cid: metadata.cid ?? null,
    potential: metadata.potential ?? null,
  };
}

/**
 * Clone with new overall coordinates. The previous components are kept verbatim and are not
 * resliced from `positions`; use `createSupraMolecule` or `withSupraDisplacement` to re-derive them.
 */
export function withSupraPositionMatrix(supra: SupraMolecule, positions: PositionMatrix): SupraMolecule {
  return {
    ...withPositionMatrix(supra, positions),
    components: supra.components,
    cid: supra.cid,
    potential: supra.potential,
  };
}

/**
 * Displaced clone whose components are re-derived, so they move with it.
 */
export function withSupraDisplacement(supra: SupraMolecule, displacement: Vector3): SupraMolecule {
  const mol = withDisplacement(supra, displacement);
  return {
    ...mol,
    components: defineComponents(mol),
    cid: supra.cid,
    potential: supra.potential,
  };
}

export function getComponents(supra: SupraMolecule): readonly Molecule[] {
  return supra.components;
}

export function getCid(supra: SupraMolecule): number | null {
  return supra.cid;
}

export function getPotential(supra: SupraMolecule): number | null {
  return supra.potential;
}

export function isSupraMolecule(mol: Molecule): mol is SupraMolecule {
  return 'components' in mol && 'cid' in mol && 'potential' in mol;
}

export function describeSupraMolecule(supra: SupraMolecule): string {
  const comps = supra.components.map(c => `Molecule(${c.atoms.length} atoms)`).join(', ');
  return `SupraMolecule(${supra.components.length} components, ${comps})`;
}
