import type { Atom, Bond, Molecule } from 'types';
import { Graph, findConnectedComponents } from 'src/utils/graph';

interface ComponentCacheEntry {
  atomCount: number;
  bonds: readonly Bond[];
  bondCount: number;
  components: readonly (readonly number[])[];
}

// Keyed on the atom array; transforms share atoms and bonds by reference, so coordinate
// updates hit the cache. A different bond array or a change in either length recomputes.
const componentCache = new WeakMap<readonly Atom[], ComponentCacheEntry>();

export function buildGraphFromMolecule(mol: Pick<Molecule, 'atoms' | 'bonds'>): Graph {
  const g = new Graph();

  for (const atom of mol.atoms) {
    g.addNode(atom.id);
  }

  for (const bond of mol.bonds) {
    if (!g.hasNode(bond.atom1Id) || !g.hasNode(bond.atom2Id)) {
      throw new Error(`Bond ${bond.id} references unknown atom (${bond.atom1Id}-${bond.atom2Id})`);
    }
    g.addEdge(bond.atom1Id, bond.atom2Id);
  }

  return g;
}

/**
 * Atom ids of each connected component of the bond graph. Isolated atoms are singletons.
 */
export function computeComponentAtomIds(
  mol: Pick<Molecule, 'atoms' | 'bonds'>
): readonly (readonly number[])[] {
  const cached = componentCache.get(mol.atoms);
  if (
    cached &&
    cached.bonds === mol.bonds &&
    cached.atomCount === mol.atoms.length &&
    cached.bondCount === mol.bonds.length
  ) {
    return cached.components;
  }

  const components = findConnectedComponents(buildGraphFromMolecule(mol));
  componentCache.set(mol.atoms, {
    atomCount: mol.atoms.length,
    bonds: mol.bonds,
    bondCount: mol.bonds.length,
    components,
  });
  return components;
}
