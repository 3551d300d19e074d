import type { Molecule, SupraMolecule, Vector3 } from 'types';
import { createAtom, createBond } from 'src/utils/atom-utils';
import { createMolecule } from 'src/utils/molecule';
import { createSupraMolecule } from 'src/utils/supramolecule';

export const HOST_POSITIONS: Vector3[] = [
  [1, 1, 0],
  [-1, 1, 0],
  [1, -1, 0],
  [-1, -1, 0],
];

export const GUEST_POSITIONS: Vector3[] = [
  [0, 0.5, 0],
  [0, -0.5, 0],
];

// Square of four carbons, bonded as a ring 0-1-3-2-0.
export function buildHost(): Molecule {
  return createMolecule(
    [0, 1, 2, 3].map(id => createAtom(id, 'C')),
    [createBond(0, 0, 1), createBond(1, 1, 3), createBond(2, 3, 2), createBond(3, 2, 0)],
    HOST_POSITIONS
  );
}

// Diatomic guest numbered independently of the host.
export function buildGuest(positions: Vector3[] = GUEST_POSITIONS): Molecule {
  return createMolecule([createAtom(0, 'N'), createAtom(1, 'N')], [createBond(0, 0, 1)], positions);
}

/**
 * Host atoms 0-3 and guest atoms 4-5 in one bonded collection.
 */
export function buildHostGuest(guestPositions: Vector3[] = GUEST_POSITIONS): SupraMolecule {
  const atoms = [
    ...[0, 1, 2, 3].map(id => createAtom(id, 'C')),
    createAtom(4, 'N'),
    createAtom(5, 'N'),
  ];
  const bonds = [
    createBond(0, 0, 1),
    createBond(1, 1, 3),
    createBond(2, 3, 2),
    createBond(3, 2, 0),
    createBond(4, 4, 5),
  ];
  return createSupraMolecule(atoms, bonds, [...HOST_POSITIONS, ...guestPositions]);
}
