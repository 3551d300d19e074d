import type { PositionMatrix, SupraMolecule } from 'types';
import { euclideanDistance, pairwiseDistances } from 'src/utils/geometry';
import { getCentroid } from 'src/utils/molecule';
import { unorderedPairs } from 'src/utils/pair-utils';

/**
 * Distance between two rows of a position matrix.
 */
export function getAtomDistance(positions: PositionMatrix, atom1Id: number, atom2Id: number): number {
  const a = positions[atom1Id];
  const b = positions[atom2Id];
  if (a === undefined || b === undefined) {
    throw new Error(`No position for atom ${a === undefined ? atom1Id : atom2Id}`);
  }
  return euclideanDistance(a, b);
}

/**
 * Smallest atom-atom distance between any two different components.
 * Infinity when there are fewer than two components.
 */
export function calculateMinAtomDistance(supramolecule: SupraMolecule): number {
  let minDistance = Infinity;
  for (const [first, second] of unorderedPairs(supramolecule.components)) {
    for (const row of pairwiseDistances(first.positions, second.positions)) {
      minDistance = Math.min(minDistance, ...row);
    }
  }
  return minDistance;
}

/**
 * Distance between the centroids of a 1:1 host-guest complex.
 */
export function calculateCentroidDistance(supramolecule: SupraMolecule): number {
  const [first, second, ...rest] = supramolecule.components;
  if (first === undefined || second === undefined || rest.length > 0) {
    throw new Error(
      `Centroid distance needs exactly two components, got ${supramolecule.components.length}`
    );
  }
  return euclideanDistance(getCentroid(first), getCentroid(second));
}
