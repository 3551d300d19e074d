import { sum } from 'es-toolkit';
import type { PositionMatrix, Potential, SupraMolecule } from 'types';
import { DEFAULT_NONBOND_EPSILON } from 'src/constants';
import { pairwiseDistances } from 'src/utils/geometry';
import { unorderedPairs, zipStrict } from 'src/utils/pair-utils';

/**
 * Default nonbonded potential: a Lennard-Jones shaped term summed over atom pairs of
 * different components, with one shared epsilon and per-pair sigmas mixed from atom radii.
 *
 * The term has no relation to an empirical forcefield. Coincident atoms evaluate to NaN,
 * which the Metropolis test never accepts.
 *
 * Subclasses can rescale radii before summing, e.g. to shrink only the guest:
 *
 * ```ts
 * class GuestScaledPotential extends SpdPotential {
 *   computePotential(supramolecule: SupraMolecule): number {
 *     const radii = supramolecule.components.map((c, i) =>
 *       c.atoms.map(a => (i === 1 ? a.radius * 0.5 : a.radius))
 *     );
 *     return this.computeNonbondedPotential(supramolecule.components.map(c => c.positions), radii);
 *   }
 * }
 * ```
 */
export class SpdPotential implements Potential {
  protected readonly nonbondEpsilon: number;

  /**
   * @param nonbondEpsilon Strength of the nonbonded term
   */
  constructor(nonbondEpsilon: number = DEFAULT_NONBOND_EPSILON) {
    this.nonbondEpsilon = nonbondEpsilon;
  }

  nonbondPotential(distance: number, sigma: number): number {
    return this.nonbondEpsilon * ((sigma / distance) ** 12 - (sigma / distance) ** 6);
  }

  /**
   * Arithmetic-mean (Lorentz-Berthelot) sigma for every atom pair.
   */
  combineSigma(radii1: readonly number[], radii2: readonly number[]): number[][] {
    return radii1.map(r1 => radii2.map(r2 => (r1 + r2) / 2));
  }

  protected computeNonbondedPotential(
    positionMatrices: readonly PositionMatrix[],
    radii: readonly (readonly number[])[]
  ): number {
    let nonbondedPotential = 0;

    for (const [[positions1, radii1], [positions2, radii2]] of unorderedPairs(
      zipStrict(positionMatrices, radii)
    )) {
      const distances = pairwiseDistances(positions1, positions2).flat();
      const sigmas = this.combineSigma(radii1, radii2).flat();
      nonbondedPotential += sum(
        zipStrict(distances, sigmas).map(([distance, sigma]) => this.nonbondPotential(distance, sigma))
      );
    }

    return nonbondedPotential;
  }

  computePotential(supramolecule: SupraMolecule): number {
    return this.computeNonbondedPotential(
      supramolecule.components.map(c => c.positions),
      supramolecule.components.map(c => c.atoms.map(atom => atom.radius))
    );
  }
}
