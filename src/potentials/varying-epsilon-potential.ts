import { sum } from 'es-toolkit';
import type { PositionMatrix, Potential, SupraMolecule } from 'types';
import { pairwiseDistances } from 'src/utils/geometry';
import { unorderedPairs, zipStrict } from 'src/utils/pair-utils';

interface ComponentParameters {
  positions: PositionMatrix;
  sigmas: readonly number[];
  epsilons: readonly number[];
}

/**
 * Lennard-Jones shaped nonbonded potential with per-atom sigma and epsilon.
 * Sigma mixes by arithmetic mean, epsilon by geometric mean.
 */
export class VaryingEpsilonPotential implements Potential {
  nonbondPotential(distance: number, sigma: number, epsilon: number): number {
    return epsilon * ((sigma / distance) ** 12 - (sigma / distance) ** 6);
  }

  combineSigma(sigmas1: readonly number[], sigmas2: readonly number[]): number[][] {
    return sigmas1.map(s1 => sigmas2.map(s2 => (s1 + s2) / 2));
  }

  combineEpsilon(epsilons1: readonly number[], epsilons2: readonly number[]): number[][] {
    return epsilons1.map(e1 => epsilons2.map(e2 => Math.sqrt(e1 * e2)));
  }

  protected computeNonbondedPotential(components: readonly ComponentParameters[]): number {
    let nonbondedPotential = 0;

    for (const [first, second] of unorderedPairs(components)) {
      const distances = pairwiseDistances(first.positions, second.positions).flat();
      const sigmas = this.combineSigma(first.sigmas, second.sigmas).flat();
      const epsilons = this.combineEpsilon(first.epsilons, second.epsilons).flat();
      nonbondedPotential += sum(
        zipStrict(zipStrict(distances, sigmas), epsilons).map(([[distance, sigma], epsilon]) =>
          this.nonbondPotential(distance, sigma, epsilon)
        )
      );
    }

    return nonbondedPotential;
  }

  computePotential(supramolecule: SupraMolecule): number {
    return this.computeNonbondedPotential(
      supramolecule.components.map(c => ({
        positions: c.positions,
        sigmas: c.atoms.map(atom => atom.sigma),
        epsilons: c.atoms.map(atom => atom.epsilon),
      }))
    );
  }
}
