import { range, uniq } from 'es-toolkit';
import type { Molecule, Potential, SpinnerOptions, SupraMolecule } from 'types';
import { DEFAULT_BETA, DEFAULT_MAX_ATTEMPTS, DEFAULT_RANDOM_SEED } from 'src/constants';
import { SpdPotential } from 'src/potentials/spd-potential';
import { normalizeVector, scaleVector } from 'src/utils/geometry';
import { getCentroid, rotateMolecule, translateMolecule } from 'src/utils/molecule';
import { RandomGenerator } from 'src/utils/random';
import { initFromComponents } from 'src/utils/supramolecule';

/**
 * Metropolis acceptance test. Downhill moves always pass; uphill moves pass when
 * exp(-beta * dE) beats a fresh uniform draw, which is only consumed for uphill moves.
 */
export function testMove(
  beta: number,
  currentPotential: number,
  newPotential: number,
  generator: RandomGenerator
): boolean {
  if (newPotential < currentPotential) {
    return true;
  }
  const expTerm = Math.exp(-beta * (newPotential - currentPotential));
  return expTerm > generator.next();
}

interface StepResult {
  supramolecule: SupraMolecule;
  potential: number;
}

/**
 * Generate host-guest conformations by rigidly moving guests.
 *
 * A Metropolis Monte Carlo walk: each step translates and rotates one movable component,
 * re-evaluates the potential and keeps the move if it passes `testMove`. Every accepted
 * state is yielded as a new conformer.
 */
export class Spinner {
  private readonly stepSize: number;
  private readonly rotationStepSize: number;
  private readonly numConformers: number;
  private readonly maxAttempts: number;
  private readonly potentialFunction: Potential;
  private readonly beta: number;
  private readonly generator: RandomGenerator;
  private readonly verbose: boolean;

  constructor(options: SpinnerOptions) {
    const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    if (!Number.isInteger(options.numConformers) || options.numConformers < 1) {
      throw new Error(`numConformers must be a positive integer, got ${options.numConformers}`);
    }

    this.stepSize = options.stepSize;
    this.rotationStepSize = options.rotationStepSize;
    this.numConformers = options.numConformers;
    this.maxAttempts = maxAttempts;
    this.potentialFunction = options.potentialFunction ?? new SpdPotential();
    this.beta = options.beta ?? DEFAULT_BETA;
    this.generator = new RandomGenerator(
      options.randomSeed === undefined ? DEFAULT_RANDOM_SEED : options.randomSeed
    );
    this.verbose = options.verbose ?? Boolean(process.env.VERBOSE);
  }

  computePotential(supramolecule: SupraMolecule): number {
    return this.potentialFunction.computePotential(supramolecule);
  }

  /**
   * Indices of the components that may move. Without an explicit choice the largest
   * component is the stationary host, unless all components are the same size.
   */
  private resolveMovableComponents(
    components: readonly Molecule[],
    movableComponents?: readonly number[]
  ): number[] {
    const indices = range(components.length);
    if (indices.length === 0) {
      throw new Error('Supramolecule has no components to move');
    }

    if (movableComponents !== undefined) {
      const invalid = movableComponents.filter(i => !indices.includes(i));
      if (invalid.length > 0 || movableComponents.length === 0) {
        throw new Error(
          `Invalid movable components [${movableComponents.join(', ')}] for ${components.length} components`
        );
      }
      return indices.filter(i => movableComponents.includes(i));
    }

    const sizes = components.map(c => c.atoms.length);
    if (uniq(sizes).length > 1) {
      const maxSize = Math.max(...sizes);
      return indices.filter(i => sizes[i] !== maxSize);
    }
    return indices;
  }

  private runStep(supramolecule: SupraMolecule, movable: readonly number[]): StepResult {
    const componentList = [...supramolecule.components];
    const targetIndex = this.generator.choice(movable);
    let target = componentList[targetIndex];
    if (target === undefined) {
      throw new Error(`Component ${targetIndex} does not exist`);
    }

    const direction = normalizeVector(this.generator.vector3());
    const translationScale = this.generator.uniform(-1, 1);
    target = translateMolecule(target, scaleVector(direction, this.stepSize * translationScale));

    const axis = this.generator.vector3();
    const rotationScale = this.generator.uniform(-1, 1);
    target = rotateMolecule(target, this.rotationStepSize * rotationScale, axis, getCentroid(target));

    componentList[targetIndex] = target;
    const moved = initFromComponents(componentList);
    return { supramolecule: moved, potential: this.computePotential(moved) };
  }

  /**
   * Lazily yield conformers. The starting structure is always yielded first as conformer 0;
   * after that only accepted moves are yielded, until `numConformers` have been accepted or
   * `maxAttempts` steps (counting the start) have been used.
   *
   * @param movableComponents Indices of components allowed to move
   */
  *getConformers(
    supramolecule: SupraMolecule,
    movableComponents?: readonly number[]
  ): Generator<SupraMolecule, void, undefined> {
    const movable = this.resolveMovableComponents(supramolecule.components, movableComponents);

    let cid = 0;
    let potential = this.computePotential(supramolecule);
    let current = initFromComponents(supramolecule.components, { cid, potential });
    yield current;

    let accepted = 0;
    let attempts = 0;
    for (let step = 1; step < this.maxAttempts; step++) {
      const proposal = this.runStep(current, movable);
      if (testMove(this.beta, potential, proposal.potential, this.generator)) {
        cid++;
        accepted++;
        potential = proposal.potential;
        current = { ...proposal.supramolecule, cid, potential };
        yield current;
      }
      attempts++;
      if (accepted === this.numConformers) {
        break;
      }
    }

    if (this.verbose) {
      console.log(`${accepted} conformers generated in ${attempts} steps.`);
    }
  }

  /**
   * Run the chain to completion and return the last conformer.
   */
  getFinalConformer(supramolecule: SupraMolecule, movableComponents?: readonly number[]): SupraMolecule {
    let conformer: SupraMolecule | undefined;
    for (const next of this.getConformers(supramolecule, movableComponents)) {
      conformer = next;
    }
    if (conformer === undefined) {
      throw new Error('No conformer was generated');
    }
    return conformer;
  }
}
