// Core types for host-guest conformer sampling

export type Vector3 = readonly [number, number, number];

export type PositionMatrix = readonly Vector3[];

/**
 * Atom in a molecule.
 * Radius, sigma and epsilon are resolved once from the element table when the atom is created.
 * Atoms are immutable - never mutate them directly.
 */
export interface Atom {
  readonly id: number;
  readonly element: string; // title-cased symbol, e.g. 'C', 'Cl'
  readonly radius: number; // used as sigma by SpdPotential
  readonly sigma: number; // used by VaryingEpsilonPotential
  readonly epsilon: number; // used by VaryingEpsilonPotential
}

export interface Bond {
  readonly id: number;
  readonly atom1Id: number;
  readonly atom2Id: number;
}

/**
 * Molecule representation.
 * Row i of `positions` holds the coordinates of `atoms[i]`.
 * Molecules are immutable - transforms return new molecules sharing the atom and bond arrays.
 */
export interface Molecule {
  readonly atoms: readonly Atom[];
  readonly bonds: readonly Bond[];
  readonly positions: PositionMatrix;
}

/**
 * A molecule split into disconnected rigid components.
 * The component partition is structural: it survives coordinate updates and is only
 * recomputed when the atoms or bonds change.
 */
export interface SupraMolecule extends Molecule {
  readonly components: readonly Molecule[];
  readonly cid: number | null; // conformer id assigned by the Spinner
  readonly potential: number | null;
}

export interface ConformerMetadata {
  cid?: number | null;
  potential?: number | null;
}

export interface ElementParameters {
  radius: number;
  epsilon: number;
}

export interface AtomParameters {
  radius?: number;
  sigma?: number;
  epsilon?: number;
}

/**
 * Nonbonded energy of a supramolecule, summed over pairs of components.
 */
export interface Potential {
  computePotential(supramolecule: SupraMolecule): number;
}

export interface SpinnerOptions {
  stepSize: number;
  rotationStepSize: number; // radians
  numConformers: number;
  maxAttempts?: number;
  potentialFunction?: Potential;
  beta?: number; // stands in for the inverse temperature
  randomSeed?: number | null; // null picks a non-reproducible seed
  verbose?: boolean;
}
