export { createAtom, createBond, normalizeElementSymbol, getElementParameters } from 'src/utils/atom-utils';
export {
  createMolecule,
  getPositionMatrix,
  withPositionMatrix,
  withDisplacement,
  withCentroid,
  getCentroid,
  getNumAtoms,
  getAtoms,
  getBonds,
  translateMolecule,
  rotateMolecule,
} from 'src/utils/molecule';
export {
  createSupraMolecule,
  initFromComponents,
  withSupraPositionMatrix,
  withSupraDisplacement,
  getComponents,
  getCid,
  getPotential,
  isSupraMolecule,
  describeSupraMolecule,
} from 'src/utils/supramolecule';
export { SpdPotential } from 'src/potentials/spd-potential';
export { VaryingEpsilonPotential } from 'src/potentials/varying-epsilon-potential';
export { Spinner, testMove } from 'src/generators/spinner';
export { RandomGenerator } from 'src/utils/random';
export { generateXYZ, writeXYZFile } from 'src/generators/xyz-writer';
export { parseXYZ, readXYZFile } from 'src/parsers/xyz-parser';
export {
  getAtomDistance,
  calculateMinAtomDistance,
  calculateCentroidDistance,
} from 'src/utils/distance-utils';
export { rotationMatrixArbitraryAxis } from 'src/utils/geometry';
export type {
  Atom,
  Bond,
  Molecule,
  SupraMolecule,
  Potential,
  SpinnerOptions,
  Vector3,
  PositionMatrix,
  AtomParameters,
  ConformerMetadata,
} from 'types';
