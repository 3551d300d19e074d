/**
 * Sample guest placements around a small host and write the conformers to XYZ files.
 *
 * VERBOSE=1 npx tsx docs/examples/host-guest-example.ts
 */
import {
  calculateCentroidDistance,
  calculateMinAtomDistance,
  createAtom,
  createBond,
  createSupraMolecule,
  describeSupraMolecule,
  Spinner,
  writeXYZFile,
} from 'index';

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
const complex = createSupraMolecule(atoms, bonds, [
  [1.4, 1.4, 0],
  [-1.4, 1.4, 0],
  [1.4, -1.4, 0],
  [-1.4, -1.4, 0],
  [0, 0.55, 1.5],
  [0, -0.55, 1.5],
]);

console.log(describeSupraMolecule(complex));

const spinner = new Spinner({
  stepSize: 0.5,
  rotationStepSize: 0.3,
  numConformers: 20,
  verbose: true,
});

for (const conformer of spinner.getConformers(complex)) {
  console.log(
    `cid ${conformer.cid}: potential ${conformer.potential?.toFixed(4)}, ` +
      `centroid distance ${calculateCentroidDistance(conformer).toFixed(3)}, ` +
      `closest contact ${calculateMinAtomDistance(conformer).toFixed(3)}`
  );
  writeXYZFile(conformer, `conformer_${conformer.cid}.xyz`);
}
