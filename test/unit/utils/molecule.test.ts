import { describe, it, expect } from 'vitest';
import type { Vector3 } from 'types';
import { createAtom, createBond } from 'src/utils/atom-utils';
import {
  createMolecule,
  getAtoms,
  getBonds,
  getCentroid,
  getNumAtoms,
  getPositionMatrix,
  rotateMolecule,
  withCentroid,
  withDisplacement,
  withPositionMatrix,
} from 'src/utils/molecule';

const POSITIONS: Vector3[] = [
  [0, 1, 0],
  [1, 1, 0],
  [-1, 1, 0],
  [0, 10, 0],
  [1, 10, 0],
  [-1, 10, 0],
];

const POSITIONS_2: Vector3[] = [
  [0, 1, 0],
  [1, 1, 0],
  [-1, 1, 0],
  [0, 20, 0],
  [1, 20, 0],
  [-1, 20, 0],
];

function buildMolecule() {
  return createMolecule(
    [0, 1, 2, 3, 4, 5].map(id => createAtom(id, 'C')),
    [],
    POSITIONS
  );
}

describe('Molecule', () => {
  it('should return its position matrix', () => {
    expect(getPositionMatrix(buildMolecule())).toEqual(POSITIONS);
  });

  it('should hand out a copy of the positions', () => {
    const mol = buildMolecule();
    const matrix = getPositionMatrix(mol);
    matrix[0] = [9, 9, 9];
    expect(mol.positions[0]).toEqual([0, 1, 0]);
  });

  it('should round-trip a new position matrix', () => {
    const mol = buildMolecule();
    const moved = withPositionMatrix(mol, POSITIONS_2);
    expect(getPositionMatrix(moved)).toEqual(POSITIONS_2);
    expect(moved.atoms).toBe(mol.atoms);
    expect(moved.bonds).toBe(mol.bonds);
    expect(getPositionMatrix(mol)).toEqual(POSITIONS);
  });

  it('should reject a position matrix with the wrong row count', () => {
    expect(() => withPositionMatrix(buildMolecule(), POSITIONS.slice(0, 5))).toThrow(
      'Position matrix has 5 rows but the molecule has 6 atoms'
    );
  });

  it('should displace every atom', () => {
    const moved = withDisplacement(buildMolecule(), [1, -2, 0.5]);
    expect(getPositionMatrix(moved)).toEqual([
      [1, -1, 0.5],
      [2, -1, 0.5],
      [0, -1, 0.5],
      [1, 8, 0.5],
      [2, 8, 0.5],
      [0, 8, 0.5],
    ]);
  });

  it('should compute the centroid', () => {
    const centroid = getCentroid(buildMolecule());
    expect(centroid[0]).toBeCloseTo(0, 6);
    expect(centroid[1]).toBeCloseTo(5.5, 6);
    expect(centroid[2]).toBeCloseTo(0, 6);
  });

  it('should compute the centroid of an atom subset', () => {
    expect(getCentroid(buildMolecule(), [3, 4])).toEqual([0.5, 10, 0]);
  });

  it('should reject empty and unknown atom subsets', () => {
    const mol = buildMolecule();
    expect(() => getCentroid(mol, [])).toThrow('atomIds was of length 0');
    expect(() => getCentroid(mol, [42])).toThrow('Atom 42 is not part of the molecule');
  });

  it('should move its centroid to a position', () => {
    const centroid = getCentroid(withCentroid(buildMolecule(), [2, 2, 2]));
    expect(centroid[0]).toBeCloseTo(2, 10);
    expect(centroid[1]).toBeCloseTo(2, 10);
    expect(centroid[2]).toBeCloseTo(2, 10);
  });

  it('should rotate rigidly about an origin', () => {
    const mol = createMolecule([createAtom(0, 'C'), createAtom(1, 'O')], [createBond(0, 0, 1)], [
      [1, 0, 0],
      [2, 0, 0],
    ]);
    const [a, b] = rotateMolecule(mol, Math.PI / 2, [0, 0, 1], [0, 0, 0]).positions;
    expect(a?.[0]).toBeCloseTo(0, 10);
    expect(a?.[1]).toBeCloseTo(1, 10);
    expect(b?.[0]).toBeCloseTo(0, 10);
    expect(b?.[1]).toBeCloseTo(2, 10);
  });

  it('should expose atoms, bonds and atom count', () => {
    const mol = createMolecule([createAtom(4, 'C'), createAtom(9, 'H')], [createBond(0, 4, 9)], [
      [0, 0, 0],
      [0, 0, 1.1],
    ]);
    expect(getNumAtoms(mol)).toBe(2);
    expect(getAtoms(mol).map(a => a.id)).toEqual([4, 9]);
    expect(getBonds(mol)).toEqual([{ id: 0, atom1Id: 4, atom2Id: 9 }]);
    expect(getCentroid(mol, [9])).toEqual([0, 0, 1.1]);
  });

  it('should not share atom and bond arrays with the caller', () => {
    const atoms = [createAtom(0, 'C'), createAtom(1, 'C')];
    const bonds = [createBond(0, 0, 1)];
    const mol = createMolecule(atoms, bonds, [
      [0, 0, 0],
      [1.5, 0, 0],
    ]);

    atoms.push(createAtom(2, 'O'));
    bonds.push(createBond(1, 1, 2));

    expect(mol.atoms).not.toBe(atoms);
    expect(getNumAtoms(mol)).toBe(2);
    expect(getBonds(mol)).toHaveLength(1);
    expect(getCentroid(mol, [1])).toEqual([1.5, 0, 0]);
  });

  it('should validate atoms and bonds on creation', () => {
    const atoms = [createAtom(0, 'C'), createAtom(0, 'C')];
    expect(() => createMolecule(atoms, [], [[0, 0, 0], [1, 0, 0]])).toThrow(
      'Atom ids must be unique within a molecule'
    );
    expect(() => createMolecule([createAtom(0, 'C')], [createBond(3, 0, 1)], [[0, 0, 0]])).toThrow(
      'Bond 3 references unknown atom (0-1)'
    );
  });
});
