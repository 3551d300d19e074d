import { describe, it, expect } from 'vitest';
import { createAtom, createBond, getElementParameters, normalizeElementSymbol, withAtomId } from 'src/utils/atom-utils';

describe('atom utils', () => {
  it('should title-case element symbols', () => {
    expect(normalizeElementSymbol('c')).toBe('C');
    expect(normalizeElementSymbol('CL')).toBe('Cl');
    expect(normalizeElementSymbol(' br ')).toBe('Br');
  });

  it('should resolve parameters from the element table', () => {
    const atom = createAtom(3, 'c');
    expect(atom).toEqual({ id: 3, element: 'C', radius: 0.76, sigma: 0.76, epsilon: 0.105 });
    expect(getElementParameters('CL')).toEqual({ radius: 1.02, epsilon: 0.227 });
    expect(getElementParameters('Xx')).toBeNull();
  });

  it('should know the heavy metals found in cages and guests', () => {
    expect(getElementParameters('MO')).toEqual({ radius: 1.54, epsilon: 0.056 });
    expect(getElementParameters('hg')).toEqual({ radius: 1.32, epsilon: 0.385 });
    expect(createAtom(0, 'Ir').radius).toBe(1.41);
    for (const symbol of ['W', 'Pb', 'Os', 'Re', 'Cs', 'Ba', 'La', 'Eu', 'Lu']) {
      expect(getElementParameters(symbol)).not.toBeNull();
    }
  });

  it('should let explicit parameters override the table', () => {
    const atom = createAtom(0, 'N', { sigma: 1.5, epsilon: 2 });
    expect(atom.radius).toBe(0.71);
    expect(atom.sigma).toBe(1.5);
    expect(atom.epsilon).toBe(2);
  });

  it('should reject unknown elements unless fully parameterised', () => {
    expect(() => createAtom(0, 'Xx')).toThrow("No parameters known for element 'Xx' (atom 0)");
    expect(createAtom(0, 'Xx', { radius: 1, epsilon: 0.1 })).toEqual({
      id: 0,
      element: 'Xx',
      radius: 1,
      sigma: 1,
      epsilon: 0.1,
    });
  });

  it('should copy an atom under a new id', () => {
    const atom = createAtom(7, 'O', { radius: 2 });
    expect(withAtomId(atom, 0)).toEqual({ ...atom, id: 0 });
    expect(atom.id).toBe(7);
  });

  it('should create bonds by atom id', () => {
    expect(createBond(2, 0, 5)).toEqual({ id: 2, atom1Id: 0, atom2Id: 5 });
  });
});
