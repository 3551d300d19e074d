import type { Atom, AtomParameters, Bond, ElementParameters } from 'types';
import elementParameters from 'src/data/element-parameters.json';

const ELEMENT_PARAMETERS: Record<string, ElementParameters> = elementParameters;

/**
 * Title-case an element symbol, e.g. 'CL' and 'cl' become 'Cl'
 */
export function normalizeElementSymbol(symbol: string): string {
  const trimmed = symbol.trim();
  return (trimmed[0]?.toUpperCase() ?? '') + trimmed.slice(1).toLowerCase();
}

export function getElementParameters(symbol: string): ElementParameters | null {
  return ELEMENT_PARAMETERS[normalizeElementSymbol(symbol)] ?? null;
}

/**
 * Create a new atom, resolving radius and epsilon from the element table.
 * Sigma defaults to the radius. Explicit parameters win over the table, so atoms of
 * elements missing from the table can still be built when every parameter is given.
 */
export function createAtom(id: number, element: string, parameters: AtomParameters = {}): Atom {
  const symbol = normalizeElementSymbol(element);
  const defaults = getElementParameters(symbol);

  const radius = parameters.radius ?? defaults?.radius;
  const epsilon = parameters.epsilon ?? defaults?.epsilon;
  if (radius === undefined || epsilon === undefined) {
    throw new Error(`No parameters known for element '${element}' (atom ${id})`);
  }

  return {
    id,
    element: symbol,
    radius,
    sigma: parameters.sigma ?? radius,
    epsilon,
  };
}

export function createBond(id: number, atom1Id: number, atom2Id: number): Bond {
  return { id, atom1Id, atom2Id };
}

/**
 * Copy of an atom under a new id, keeping its resolved parameters
 */
export function withAtomId(atom: Atom, id: number): Atom {
  return { ...atom, id };
}
