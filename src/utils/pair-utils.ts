/**
 * Every unordered pair (items[i], items[j]) with i < j, in lexicographic order.
 */
export function unorderedPairs<T>(items: readonly T[]): [T, T][] {
  const pairs: [T, T][] = [];
  items.forEach((first, i) => {
    for (const second of items.slice(i + 1)) {
      pairs.push([first, second]);
    }
  });
  return pairs;
}

/**
 * Zip two arrays that must have the same length.
 */
export function zipStrict<A, B>(a: readonly A[], b: readonly B[]): [A, B][] {
  if (a.length !== b.length) {
    throw new Error(`Cannot zip arrays of different lengths (${a.length} and ${b.length})`);
  }
  const zipped: [A, B][] = [];
  a.forEach((item, i) => {
    const other = b[i];
    if (other !== undefined) zipped.push([item, other]);
  });
  return zipped;
}
