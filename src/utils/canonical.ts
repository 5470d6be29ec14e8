import type { TreeMap, TreeValue } from '../types/policy.js';

const DIGITS_RE = /(\d+)/;

/**
 * Natural key order: digit runs compare by numeric value, so
 * "batch/componentid-2" sorts before "batch/componentid-10".
 */
export function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  const ca = a.split(DIGITS_RE);
  const cb = b.split(DIGITS_RE);
  const n = Math.min(ca.length, cb.length);

  for (let i = 0; i < n; i++) {
    const x = ca[i];
    const y = cb[i];
    if (x === y) continue;
    // split() with a capture group puts the digit runs at odd indices
    if (i % 2 === 1) {
      const byValue = compareDigitRuns(x, y);
      if (byValue !== 0) return byValue;
    }
    return x < y ? -1 : 1;
  }
  return ca.length - cb.length;
}

function compareDigitRuns(x: string, y: string): number {
  const nx = x.replace(/^0+(?=\d)/, '');
  const ny = y.replace(/^0+(?=\d)/, '');
  if (nx.length !== ny.length) return nx.length - ny.length;
  if (nx === ny) return 0;
  return nx < ny ? -1 : 1;
}

/** Copy of the tree with every map's keys in natural order. Lists keep their order. */
export function sortTree<T extends TreeValue>(input: T): T;
export function sortTree(input: TreeValue): TreeValue {
  if (Array.isArray(input)) {
    return input.map((item) => sortTree(item));
  }
  if (input instanceof Map) {
    const out: TreeMap = new Map();
    for (const key of [...input.keys()].sort(compareKeys)) {
      const value = input.get(key);
      if (value !== undefined) out.set(key, sortTree(value));
    }
    return out;
  }
  return input;
}
