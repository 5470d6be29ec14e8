/**
 * src/tree/model.ts
 * Order-preserving policy tree with dotted-path access.
 *
 * Paths follow the dotted-key convention of Beats-style maps: at every level
 * a literal key equal to the remaining path wins, otherwise the path is split
 * at its first dot ("a.b.c" → "a" then "b.c"). So both of these resolve
 * "ssl.verification_mode":
 *
 *   ssl.verification_mode: none
 *   ssl:
 *     verification_mode: none
 */

import type { Lookup, TreeKind, TreeList, TreeMap, TreeValue } from '../types/policy.js';
import { PolicyShapeError } from '../policy/errors.js';

export function isTreeMap(value: TreeValue | undefined): value is TreeMap {
  return value instanceof Map;
}

export function isTreeList(value: TreeValue | undefined): value is TreeList {
  return Array.isArray(value);
}

export function kindOf(value: TreeValue): TreeKind {
  if (value === null) return 'null';
  if (isTreeMap(value)) return 'map';
  if (isTreeList(value)) return 'list';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
    case 'bigint':
      return 'number';
    default:
      return 'boolean';
  }
}

/** Deep copy. The copy never shares a map or list with the original. */
export function cloneTree<T extends TreeValue>(value: T): T;
export function cloneTree(value: TreeValue): TreeValue {
  if (isTreeMap(value)) {
    const out: TreeMap = new Map();
    for (const [key, child] of value) out.set(key, cloneTree(child));
    return out;
  }
  if (isTreeList(value)) {
    return value.map((child) => cloneTree(child));
  }
  return value;
}

type Located =
  | { present: true; parent: TreeMap; key: string; value: TreeValue }
  | { present: false; parent: TreeMap | null; key: string };

export class TreeDocument {
  constructor(public readonly root: TreeMap = new Map()) {}

  get(path: string): Lookup {
    const loc = this.locate(path, false);
    return loc.present ? { found: true, value: loc.value } : { found: false };
  }

  put(path: string, value: TreeValue): void {
    const loc = this.locate(path, true);
    // locate() with createMissing always yields a parent map
    loc.parent?.set(loc.key, value);
  }

  /** Returns false when there was nothing to delete. */
  delete(path: string): boolean {
    const loc = this.locate(path, false);
    if (!loc.present) return false;
    return loc.parent.delete(loc.key);
  }

  clone(): TreeDocument {
    return new TreeDocument(cloneTree(this.root));
  }

  private locate(path: string, createMissing: boolean): Located {
    let data = this.root;
    let key = path;
    let walked = '';

    for (;;) {
      if (data.has(key)) {
        const value = data.get(key);
        if (value !== undefined) return { present: true, parent: data, key, value };
      }

      const idx = key.indexOf('.');
      if (idx < 0) return { present: false, parent: data, key };

      const head = key.slice(0, idx);
      walked = walked ? `${walked}.${head}` : head;
      let next = data.get(head);

      if (next === undefined || next === null) {
        if (!createMissing) return { present: false, parent: null, key };
        next = new Map();
        data.set(head, next);
      }
      if (!isTreeMap(next)) {
        throw new PolicyShapeError(walked, 'map', kindOf(next));
      }

      data = next;
      key = key.slice(idx + 1);
    }
  }
}
