/**
 * src/tree/yaml.ts
 * YAML ⇄ policy tree.
 *
 * Parsing walks the YAML node graph itself instead of calling toJS(): toJS()
 * hands back the same object for every alias of an anchor, and the filter
 * rules mutate in place, so every alias is expanded into its own copy here.
 */

import { isAlias, isMap, isScalar, isSeq, parseDocument, stringify, visit } from 'yaml';
import type { Alias, Document } from 'yaml';
import type { PolicyInput, Scalar, TreeList, TreeMap, TreeValue } from '../types/policy.js';
import { PolicyDecodeError } from '../policy/errors.js';
import { sortTree } from '../utils/canonical.js';
import { TreeDocument } from './model.js';

/**
 * Upper bound on the nodes produced by expanding aliases in one document
 * (guards against "billion laughs"). Reusing an anchor many times is fine as
 * long as the copies stay under it.
 */
export const MAX_ALIAS_NODES = 100_000;

const MERGE_KEY = '<<';

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

const utf8 = new TextDecoder('utf-8', { fatal: true });

export function decodePolicyText(input: PolicyInput): string {
  if (typeof input === 'string') return input;
  try {
    return utf8.decode(input);
  } catch (err) {
    throw new PolicyDecodeError('input is not valid UTF-8', { cause: err });
  }
}

export function parseTree(input: PolicyInput): TreeDocument {
  const text = decodePolicyText(input);
  const doc = parseDocument(text, { prettyErrors: true, intAsBigInt: true, merge: true });

  if (doc.errors.length > 0) {
    const [first] = doc.errors;
    throw new PolicyDecodeError(first.message, { cause: first });
  }

  if (doc.contents === null) return new TreeDocument();

  const root = new NodeConverter(doc).convert(doc.contents);
  if (root instanceof Map) return new TreeDocument(root);

  const kind = Array.isArray(root) ? 'list' : typeof root;
  throw new PolicyDecodeError(`expected a map at the document root, found ${root === null ? 'null' : kind}`);
}

// `<<` as a plain key; newer yaml releases hand it over as a symbol
function isMergeKey(key: unknown): boolean {
  if (!isScalar(key)) return false;
  if (key.type === 'QUOTE_DOUBLE' || key.type === 'QUOTE_SINGLE') return false;
  const { value } = key;
  return value === MERGE_KEY || (typeof value === 'symbol' && value.description === MERGE_KEY);
}

/** Alias → the node carrying its anchor most recently before it, in document order. */
function aliasTargets(doc: Document): Map<Alias, unknown> {
  const anchors = new Map<string, unknown>();
  const targets = new Map<Alias, unknown>();
  visit(doc, (_key, node) => {
    if (isAlias(node)) {
      targets.set(node, anchors.get(node.source));
    } else if ((isMap(node) || isSeq(node) || isScalar(node)) && node.anchor) {
      anchors.set(node.anchor, node);
    }
  });
  return targets;
}

class NodeConverter {
  private aliasDepth = 0;
  private aliasNodes = 0;
  private readonly resolving = new Set<unknown>();
  private readonly targets: Map<Alias, unknown>;

  constructor(doc: Document) {
    this.targets = aliasTargets(doc);
  }

  convert(node: unknown): TreeValue {
    if (isAlias(node)) return this.expand(node);

    if (this.aliasDepth > 0 && ++this.aliasNodes > MAX_ALIAS_NODES) {
      throw new PolicyDecodeError(`aliases expand to more than ${MAX_ALIAS_NODES} nodes`);
    }

    if (isMap(node)) {
      const out: TreeMap = new Map();
      const merges: unknown[] = [];
      for (const pair of node.items) {
        if (isMergeKey(pair.key)) {
          merges.push(pair.value);
          continue;
        }
        out.set(this.convertKey(pair.key), this.convert(pair.value));
      }
      for (const source of merges) this.merge(out, source);
      return out;
    }

    if (isSeq(node)) {
      const out: TreeList = [];
      for (const item of node.items) out.push(this.convert(item));
      return out;
    }

    if (isScalar(node)) {
      return this.convertScalar(node.value);
    }

    // "key:" with nothing after it
    if (node === null || node === undefined) return null;

    throw new PolicyDecodeError(`unsupported YAML node ${String(node)}`);
  }

  private expand(node: Alias): TreeValue {
    const target = this.targets.get(node);
    if (target === undefined) {
      throw new PolicyDecodeError(`unresolved alias *${node.source}`);
    }
    if (this.resolving.has(target)) {
      throw new PolicyDecodeError(`recursive alias *${node.source}`);
    }
    this.resolving.add(target);
    this.aliasDepth++;
    try {
      return this.convert(target);
    } finally {
      this.aliasDepth--;
      this.resolving.delete(target);
    }
  }

  /**
   * `<<: *base` or `<<: [*a, *b]`. Keys written in the map itself win, and
   * among several sources the earlier one wins.
   */
  private merge(out: TreeMap, source: unknown): void {
    const value = this.convert(source);
    const maps = Array.isArray(value) ? value : [value];
    for (const map of maps) {
      if (!(map instanceof Map)) {
        throw new PolicyDecodeError('merge key value must be a map or a list of maps');
      }
      for (const [key, member] of map) {
        if (!out.has(key)) out.set(key, member);
      }
    }
  }

  private convertKey(key: unknown): string {
    const value = this.convert(key);
    if (value instanceof Map || Array.isArray(value)) {
      throw new PolicyDecodeError('map keys must be scalars');
    }
    return String(value);
  }

  private convertScalar(value: unknown): Scalar {
    switch (typeof value) {
      case 'string':
      case 'number':
      case 'boolean':
        return value;
      case 'bigint':
        // exact beyond 2^53, plain numbers otherwise
        return value >= MIN_SAFE && value <= MAX_SAFE ? Number(value) : value;
      default:
        if (value === null) return null;
        throw new PolicyDecodeError(`unsupported scalar ${String(value)}`);
    }
  }
}

/**
 * Deterministic YAML: keys in natural order, 4-space indentation, no folding
 * of long strings.
 */
export function serializeTree(tree: TreeDocument | TreeMap): string {
  const root = tree instanceof TreeDocument ? tree.root : tree;
  return stringify(sortTree(root), { indent: 4, lineWidth: 0 });
}
