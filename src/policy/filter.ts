/**
 * src/policy/filter.ts
 * Applies a rule table to a policy tree.
 *
 * Rules run in table order against the same, progressively cleaned tree.
 * A path that is not there is skipped: the same table serves policies from
 * stack versions that omit optional sections. A value of the wrong kind is
 * a PolicyShapeError, never coerced.
 */

import type { FilterRule, RuleTable, Scalar, TreeList, TreeMap, TreeValue } from '../types/policy.js';
import { TreeDocument, isTreeList, isTreeMap, kindOf } from '../tree/index.js';
import { PolicyShapeError } from './errors.js';

/** Returns a cleaned copy; `doc` is left untouched. */
export function applyFilterRules(doc: TreeDocument, rules: RuleTable): TreeDocument {
  const out = doc.clone();
  cleanInPlace(out, rules, '');
  return out;
}

function cleanInPlace(doc: TreeDocument, rules: RuleTable, prefix: string): void {
  for (const rule of rules) {
    const lookup = doc.get(rule.path);
    if (!lookup.found) continue;
    applyRule(doc, rule, lookup.value, `${prefix}${rule.path}`);
  }
}

function applyRule(doc: TreeDocument, rule: Readonly<FilterRule>, value: TreeValue, at: string): void {
  switch (rule.kind) {
    case 'recurse': {
      if (!isTreeList(value)) throw new PolicyShapeError(at, 'list', kindOf(value));
      const cleaned: TreeList = value.map((element, i) => {
        if (!isTreeMap(element)) throw new PolicyShapeError(`${at}[${i}]`, 'map', kindOf(element));
        const copy = new TreeDocument(element).clone();
        cleanInPlace(copy, rule.rules, `${at}[${i}].`);
        return copy.root;
      });
      doc.put(rule.path, cleaned);
      return;
    }
    case 'recurse-members': {
      if (!isTreeMap(value)) throw new PolicyShapeError(at, 'map', kindOf(value));
      const cleaned: TreeMap = new Map();
      for (const [key, member] of value) {
        if (member === null) {
          cleaned.set(key, member);
          continue;
        }
        if (!isTreeMap(member)) throw new PolicyShapeError(`${at}.${key}`, 'map', kindOf(member));
        const copy = new TreeDocument(member).clone();
        cleanInPlace(copy, rule.rules, `${at}.${key}.`);
        cleaned.set(key, copy.root);
      }
      doc.put(rule.path, cleaned);
      return;
    }
    case 'rename-keys': {
      if (!isTreeMap(value)) throw new PolicyShapeError(at, 'map', kindOf(value));
      const renamed: TreeMap = new Map();
      for (const [key, member] of value) {
        const target = rule.pattern.test(key) ? key.replace(rule.pattern, rule.replacement) : key;
        renamed.set(target, member);
      }
      doc.put(rule.path, renamed);
      return;
    }
    case 'rewrite': {
      doc.put(rule.path, rewriteValue(value, rule.pattern, rule.replacement, at));
      return;
    }
    case 'delete': {
      if (rule.keepIfNonEmpty !== undefined && !isEmpty(value, rule.keepIfNonEmpty)) return;
      doc.delete(rule.path);
      return;
    }
    default: {
      const _exhaustive: never = rule;
      throw new Error(`unknown filter rule ${JSON.stringify(_exhaustive)}`);
    }
  }
}

// Strings are rewritten; numbers, booleans and nulls are left as they are.
function rewriteScalar(value: TreeValue, pattern: RegExp, replacement: string, at: string): TreeValue {
  if (typeof value === 'string') return value.replace(pattern, replacement);
  if (isTreeMap(value) || isTreeList(value)) throw new PolicyShapeError(at, 'scalar', kindOf(value));
  return value;
}

function rewriteValue(value: TreeValue, pattern: RegExp, replacement: string, at: string): TreeValue {
  if (isTreeMap(value)) throw new PolicyShapeError(at, 'scalar or list of scalars', kindOf(value));
  if (!isTreeList(value)) return rewriteScalar(value, pattern, replacement, at);
  return value.map((item, i) => rewriteScalar(item, pattern, replacement, `${at}[${i}]`));
}

/**
 * null, {} and [] are empty; so is a list holding nothing but ignorable
 * scalars (e.g. `namespaces: [default]`).
 */
export function isEmpty(value: TreeValue, ignore: readonly Scalar[] = []): boolean {
  if (value === null) return true;
  if (isTreeMap(value)) return value.size === 0;
  if (isTreeList(value)) {
    return value.every((item) => !isTreeMap(item) && !isTreeList(item) && ignore.includes(item));
  }
  return false;
}
