import type { PolicyInput, RuleTable } from '../types/policy.js';
import { parseTree, serializeTree } from '../tree/index.js';
import { canonicalizeComponentIds } from './components.js';
import { applyFilterRules } from './filter.js';
import { POLICY_RULES } from './rules.js';

/**
 * Reduce a downloaded agent policy to the form stored in `.expected` fixtures:
 * component ids renumbered, irrelevant fields dropped, volatile values
 * replaced, keys sorted.
 *
 * Two policies that only differ in generated noise produce the same string,
 * and canonicalizing the output again returns it unchanged.
 */
export function canonicalPolicyString(input: PolicyInput, rules: RuleTable = POLICY_RULES): string {
  const doc = parseTree(input);
  canonicalizeComponentIds(doc);
  return serializeTree(applyFilterRules(doc, rules));
}

export function canonicalPolicyBytes(input: PolicyInput, rules: RuleTable = POLICY_RULES): Uint8Array {
  return new TextEncoder().encode(canonicalPolicyString(input, rules));
}
