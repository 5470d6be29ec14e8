import { structuredPatch } from 'diff';
import type { PolicyInput, PolicySide, RuleTable } from '../types/policy.js';
import { logger } from '../logger.js';
import { canonicalPolicyString } from './canonical.js';
import { PolicyComparisonError } from './errors.js';
import { POLICY_RULES } from './rules.js';

const DIFF_CONTEXT_LINES = 1;

function prepare(side: PolicySide, input: PolicyInput, rules: RuleTable): string {
  try {
    return canonicalPolicyString(input, rules);
  } catch (err) {
    throw new PolicyComparisonError(side, err);
  }
}

// difflib range notation: "3" for one line, "3,2" otherwise, "2,0" when empty
function formatRange(start: number, length: number): string {
  if (length === 1) return `${start}`;
  if (length === 0) return `${Math.max(start - 1, 0)},0`;
  return `${start},${length}`;
}

export function unifiedDiff(want: string, got: string, context = DIFF_CONTEXT_LINES): string {
  const patch = structuredPatch('want', 'got', want, got, undefined, undefined, { context });
  if (patch.hunks.length === 0) return '';

  const out = ['--- want', '+++ got'];
  for (const hunk of patch.hunks) {
    out.push(`@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`);
    out.push(...hunk.lines);
  }
  return `${out.join('\n')}\n`;
}

/**
 * Compare a golden policy with a downloaded one after canonicalizing both.
 * Returns "" when they match, or a unified diff (want → got) otherwise.
 * Throws PolicyComparisonError when either side cannot be canonicalized.
 */
export function comparePolicies(
  expected: PolicyInput,
  found: PolicyInput,
  rules: RuleTable = POLICY_RULES,
): string {
  const want = prepare('expected', expected, rules);
  const got = prepare('found', found, rules);
  logger.trace('expected policy after cleaning', { policy: want });
  logger.trace('found policy after cleaning', { policy: got });

  if (want === got) return '';
  return unifiedDiff(want, got);
}
