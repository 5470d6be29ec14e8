/**
 * src/policy/index.ts
 * Barrel exports for policy canonicalization and comparison.
 */

export {
  COMPONENT_ID_PREFIX,
  COMPONENT_SECTIONS,
  canonicalizeComponentIds,
  componentType,
} from "./components.js";

export { applyFilterRules, isEmpty } from "./filter.js";

export {
  ELASTICSEARCH_ENDPOINT_PLACEHOLDER,
  PERMISSIONS_PLACEHOLDER_KEY,
  POLICY_RULES,
} from "./rules.js";

export { canonicalPolicyBytes, canonicalPolicyString } from "./canonical.js";

export { comparePolicies, unifiedDiff } from "./compare.js";

export {
  PolicyComparisonError,
  PolicyDecodeError,
  PolicyError,
  PolicyShapeError,
  TestCaseFailedError,
  describeError,
} from "./errors.js";
