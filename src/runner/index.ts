/**
 * src/runner/index.ts
 * Barrel exports for the policy test runner.
 */

export { DirectoryPolicySource } from "./source.js";
export type { PolicySource } from "./source.js";

export {
  expectedPathFor,
  listTestCases,
  readTestCaseConfig,
  testNameFromPath,
} from "./testcase.js";

export {
  PolicyTester,
  assertExpectedPolicy,
  dumpExpectedPolicy,
} from "./tester.js";
export type { PolicyTesterOptions, TestFolder } from "./tester.js";
