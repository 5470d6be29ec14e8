/**
 * src/runner/tester.ts
 * Runs the policy test cases of one test folder.
 *
 * For each `test-*.yml` case the found policy is fetched from a PolicySource
 * and either compared with the checked-in `.expected` fixture, or, in
 * generate mode, canonicalized and written as the new fixture.
 */

import fs from "node:fs/promises";
import { logger, serializeError } from "../logger.js";
import { canonicalPolicyString } from "../policy/canonical.js";
import { comparePolicies } from "../policy/compare.js";
import { PolicyError, TestCaseFailedError, describeError } from "../policy/errors.js";
import { POLICY_RULES } from "../policy/rules.js";
import type { RuleTable } from "../types/policy.js";
import type { PolicyTestResult, SkipConfig } from "../types/testcase.js";
import type { PolicySource } from "./source.js";
import {
  expectedPathFor,
  listTestCases,
  readTestCaseConfig,
  testNameFromPath,
} from "./testcase.js";

export interface TestFolder {
  path: string;
  package?: string;
  dataStream?: string;
}

export interface PolicyTesterOptions {
  testFolder: TestFolder;
  source: PolicySource;
  generateTestResult?: boolean;
  rules?: RuleTable;
}

/** Accumulates one test result, the way a test case finishes decides its fields. */
class ResultComposer {
  private readonly start = process.hrtime.bigint();

  constructor(private readonly result: PolicyTestResult) {}

  private finish(): PolicyTestResult {
    const elapsed = Number(process.hrtime.bigint() - this.start) / 1_000_000;
    return { ...this.result, timeElapsedMs: Math.round(elapsed * 100) / 100 };
  }

  withSuccess(): PolicyTestResult {
    return this.finish();
  }

  withSkip(skip: SkipConfig): PolicyTestResult {
    return { ...this.finish(), skipped: skip };
  }

  withError(err: unknown): PolicyTestResult {
    if (err instanceof TestCaseFailedError) {
      return { ...this.finish(), failureMsg: err.message, failureDetails: err.details };
    }
    return { ...this.finish(), errorMsg: describeError(err) };
  }
}

export async function dumpExpectedPolicy(
  source: PolicySource,
  casePath: string,
  policyId: string,
  rules: RuleTable = POLICY_RULES,
): Promise<string> {
  const policy = await source.downloadPolicy(policyId);
  let canonical: string;
  try {
    canonical = canonicalPolicyString(policy, rules);
  } catch (err) {
    throw new PolicyError("failed to prepare policy to store", { cause: err });
  }
  const target = expectedPathFor(casePath);
  await fs.writeFile(target, canonical, "utf8");
  return target;
}

export async function assertExpectedPolicy(
  source: PolicySource,
  casePath: string,
  policyId: string,
  rules: RuleTable = POLICY_RULES,
): Promise<void> {
  const policy = await source.downloadPolicy(policyId);
  const expectedPath = expectedPathFor(casePath);
  let expected: Buffer;
  try {
    expected = await fs.readFile(expectedPath);
  } catch (err) {
    throw new PolicyError(`failed to read expected policy ${expectedPath}`, { cause: err });
  }

  const diff = comparePolicies(expected, policy, rules);
  if (diff.length > 0) {
    throw new TestCaseFailedError("unexpected content in policy", diff);
  }
}

export class PolicyTester {
  private readonly rules: RuleTable;

  constructor(private readonly options: PolicyTesterOptions) {
    this.rules = options.rules ?? POLICY_RULES;
  }

  async run(): Promise<PolicyTestResult[]> {
    const { testFolder } = this.options;
    let cases: string[];
    try {
      cases = await listTestCases(testFolder.path);
    } catch (err) {
      throw new PolicyError(`failed to look for test files in ${testFolder.path}`, { cause: err });
    }

    const results: PolicyTestResult[] = [];
    for (const casePath of cases) {
      const result = await this.runTest(casePath);
      if (result.errorMsg) {
        logger.error("policy test errored", { test: result.name, error: result.errorMsg });
      }
      results.push(result);
    }
    return results;
  }

  async runTest(casePath: string): Promise<PolicyTestResult> {
    const { testFolder, source, generateTestResult } = this.options;
    const name = testNameFromPath(casePath);
    const result = new ResultComposer({
      name,
      package: testFolder.package,
      dataStream: testFolder.dataStream,
      timeElapsedMs: 0,
    });

    try {
      const config = await readTestCaseConfig(casePath);
      if (config.skip) {
        logger.info("skipping policy test", { test: name, reason: config.skip.reason });
        return result.withSkip(config.skip);
      }

      const policyId = config.policy_id ?? name;
      if (generateTestResult) {
        const written = await dumpExpectedPolicy(source, casePath, policyId, this.rules);
        logger.info("wrote expected policy", { test: name, file: written });
      } else {
        await assertExpectedPolicy(source, casePath, policyId, this.rules);
      }
      return result.withSuccess();
    } catch (err) {
      logger.debug("policy test did not pass", { test: name, error: serializeError(err) });
      return result.withError(err);
    }
  }
}
