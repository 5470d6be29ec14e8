/**
 * src/runner/testcase.ts
 * Discovery and loading of `test-*.yml` policy test cases.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { EXPECTED_SUFFIX } from "../config.js";
import { PolicyError } from "../policy/errors.js";
import { formatSchemaErrors, validateTestCase } from "../schema/index.js";
import type { PolicyTestCaseConfig } from "../types/testcase.js";

const TEST_CASE_RE = /^test-.*\.yml$/;

/** List `test-*.yml` files directly inside `dir`, sorted. */
export async function listTestCases(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && TEST_CASE_RE.test(e.name))
    .map((e) => path.join(dir, e.name))
    .sort();
}

export async function readTestCaseConfig(casePath: string): Promise<PolicyTestCaseConfig> {
  const raw = await fs.readFile(casePath, "utf8");
  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw new PolicyError(`failed to read test config from ${casePath}`, { cause: err });
  }

  // an empty file is a case with every default
  const config = parsed ?? {};
  if (!validateTestCase(config)) {
    throw new PolicyError(
      `invalid test config ${casePath}: ${formatSchemaErrors(validateTestCase.errors)}`,
    );
  }
  return config;
}

/** test-foo.yml → test-foo */
export function testNameFromPath(casePath: string): string {
  return path.basename(casePath, path.extname(casePath));
}

/** test-foo.yml → test-foo.expected, in the same directory */
export function expectedPathFor(casePath: string): string {
  const ext = path.extname(casePath);
  return casePath.slice(0, casePath.length - ext.length) + EXPECTED_SUFFIX;
}
