/**
 * src/cli/report.ts
 * What the CLIs print and the exit codes they end with. The entry points set
 * `process.exitCode` from these and return, so output written to a pipe is
 * not cut short.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { comparePolicies } from "../policy/compare.js";
import type { PolicyTestResult } from "../types/testcase.js";

export interface Output {
  write(chunk: string): unknown;
}

export const EXIT_OK = 0;
export const EXIT_TESTS_FAILED = 1;
export const EXIT_ERROR = 2;
export const EXIT_DIFFERENT = 3;

/** Writes the diff (if any) to `out` and returns the exit code. */
export async function compareFiles(expectedPath: string, foundPath: string, out: Output): Promise<number> {
  const [expected, found] = await Promise.all([
    fs.readFile(path.resolve(expectedPath)),
    fs.readFile(path.resolve(foundPath)),
  ]);

  const diff = comparePolicies(expected, found);
  if (diff.length === 0) return EXIT_OK;
  out.write(diff);
  return EXIT_DIFFERENT;
}

function statusOf(result: PolicyTestResult): string {
  if (result.skipped) return "SKIP";
  if (result.failureMsg) return "FAIL";
  if (result.errorMsg) return "ERROR";
  return "PASS";
}

export function reportResults(results: PolicyTestResult[], out: Output): number {
  let broken = 0;
  for (const result of results) {
    const status = statusOf(result);
    if (status === "FAIL" || status === "ERROR") broken++;
    out.write(`${status.padEnd(5)} ${result.name} (${result.timeElapsedMs}ms)\n`);
    if (result.skipped) out.write(`      ${result.skipped.reason}\n`);
    if (result.failureMsg) out.write(`      ${result.failureMsg}\n${result.failureDetails ?? ""}`);
    if (result.errorMsg) out.write(`      ${result.errorMsg}\n`);
  }
  out.write(`${results.length} case(s), ${broken} failed\n`);
  return broken > 0 ? EXIT_TESTS_FAILED : EXIT_OK;
}
