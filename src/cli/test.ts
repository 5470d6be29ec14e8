#!/usr/bin/env node
/**
 * src/cli/test.ts
 * Run the policy test cases of a folder against policies saved on disk.
 *
 * Usage:
 *   tsx src/cli/test.ts --cases data_stream/access/_dev/test/policy --found policies
 * Options:
 *   --generate          write .expected fixtures instead of asserting
 *                       (also POLICY_TEST_GENERATE=1)
 *   --package NAME      package name reported with each result
 *   --data-stream NAME  data stream reported with each result
 *
 * Exit code:
 *   0 = every case passed or was skipped
 *   1 = at least one case failed or errored
 */

import "dotenv/config";
import path from "node:path";
import { Command } from "commander";
import { loadConfig } from "../config.js";
import { logger, serializeError } from "../logger.js";
import { DirectoryPolicySource } from "../runner/source.js";
import { PolicyTester } from "../runner/tester.js";
import { EXIT_TESTS_FAILED, reportResults } from "./report.js";

const program = new Command();
program
  .name("policy-test")
  .requiredOption("--cases <dir>", "folder holding test-*.yml cases and .expected fixtures")
  .requiredOption("--found <dir>", "folder holding downloaded policies as <policy_id>.yml")
  .option("--generate", "write .expected fixtures instead of asserting")
  .option("--package <name>", "package name reported with each result")
  .option("--data-stream <name>", "data stream reported with each result");

program.parse(process.argv);
const opts = program.opts<{
  cases: string;
  found: string;
  generate?: boolean;
  package?: string;
  dataStream?: string;
}>();

async function main() {
  const config = loadConfig();
  const tester = new PolicyTester({
    testFolder: {
      path: path.resolve(opts.cases),
      package: opts.package,
      dataStream: opts.dataStream,
    },
    source: new DirectoryPolicySource(path.resolve(opts.found)),
    generateTestResult: opts.generate ?? config.generate,
  });

  const results = await tester.run();
  process.exitCode = reportResults(results, process.stdout);
}

main().catch((e) => {
  logger.error("[policy-test] failed", { error: serializeError(e) });
  process.exitCode = EXIT_TESTS_FAILED;
});
