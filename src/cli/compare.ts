#!/usr/bin/env node
/**
 * src/cli/compare.ts
 * Compare an expected policy fixture with a downloaded policy.
 *
 * Usage:
 *   tsx src/cli/compare.ts --expected test-nginx.expected --found policies/nginx.yml
 *
 * Exit code:
 *   0 = equal after canonicalization
 *   3 = different, unified diff (want → got) on stdout
 *   2 = either side could not be read or canonicalized
 */

import "dotenv/config";
import { Command } from "commander";
import { logger, serializeError } from "../logger.js";
import { EXIT_ERROR, EXIT_OK, compareFiles } from "./report.js";

const program = new Command();
program
  .name("policy-compare")
  .requiredOption("--expected <file>", "expected policy (usually a .expected fixture)")
  .requiredOption("--found <file>", "policy as downloaded");

program.parse(process.argv);
const opts = program.opts<{ expected: string; found: string }>();

async function main() {
  const code = await compareFiles(opts.expected, opts.found, process.stdout);
  if (code === EXIT_OK) logger.info("policies are equal");
  process.exitCode = code;
}

main().catch((e) => {
  logger.error("[compare] failed", { error: serializeError(e) });
  process.exitCode = EXIT_ERROR;
});
