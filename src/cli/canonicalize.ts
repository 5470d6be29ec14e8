#!/usr/bin/env node
/**
 * src/cli/canonicalize.ts
 * Print (or write) the canonical form of a downloaded agent policy.
 *
 * Usage:
 *   tsx src/cli/canonicalize.ts --in policies/nginx.yml [--out test-nginx.expected]
 *
 * Exit code:
 *   0 = written
 *   2 = input could not be read or canonicalized
 */

import "dotenv/config";
import fs from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import { logger, serializeError } from "../logger.js";
import { canonicalPolicyString } from "../policy/canonical.js";
import { EXIT_ERROR } from "./report.js";

const program = new Command();
program
  .name("policy-canonicalize")
  .requiredOption("--in <file>", "agent policy YAML")
  .option("--out <file>", "write the canonical policy here instead of stdout");

program.parse(process.argv);
const opts = program.opts<{ in: string; out?: string }>();

async function main() {
  const input = await fs.readFile(path.resolve(opts.in));
  const canonical = canonicalPolicyString(input);

  if (opts.out) {
    const outPath = path.resolve(opts.out);
    await fs.mkdir(path.dirname(outPath), { recursive: true });
    await fs.writeFile(outPath, canonical, "utf8");
    logger.info("canonical policy written", { file: outPath });
    return;
  }
  process.stdout.write(canonical);
}

main().catch((e) => {
  logger.error("[canonicalize] failed", { error: serializeError(e) });
  process.exitCode = EXIT_ERROR;
});
