/**
 * fleet-policy-check
 * Canonicalize Elastic Agent policies and diff them against golden fixtures.
 */

export * from "./tree/index.js";
export * from "./policy/index.js";
export * from "./runner/index.js";

export { EXPECTED_SUFFIX, loadConfig, parseFlag, parseLogLevel } from "./config.js";
export type { Config, LogLevel } from "./config.js";
export { logger, serializeError, setLogLevel } from "./logger.js";
export { compareKeys, sortTree } from "./utils/canonical.js";

export type * from "./types/policy.js";
export type * from "./types/testcase.js";
