/**
 * src/config.ts
 * Runtime settings from the environment. CLI entry points load `.env`
 * through dotenv before anything reads process.env; flags given on the
 * command line win over these values.
 *
 *   LOG_LEVEL              error|warn|info|debug|trace (default: info)
 *   POLICY_TEST_GENERATE   1|true|yes to write fixtures instead of asserting
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface Config {
  logLevel: LogLevel;
  generate: boolean;
}

/** Golden fixtures sit next to their test case: test-foo.yml → test-foo.expected */
export const EXPECTED_SUFFIX = '.expected';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

export function parseLogLevel(raw: string | undefined): LogLevel {
  const wanted = (raw || 'info').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? 'info';
}

export function parseFlag(raw: string | undefined): boolean {
  return ['1', 'true', 'yes'].includes((raw || '').trim().toLowerCase());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    generate: parseFlag(env.POLICY_TEST_GENERATE),
  };
}
