import { describe, it, expect } from 'vitest';
import { loadConfig, parseFlag, parseLogLevel } from '../src/config.js';

describe('loadConfig', () => {
  it('defaults to info and assert mode', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'info', generate: false });
  });

  it('reads LOG_LEVEL and POLICY_TEST_GENERATE', () => {
    expect(loadConfig({ LOG_LEVEL: 'DEBUG', POLICY_TEST_GENERATE: 'true' })).toEqual({
      logLevel: 'debug',
      generate: true,
    });
  });

  it('falls back on unknown values', () => {
    expect(parseLogLevel('verbose')).toBe('info');
    expect(parseFlag('0')).toBe(false);
    expect(parseFlag(' yes ')).toBe(true);
  });
});
