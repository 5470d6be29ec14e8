import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeAll, beforeEach, describe, it, expect } from 'vitest';
import { setLogLevel } from '../src/logger.js';
import { canonicalPolicyString } from '../src/policy/canonical.js';
import { PolicyTester } from '../src/runner/tester.js';
import type { PolicySource } from '../src/runner/source.js';

class MemoryPolicySource implements PolicySource {
  readonly requested: string[] = [];

  constructor(private readonly policies: Record<string, string>) {}

  async downloadPolicy(policyId: string): Promise<Uint8Array> {
    this.requested.push(policyId);
    const policy = this.policies[policyId];
    if (policy === undefined) throw new Error(`policy ${policyId} not found`);
    return new TextEncoder().encode(policy);
  }
}

const POLICY = [
  'id: 5d2a0c1e-aaaa',
  'revision: 4',
  'inputs:',
  '  - id: logfile-1',
  '    name: app-3',
  '    type: logfile',
  '',
].join('\n');

describe('PolicyTester', () => {
  let dir: string;

  beforeAll(() => {
    setLogLevel('error');
  });

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'policy-tester-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  const write = (name: string, content: string) => fs.writeFile(path.join(dir, name), content, 'utf8');
  const tester = (source: PolicySource, generateTestResult = false) =>
    new PolicyTester({ testFolder: { path: dir, package: 'app', dataStream: 'logs' }, source, generateTestResult });

  it('writes canonical fixtures in generate mode', async () => {
    await write('test-app.yml', '');
    const results = await tester(new MemoryPolicySource({ 'test-app': POLICY }), true).run();

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ name: 'test-app', package: 'app', dataStream: 'logs' });
    expect(results[0].errorMsg).toBeUndefined();
    expect(await fs.readFile(path.join(dir, 'test-app.expected'), 'utf8')).toBe(canonicalPolicyString(POLICY));
  });

  it('passes when the found policy matches the fixture', async () => {
    await write('test-app.yml', '');
    await write('test-app.expected', canonicalPolicyString(POLICY));
    const reinstalled = POLICY.replace('5d2a0c1e-aaaa', '7f7f7f7f-bbbb').replace('app-3', 'app-41');

    const [result] = await tester(new MemoryPolicySource({ 'test-app': reinstalled })).run();
    expect(result.failureMsg).toBeUndefined();
    expect(result.errorMsg).toBeUndefined();
    expect(result.timeElapsedMs).toBeGreaterThanOrEqual(0);
  });

  it('fails with the diff when the policy differs', async () => {
    await write('test-app.yml', '');
    await write('test-app.expected', canonicalPolicyString(POLICY));
    const changed = POLICY.replace('type: logfile', 'type: filestream');

    const [result] = await tester(new MemoryPolicySource({ 'test-app': changed })).run();
    expect(result.failureMsg).toBe('unexpected content in policy');
    expect(result.failureDetails?.startsWith('--- want\n+++ got\n')).toBe(true);
    expect(result.failureDetails).toMatch(/^\+\s+type: filestream$/m);
    expect(result.errorMsg).toBeUndefined();
  });

  it('downloads the configured policy id', async () => {
    await write('test-app.yml', 'policy_id: shared\n');
    const source = new MemoryPolicySource({ shared: POLICY });
    await tester(source, true).run();
    expect(source.requested).toEqual(['shared']);
  });

  it('skips without downloading', async () => {
    await write('test-app.yml', 'skip:\n  reason: waiting on a fix\n  link: https://example.test/issues/4\n');
    const source = new MemoryPolicySource({});
    const [result] = await tester(source).run();
    expect(result.skipped).toEqual({ reason: 'waiting on a fix', link: 'https://example.test/issues/4' });
    expect(source.requested).toEqual([]);
  });

  it('keeps going after a case errors', async () => {
    await write('test-a.yml', '');
    await write('test-b.yml', '');
    await write('test-b.expected', canonicalPolicyString(POLICY));
    const results = await tester(new MemoryPolicySource({ 'test-a': POLICY, 'test-b': POLICY })).run();

    expect(results.map((r) => r.name)).toEqual(['test-a', 'test-b']);
    expect(results[0].errorMsg).toMatch(/^failed to read expected policy .*test-a\.expected: /);
    expect(results[1].errorMsg).toBeUndefined();
    expect(results[1].failureMsg).toBeUndefined();
  });

  it('reports a download error', async () => {
    await write('test-app.yml', '');
    const [result] = await tester(new MemoryPolicySource({})).run();
    expect(result.errorMsg).toBe('policy test-app not found');
  });

  it('fails when the folder cannot be listed', async () => {
    const missing = new PolicyTester({ testFolder: { path: path.join(dir, 'nope') }, source: new MemoryPolicySource({}) });
    await expect(missing.run()).rejects.toThrow('failed to look for test files in');
  });
});
