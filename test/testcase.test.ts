import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { formatSchemaErrors, validateTestCase } from '../src/schema/index.js';
import {
  expectedPathFor,
  listTestCases,
  readTestCaseConfig,
  testNameFromPath,
} from '../src/runner/testcase.js';
import { DirectoryPolicySource } from '../src/runner/source.js';

describe('test case schema', () => {
  it('accepts the known fields and extra top-level keys', () => {
    expect(
      validateTestCase({
        policy_id: 'nginx',
        input: 'logfile',
        vars: { paths: ['/tmp/x.log'] },
        data_stream: { vars: { preserve_original_event: true } },
        skip: { reason: 'flaky', link: 'https://example.test/issues/1' },
        description: 'extra keys are allowed',
      }),
    ).toBe(true);
  });

  it('rejects unknown keys under skip', () => {
    expect(validateTestCase({ skip: { reason: 'x', until: 'never' } })).toBe(false);
    expect(formatSchemaErrors(validateTestCase.errors)).toBe('/skip must NOT have additional properties');
  });
});

describe('test case files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'policy-cases-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('lists test-*.yml files in order', async () => {
    await fs.writeFile(path.join(dir, 'test-b.yml'), '');
    await fs.writeFile(path.join(dir, 'test-a.yml'), '');
    await fs.writeFile(path.join(dir, 'test-a.expected'), '');
    await fs.writeFile(path.join(dir, 'other.yml'), '');
    expect(await listTestCases(dir)).toEqual([path.join(dir, 'test-a.yml'), path.join(dir, 'test-b.yml')]);
  });

  it('reads an empty file as all defaults', async () => {
    const file = path.join(dir, 'test-empty.yml');
    await fs.writeFile(file, '');
    expect(await readTestCaseConfig(file)).toEqual({});
  });

  it('reads skip settings', async () => {
    const file = path.join(dir, 'test-skip.yml');
    await fs.writeFile(file, 'skip:\n  reason: upstream bug\n  link: https://example.test/issues/2\n');
    expect(await readTestCaseConfig(file)).toEqual({
      skip: { reason: 'upstream bug', link: 'https://example.test/issues/2' },
    });
  });

  it('rejects an invalid case file', async () => {
    const file = path.join(dir, 'test-bad.yml');
    await fs.writeFile(file, 'skip:\n  link: https://example.test/issues/3\n');
    await expect(readTestCaseConfig(file)).rejects.toThrow(
      `invalid test config ${file}: /skip must have required property 'reason'`,
    );
  });

  it('derives names and fixture paths', () => {
    expect(testNameFromPath('/cases/test-nginx.yml')).toBe('test-nginx');
    expect(expectedPathFor('/cases/test-nginx.yml')).toBe('/cases/test-nginx.expected');
  });

  it('reads saved policies by id', async () => {
    await fs.writeFile(path.join(dir, 'nginx.yml'), 'a: b\n');
    const source = new DirectoryPolicySource(dir);
    expect(new TextDecoder().decode(await source.downloadPolicy('nginx'))).toBe('a: b\n');
    await expect(source.downloadPolicy('missing')).rejects.toThrow(
      `failed to download policy "missing" from ${path.join(dir, 'missing.yml')}`,
    );
  });
});
