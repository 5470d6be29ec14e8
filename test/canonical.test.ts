import fs from 'node:fs';
import { describe, it, expect } from 'vitest';
import { canonicalPolicyBytes, canonicalPolicyString } from '../src/policy/canonical.js';
import { PERMISSIONS_PLACEHOLDER_KEY } from '../src/policy/rules.js';
import { parseTree } from '../src/tree/index.js';

const fixture = (name: string) => fs.readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8');

const found = fixture('nginx-found.yml');
const reinstalled = fixture('nginx-reinstalled.yml');

describe('canonicalPolicyString', () => {
  it('is idempotent', () => {
    const once = canonicalPolicyString(found);
    expect(canonicalPolicyString(once)).toBe(once);
  });

  it('ignores ids, revisions, deployment details and component numbering', () => {
    expect(canonicalPolicyString(reinstalled)).toBe(canonicalPolicyString(found));
  });

  it('drops the fields that change between installations', () => {
    const doc = parseTree(canonicalPolicyString(found));
    for (const path of ['id', 'revision', 'agent', 'fleet', 'outputs', 'signed', 'namespaces']) {
      expect(doc.get(path)).toEqual({ found: false });
    }
    expect(doc.get('inputs')).toMatchObject({ found: true });
    expect(doc.get(`output_permissions.default.${PERMISSIONS_PLACEHOLDER_KEY}`)).toMatchObject({ found: true });
    expect(doc.get('secret_references')).toEqual({ found: true, value: [new Map()] });
  });

  it('cleans each input', () => {
    const doc = parseTree(canonicalPolicyString(reinstalled));
    const inputs = doc.get('inputs');
    expect(inputs.found).toBe(true);
    const [input] = inputs.found && Array.isArray(inputs.value) ? inputs.value : [];
    expect(input).toBeInstanceOf(Map);
    expect(input instanceof Map ? [...input.keys()] : []).toEqual([
      'data_stream',
      'meta',
      'name',
      'streams',
      'type',
      'use_output',
    ]);
    expect(input instanceof Map ? input.get('name') : undefined).toBe('nginx');
    expect(input instanceof Map ? input.get('meta') : undefined).toEqual(
      new Map([['package', new Map([['name', 'nginx']])]]),
    );
  });

  it('normalizes exporter endpoints and component ids', () => {
    const policy = [
      'id: 0c5c4c1f-aaaa',
      'revision: 2',
      'exporters:',
      '  elasticsearch/6f1b4f0e-1234:',
      '    endpoints:',
      '      - https://10.0.0.5:9200',
      '',
    ].join('\n');
    expect(canonicalPolicyString(policy)).toBe(
      'exporters:\n    elasticsearch/componentid-0:\n        endpoints:\n            - https://elasticsearch:9200\n',
    );
  });

  it('normalizes every endpoint of every exporter', () => {
    const policy = [
      'exporters:',
      '  elasticsearch/aa11bb22:',
      '    endpoints:',
      '      - https://10.0.0.5:9200',
      '      - https://10.0.0.6:9200',
      '  elasticsearch/cc33dd44:',
      '    endpoints:',
      '      - http://localhost:9200',
      '',
    ].join('\n');
    expect(canonicalPolicyString(policy)).toBe(
      [
        'exporters:',
        '    elasticsearch/componentid-0:',
        '        endpoints:',
        '            - https://elasticsearch:9200',
        '            - https://elasticsearch:9200',
        '    elasticsearch/componentid-1:',
        '        endpoints:',
        '            - https://elasticsearch:9200',
        '',
      ].join('\n'),
    );
  });

  it('leaves a numeric input name alone', () => {
    const doc = parseTree(canonicalPolicyString('inputs:\n  - name: 2024\n    type: logfile\n'));
    expect(doc.get('inputs')).toEqual({
      found: true,
      value: [new Map<string, string | number>([['name', 2024], ['type', 'logfile']])],
    });
  });

  it('keeps large integers exact', () => {
    expect(canonicalPolicyString('limit: 12345678901234567891\n')).toBe('limit: 12345678901234567891\n');
  });

  it('keeps namespaces other than the default one', () => {
    expect(canonicalPolicyString('namespaces:\n  - default\n')).toBe('{}\n');
    expect(canonicalPolicyString('namespaces:\n  - team-a\n')).toBe('namespaces:\n    - team-a\n');
  });

  it('is sensitive to meaningful changes', () => {
    const changed = found.replace('/var/log/nginx/access.log*', '/var/log/nginx/custom.log*');
    expect(changed).not.toBe(found);
    expect(canonicalPolicyString(changed)).not.toBe(canonicalPolicyString(found));
  });

  it('accepts bytes', () => {
    const bytes = canonicalPolicyBytes(new TextEncoder().encode('b: 1\na: 2\n'));
    expect(new TextDecoder().decode(bytes)).toBe('a: 2\nb: 1\n');
  });
});
