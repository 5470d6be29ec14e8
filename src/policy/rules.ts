import type { RuleTable } from '../types/policy.js';

export const PERMISSIONS_PLACEHOLDER_KEY = 'uuid-for-permissions-on-related-indices';

export const ELASTICSEARCH_ENDPOINT_PLACEHOLDER = 'https://elasticsearch:9200';

// Things that look like UUIDs.
const UUID_LIKE_KEY = /^[a-z0-9]{4,}(-[a-z0-9]{4,})+$/;

const rules: RuleTable = [
  // IDs are not relevant.
  { kind: 'delete', path: 'id' },
  {
    kind: 'recurse',
    path: 'inputs',
    rules: [
      { kind: 'delete', path: 'id' },
      { kind: 'delete', path: 'package_policy_id' },
      { kind: 'recurse', path: 'streams', rules: [{ kind: 'delete', path: 'id' }] },
    ],
  },
  { kind: 'recurse', path: 'secret_references', rules: [{ kind: 'delete', path: 'id' }] },

  // Avoid regenerating fixtures every time the package version changes.
  {
    kind: 'recurse',
    path: 'inputs',
    rules: [
      { kind: 'delete', path: 'meta.package.version' },
      { kind: 'delete', path: 'meta.package.release' },
      { kind: 'delete', path: 'meta.package.policy_template' },
    ],
  },

  { kind: 'delete', path: 'revision' },
  { kind: 'recurse', path: 'inputs', rules: [{ kind: 'delete', path: 'revision' }] },

  // Depend on the deployment.
  { kind: 'delete', path: 'agent' },
  { kind: 'delete', path: 'fleet' },
  { kind: 'delete', path: 'outputs' },

  // Signatures change from installation to installation.
  { kind: 'delete', path: 'agent.protection.uninstall_token_hash' },
  { kind: 'delete', path: 'agent.protection.signing_key' },
  { kind: 'delete', path: 'signed' },

  // Permissions are checked, but one entry is keyed by a random UUID.
  {
    kind: 'rename-keys',
    path: 'output_permissions.default',
    pattern: UUID_LIKE_KEY,
    replacement: PERMISSIONS_PLACEHOLDER_KEY,
  },

  // Older stacks don't emit namespaces.
  { kind: 'delete', path: 'namespaces', keepIfNonEmpty: ['default'] },

  // Set by Fleet on input packages since 9.1.0.
  {
    kind: 'recurse',
    path: 'inputs',
    rules: [
      {
        kind: 'recurse',
        path: 'streams',
        rules: [
          { kind: 'delete', path: 'data_stream.type' },
          { kind: 'delete', path: 'data_stream.elasticsearch.dynamic_dataset' },
          { kind: 'delete', path: 'data_stream.elasticsearch.dynamic_namespace' },
          { kind: 'delete', path: 'data_stream.elasticsearch', keepIfNonEmpty: [] },
        ],
      },
    ],
  },

  // Package policy names get a numeric suffix when created by the test runner.
  { kind: 'recurse', path: 'inputs', rules: [{ kind: 'rewrite', path: 'name', pattern: /(?:-\d+)+$/, replacement: '' }] },

  // Exporter endpoints point at whatever cluster the policy was created on.
  {
    kind: 'recurse-members',
    path: 'exporters',
    rules: [{ kind: 'rewrite', path: 'endpoints', pattern: /^[\s\S]*$/, replacement: ELASTICSEARCH_ENDPOINT_PLACEHOLDER }],
  },
];

/**
 * Fields of a downloaded agent policy that are not relevant for a package
 * test, or that are replaced by controlled values. Order matters: later rules
 * see the tree as left by earlier ones.
 */
export const POLICY_RULES: RuleTable = Object.freeze(rules);
