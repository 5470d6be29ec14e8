// bigint only for integers a number cannot hold exactly
export type Scalar = string | number | bigint | boolean | null;

// ---- Parsed policy tree ----
export type TreeValue = Scalar | TreeList | TreeMap;

export interface TreeList extends Array<TreeValue> {}

// Map keeps source order for every key, including integer-like ones.
export interface TreeMap extends Map<string, TreeValue> {}

export type TreeKind = 'map' | 'list' | 'string' | 'number' | 'boolean' | 'null';

export type Lookup = { found: true; value: TreeValue } | { found: false };

// ---- Filter rules ----
export type FilterRule =
  | DeleteRule
  | RecurseRule
  | RecurseMembersRule
  | RenameKeysRule
  | RewriteRule;

export interface DeleteRule {
  kind: 'delete';
  path: string;
  /**
   * When present, the field is only deleted if it is empty once these
   * scalars are disregarded. An empty list means "only if empty".
   */
  keepIfNonEmpty?: readonly Scalar[];
}

/** Applies `rules` to a copy of every element of the list at `path`. */
export interface RecurseRule {
  kind: 'recurse';
  path: string;
  rules: RuleTable;
}

/** Applies `rules` to a copy of every member value of the map at `path`. */
export interface RecurseMembersRule {
  kind: 'recurse-members';
  path: string;
  rules: RuleTable;
}

export interface RenameKeysRule {
  kind: 'rename-keys';
  path: string;
  pattern: RegExp;
  replacement: string;
}

export interface RewriteRule {
  kind: 'rewrite';
  path: string;
  pattern: RegExp;
  replacement: string;
}

export type RuleTable = readonly Readonly<FilterRule>[];

// ---- Pipeline component identities ----
export type ComponentSection =
  | 'extensions'
  | 'receivers'
  | 'processors'
  | 'connectors'
  | 'exporters'
  | 'pipelines';

/** original id (e.g. `batch/8ec6...`) → canonical id (e.g. `batch/componentid-1`) */
export type IdentityMap = Map<string, string>;

export type ComponentIdentities = Map<ComponentSection, IdentityMap>;

export type PolicySide = 'expected' | 'found';

export type PolicyInput = string | Uint8Array;
