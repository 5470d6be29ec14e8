/**
 * src/policy/components.ts
 * Stable names for OpenTelemetry collector components embedded in a policy.
 *
 * Fleet names each component `<type>/<instance>` where the instance part is
 * random per installation:
 *
 *   receivers:
 *     httpcheck/b0f518d6-4e2d-4c5d-bda7-f9808df537b7: ...
 *   service:
 *     pipelines:
 *       logs:
 *         receivers:
 *           - httpcheck/b0f518d6-4e2d-4c5d-bda7-f9808df537b7
 *
 * Within a section the N-th component of a type (declaration order) becomes
 * `<type>/componentid-N`, and every reference to it is rewritten. References
 * are matched as whole strings, never as substrings.
 */

import type {
  ComponentIdentities,
  ComponentSection,
  IdentityMap,
  TreeList,
  TreeMap,
  TreeValue,
} from '../types/policy.js';
import { TreeDocument, isTreeList, isTreeMap, kindOf } from '../tree/index.js';
import { PolicyShapeError } from './errors.js';

export const COMPONENT_SECTIONS = [
  'extensions',
  'receivers',
  'processors',
  'connectors',
  'exporters',
] as const;

const PIPELINES_PATH = 'service.pipelines';

export const COMPONENT_ID_PREFIX = 'componentid-';

/** Where a reference inside `service` points to, in lookup order. */
const PIPELINE_SLOTS: Record<string, readonly ComponentSection[]> = {
  receivers: ['receivers', 'connectors'],
  processors: ['processors'],
  exporters: ['exporters', 'connectors'],
};

/** `type` of a `type/instance` key, or null for plain keys such as `forward`. */
export function componentType(key: string): string | null {
  const idx = key.indexOf('/');
  return idx > 0 ? key.slice(0, idx) : null;
}

function renameComponents(section: TreeMap): { renamed: TreeMap; identities: IdentityMap } {
  const counters = new Map<string, number>();
  const identities: IdentityMap = new Map();
  const renamed: TreeMap = new Map();

  for (const [key, value] of section) {
    const type = componentType(key);
    if (type === null) {
      renamed.set(key, value);
      continue;
    }
    const n = counters.get(type) ?? 0;
    counters.set(type, n + 1);
    const id = `${type}/${COMPONENT_ID_PREFIX}${n}`;
    identities.set(key, id);
    renamed.set(id, value);
  }

  return { renamed, identities };
}

function sectionMap(doc: TreeDocument, path: string): TreeMap | null {
  const lookup = doc.get(path);
  if (!lookup.found || lookup.value === null) return null;
  if (!isTreeMap(lookup.value)) {
    throw new PolicyShapeError(path, 'map', kindOf(lookup.value));
  }
  return lookup.value;
}

/**
 * Ids that resolve to the same canonical id in every section they appear in.
 * An id such as `otlp/default` can name both a receiver and an exporter; it
 * is left out when the two got different numbers.
 */
function unambiguousIdentities(identities: ComponentIdentities): IdentityMap {
  const merged: IdentityMap = new Map();
  const conflicting = new Set<string>();
  for (const map of identities.values()) {
    for (const [original, canonical] of map) {
      const seen = merged.get(original);
      if (seen !== undefined && seen !== canonical) conflicting.add(original);
      merged.set(original, canonical);
    }
  }
  for (const original of conflicting) merged.delete(original);
  return merged;
}

type Resolver = (value: string) => string;

function resolverFor(identities: ComponentIdentities, sections: readonly ComponentSection[]): Resolver {
  return (value) => {
    for (const section of sections) {
      const canonical = identities.get(section)?.get(value);
      if (canonical !== undefined) return canonical;
    }
    return value;
  };
}

function rewriteReferenceList(list: TreeList, resolve: Resolver): void {
  for (let i = 0; i < list.length; i++) {
    const item = list[i];
    if (typeof item === 'string') list[i] = resolve(item);
  }
}

/** Reference lists that live at a known place under `service`. */
function referenceSlots(doc: TreeDocument, identities: ComponentIdentities): Map<TreeList, Resolver> {
  const slots = new Map<TreeList, Resolver>();

  const extensions = doc.get('service.extensions');
  if (extensions.found && extensions.value !== null) {
    if (!isTreeList(extensions.value)) {
      throw new PolicyShapeError('service.extensions', 'list', kindOf(extensions.value));
    }
    slots.set(extensions.value, resolverFor(identities, ['extensions']));
  }

  const pipelines = sectionMap(doc, PIPELINES_PATH);
  if (pipelines === null) return slots;

  for (const [name, pipeline] of pipelines) {
    if (pipeline === null) continue;
    if (!isTreeMap(pipeline)) {
      throw new PolicyShapeError(`${PIPELINES_PATH}.${name}`, 'map', kindOf(pipeline));
    }
    for (const [slot, sections] of Object.entries(PIPELINE_SLOTS)) {
      const refs = pipeline.get(slot);
      if (refs === undefined || refs === null) continue;
      if (!isTreeList(refs)) {
        throw new PolicyShapeError(`${PIPELINES_PATH}.${name}.${slot}`, 'list', kindOf(refs));
      }
      slots.set(refs, resolverFor(identities, sections));
    }
  }
  return slots;
}

function rewriteEverywhere(value: TreeValue, slots: Map<TreeList, Resolver>, fallback: Resolver): TreeValue {
  if (typeof value === 'string') return fallback(value);
  if (isTreeList(value)) {
    const resolve = slots.get(value);
    if (resolve !== undefined) {
      rewriteReferenceList(value, resolve);
      return value;
    }
    for (let i = 0; i < value.length; i++) value[i] = rewriteEverywhere(value[i], slots, fallback);
    return value;
  }
  if (isTreeMap(value)) {
    for (const [key, child] of value) value.set(key, rewriteEverywhere(child, slots, fallback));
  }
  return value;
}

/**
 * Renames component ids in place and rewrites their references.
 * Returns the identity maps that were applied, per section.
 */
export function canonicalizeComponentIds(doc: TreeDocument): ComponentIdentities {
  const identities: ComponentIdentities = new Map();

  for (const section of COMPONENT_SECTIONS) {
    const map = sectionMap(doc, section);
    if (map === null) continue;
    const { renamed, identities: ids } = renameComponents(map);
    doc.put(section, renamed);
    identities.set(section, ids);
  }

  const pipelines = sectionMap(doc, PIPELINES_PATH);
  if (pipelines !== null) {
    const { renamed, identities: ids } = renameComponents(pipelines);
    doc.put(PIPELINES_PATH, renamed);
    identities.set('pipelines', ids);
  }

  // Known slots resolve per section; any other string (e.g. a routing
  // connector listing pipelines) only when its id is unambiguous.
  const slots = referenceSlots(doc, identities);
  const global = unambiguousIdentities(identities);
  rewriteEverywhere(doc.root, slots, (value) => global.get(value) ?? value);

  return identities;
}
