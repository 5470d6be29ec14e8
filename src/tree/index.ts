/**
 * src/tree/index.ts
 * Barrel exports for the policy tree (model + YAML codec).
 */

export {
  TreeDocument,
  cloneTree,
  isTreeList,
  isTreeMap,
  kindOf,
} from "./model.js";

export {
  MAX_ALIAS_NODES,
  decodePolicyText,
  parseTree,
  serializeTree,
} from "./yaml.js";
