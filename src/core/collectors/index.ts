/**
 * Collectors module
 */

export {
  CollectorRegistry,
  BUNDLED_COLLECTORS,
  createDefaultRegistry,
} from "./registry.js";

export { defineCollector, tagsToRecord, nameFromTags } from "./utils.js";
export type { TagPair } from "./utils.js";
