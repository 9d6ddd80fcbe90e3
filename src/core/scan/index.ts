export { aggregate } from "./aggregator.js";
export type { AggregateOptions } from "./aggregator.js";
export { ScanContext } from "./context.js";
export type { ScanContextOptions, ScanProgressEvent } from "./context.js";
export { DEFAULT_EXCLUSION_RULES, isExcluded } from "./exclusions.js";
export type { ExclusionRule } from "./exclusions.js";
export { normalizeIdentifiers, planScan } from "./region-resolver.js";
export type { PlanInput, ScanPlan } from "./region-resolver.js";
export { DEFAULT_MAX_ATTEMPTS, runScan } from "./scan.js";
export type { RunScanOptions } from "./scan.js";
export { DEFAULT_CONCURRENCY, executeUnit, normalizeRecords, runUnits } from "./scheduler.js";
export type { RunUnitsOptions } from "./scheduler.js";
export { isEmptyFilter, matches, parseTagFilters } from "./tag-filter.js";
