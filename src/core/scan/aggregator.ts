/**
 * Result Aggregator
 *
 * Merges unit outcomes into one ScanResult:
 * flatten → exclusion rules → region scope → tag filter → dedupe → sort.
 */

import type {
  ResourceRecord,
  ScanError,
  ScanMetadata,
  ScanResult,
  TagFilter,
  WorkOutcome,
} from "../../types/inventory.js";
import { InvalidOutcomeError } from "../errors.js";
import type { ScanContext } from "./context.js";
import { DEFAULT_EXCLUSION_RULES, isExcluded, type ExclusionRule } from "./exclusions.js";
import type { ScanPlan } from "./region-resolver.js";
import { isEmptyFilter, matches } from "./tag-filter.js";

export interface AggregateOptions {
  accountId: string;
  accountAlias?: string;
  tagFilter?: TagFilter;

  /** Exclusion rules (default: built-in rules) */
  exclusionRules?: readonly ExclusionRule[];

  /** Plan the outcomes were produced from; drives region scope and counts */
  plan?: Pick<
    ScanPlan,
    "units" | "regions" | "unknownServices" | "ignoredRegions" | "regionScopedServices"
  >;

  context?: ScanContext;

  /** Attach per-service timings to the metadata */
  includeTimings?: boolean;

  now?: Date;
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareRecords(a: ResourceRecord, b: ResourceRecord): number {
  return (
    compare(a.service, b.service) ||
    compare(a.region, b.region) ||
    compare(a.type, b.type) ||
    compare(a.id, b.id)
  );
}

function recordKey(record: ResourceRecord): string {
  return JSON.stringify([record.service, record.type, record.id, record.region]);
}

function describeUnit(value: unknown): [string, string] {
  if (typeof value === "object" && value !== null && "unit" in value) {
    const unit = value.unit;
    if (typeof unit === "object" && unit !== null && "service" in unit && "region" in unit) {
      return [String(unit.service), String(unit.region)];
    }
  }
  return ["unknown", "unknown"];
}

function assertOutcome(outcome: WorkOutcome): void {
  switch (outcome.status) {
    case "fulfilled":
      if (!Array.isArray(outcome.records)) {
        throw new InvalidOutcomeError(
          outcome.unit.service,
          outcome.unit.region,
          "records is not a list"
        );
      }
      return;
    case "failed":
      if (typeof outcome.error !== "object" || outcome.error === null) {
        throw new InvalidOutcomeError(
          outcome.unit.service,
          outcome.unit.region,
          "failed outcome has no error"
        );
      }
      return;
    default: {
      const unexpected: unknown = outcome;
      const [service, region] = describeUnit(unexpected);
      throw new InvalidOutcomeError(service, region, "unknown status");
    }
  }
}

function distinct(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

/**
 * Aggregate unit outcomes into a frozen ScanResult
 *
 * @throws InvalidOutcomeError if an outcome is malformed
 */
export function aggregate(
  outcomes: readonly WorkOutcome[],
  options: AggregateOptions
): ScanResult {
  const {
    accountId,
    accountAlias,
    tagFilter,
    exclusionRules = DEFAULT_EXCLUSION_RULES,
    plan,
    context,
    includeTimings = false,
    now = new Date(),
  } = options;

  outcomes.forEach(assertOutcome);

  // Canonical order so "last seen" does not depend on completion order
  const ordered = [...outcomes].sort(
    (a, b) =>
      compare(a.unit.service, b.unit.service) || compare(a.unit.region, b.unit.region)
  );

  const regionScoped = new Set(plan?.regionScopedServices ?? []);
  const scopeRegions = new Set(plan?.regions ?? []);
  const filterActive = !isEmptyFilter(tagFilter);

  const deduped = new Map<string, ResourceRecord>();
  const errors: ScanError[] = [];
  let excludedCount = 0;
  let outOfScopeCount = 0;

  for (const outcome of ordered) {
    if (outcome.status === "failed") {
      errors.push({
        service: outcome.unit.service,
        region: outcome.unit.region,
        code: outcome.error.code,
        message: outcome.error.message,
      });
      continue;
    }

    for (const record of outcome.records) {
      if (isExcluded(record, exclusionRules)) {
        excludedCount += 1;
        continue;
      }

      if (regionScoped.has(record.service) && !scopeRegions.has(record.region)) {
        outOfScopeCount += 1;
        continue;
      }

      if (filterActive && tagFilter && !matches(record.tags, tagFilter)) {
        continue;
      }

      const key = recordKey(record);
      // Re-insert so a later duplicate replaces the earlier one
      deduped.delete(key);
      deduped.set(key, record);
    }
  }

  const records = [...deduped.values()].sort(compareRecords);
  errors.sort((a, b) => compare(a.service, b.service) || compare(a.region, b.region));

  const units = plan?.units ?? ordered.map((outcome) => outcome.unit);

  const metadata: ScanMetadata = {
    accountId,
    ...(accountAlias ? { accountAlias } : {}),
    timestamp: now.toISOString(),
    scanDurationSeconds: context?.elapsedSeconds() ?? 0,
    servicesScanned: distinct(units.map((unit) => unit.service)).length,
    regionsScanned: distinct(units.map((unit) => unit.region)).length,
    unitCount: units.length,
    failedUnitCount: errors.length,
    skippedUnitCount: context?.skipped.length ?? 0,
    cancelled: context?.cancelled ?? false,
    resourceCount: records.length,
    excludedCount,
    outOfScopeCount,
    unknownServices: [...(plan?.unknownServices ?? [])],
    ignoredRegions: [...(plan?.ignoredRegions ?? [])],
    ...(filterActive && tagFilter ? { tagFilter } : {}),
    ...(includeTimings && context ? { serviceTimings: context.serviceTimings() } : {}),
  };

  return Object.freeze({
    records: Object.freeze(records),
    errors: Object.freeze(errors),
    metadata: Object.freeze(metadata),
  });
}
