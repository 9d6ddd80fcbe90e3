/**
 * Scan runner
 * Plan → schedule → aggregate for one account
 */

import type { AWSCredentialProvider } from "../../types/aws.js";
import type { ScanResult, TagFilter } from "../../types/inventory.js";
import { getDefaultCatalog, type ServiceCatalog } from "../catalog/index.js";
import { createDefaultRegistry, type CollectorRegistry } from "../collectors/registry.js";
import { aggregate } from "./aggregator.js";
import { ScanContext, type ScanProgressEvent } from "./context.js";
import type { ExclusionRule } from "./exclusions.js";
import { planScan, type ScanPlan } from "./region-resolver.js";
import { runUnits } from "./scheduler.js";

/**
 * Default SDK attempts per API call
 */
export const DEFAULT_MAX_ATTEMPTS = 5;

export interface RunScanOptions {
  accountId: string;
  accountAlias?: string;
  credentials: AWSCredentialProvider;

  /** Regions enabled for the account */
  enabledRegions: readonly string[];

  regions?: readonly string[];
  services?: readonly string[];
  includeGlobal?: boolean;
  tagFilter?: TagFilter;
  concurrency?: number;
  maxAttempts?: number;
  timings?: boolean;

  /** Stops dispatching new units once aborted */
  signal?: AbortSignal;

  catalog?: ServiceCatalog;
  registry?: CollectorRegistry;
  exclusionRules?: readonly ExclusionRule[];

  /** Called once the plan is known, before any unit runs */
  onPlan?: (plan: ScanPlan) => void;
  onProgress?: (event: ScanProgressEvent) => void;

  clock?: () => number;
  now?: () => Date;
}

/**
 * Run a full inventory scan
 *
 * Unit failures end up in `result.errors`. Only programming errors
 * (catalog mismatch, malformed outcomes, bad concurrency) reject.
 */
export async function runScan(options: RunScanOptions): Promise<ScanResult> {
  const catalog = options.catalog ?? getDefaultCatalog();
  const registry = options.registry ?? createDefaultRegistry();

  const plan = planScan(
    {
      enabledRegions: options.enabledRegions,
      requestedRegions: options.regions,
      requestedServices: options.services,
      includeGlobal: options.includeGlobal,
    },
    catalog,
    registry
  );
  options.onPlan?.(plan);

  const context = new ScanContext({
    signal: options.signal,
    onProgress: options.onProgress,
    clock: options.clock,
  });

  const outcomes = await runUnits(plan.units, context, {
    concurrency: options.concurrency,
    collectorContext: {
      accountId: options.accountId,
      credentials: options.credentials,
      maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    },
  });

  return aggregate(outcomes, {
    accountId: options.accountId,
    accountAlias: options.accountAlias,
    tagFilter: options.tagFilter,
    exclusionRules: options.exclusionRules,
    plan,
    context,
    includeTimings: options.timings,
    now: options.now?.(),
  });
}
