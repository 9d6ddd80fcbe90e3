/**
 * Inventory types
 * Records, work units and outcomes shared by the scan pipeline
 */

import type { AWSCredentialProvider } from "./aws.js";

/**
 * One discovered cloud resource
 */
export interface ResourceRecord {
  /** Catalog key of the service that produced the record */
  readonly service: string;

  /** Resource kind within the service (e.g. "bucket", "role") */
  readonly type: string;

  /** Provider identifier, unique within (service, type, region, account) */
  readonly id: string;

  /** Globally unique resource name, when the provider issues one */
  readonly arn?: string;

  /** Human-readable label */
  readonly name?: string;

  /** Region the resource is attributed to (control-plane region for global services) */
  readonly region: string;

  /** Service-specific attributes, kept as the collector reported them */
  readonly details: unknown;

  /** Tag key to tag value, kept as the collector reported them */
  readonly tags: unknown;
}

/**
 * Record as a bundled collector builds it
 */
export interface CollectedRecord extends ResourceRecord {
  /** Service-specific attributes; shape varies per resource type */
  readonly details: Readonly<Record<string, unknown>>;

  /** Tag key to tag value */
  readonly tags: Readonly<Record<string, string>>;
}

/**
 * Everything a collector needs besides the target region
 */
export interface CollectorContext {
  accountId: string;
  credentials: AWSCredentialProvider;

  /** Maximum attempts per API call (SDK retry strategy) */
  maxAttempts: number;
}

/**
 * Per-service enumeration routine
 *
 * Implementations are read-only and idempotent. "Nothing found" is an empty
 * array; provider failures are thrown, preferably as a CollectorError.
 */
export interface Collector {
  readonly service: string;
  collect(region: string, context: CollectorContext): Promise<CollectedRecord[]>;
}

/**
 * A planned (service, region) pair
 */
export interface WorkUnit {
  readonly service: string;
  readonly region: string;
  readonly collector: Collector;
}

/**
 * Failure categories a unit can end with
 */
export type UnitErrorCode =
  | "throttled"
  | "access-denied"
  | "unavailable"
  | "network"
  | "invalid-record"
  | "provider";

/**
 * Serializable description of a unit failure
 */
export interface UnitError {
  code: UnitErrorCode;
  message: string;
}

/**
 * Result of executing one work unit
 */
export type WorkOutcome =
  | {
      readonly status: "fulfilled";
      readonly unit: WorkUnit;
      readonly records: readonly ResourceRecord[];
      readonly elapsedMs: number;
    }
  | {
      readonly status: "failed";
      readonly unit: WorkUnit;
      readonly error: UnitError;
      readonly elapsedMs: number;
    };

/**
 * Tag filter: tag key to accepted values
 */
export type TagFilter = Readonly<Record<string, readonly string[]>>;

/**
 * A failed unit as reported in the scan result
 */
export interface ScanError {
  readonly service: string;
  readonly region: string;
  readonly code: UnitErrorCode;
  readonly message: string;
}

/**
 * Accumulated time spent in one service's units
 */
export interface ServiceTiming {
  readonly service: string;
  readonly seconds: number;
  readonly units: number;
  readonly resources: number;
}

/**
 * Run metadata
 */
export interface ScanMetadata {
  readonly accountId: string;
  readonly accountAlias?: string;
  readonly timestamp: string;
  readonly scanDurationSeconds: number;
  readonly servicesScanned: number;
  readonly regionsScanned: number;
  readonly unitCount: number;
  readonly failedUnitCount: number;
  readonly skippedUnitCount: number;
  readonly cancelled: boolean;
  readonly resourceCount: number;
  readonly excludedCount: number;
  readonly outOfScopeCount: number;
  readonly unknownServices: readonly string[];
  readonly ignoredRegions: readonly string[];
  readonly tagFilter?: TagFilter;
  readonly serviceTimings?: readonly ServiceTiming[];
}

/**
 * Aggregated result of one scan run
 */
export interface ScanResult {
  readonly records: readonly ResourceRecord[];
  readonly errors: readonly ScanError[];
  readonly metadata: ScanMetadata;
}
