/**
 * Shared helpers for collectors
 */

import type {
  Collector,
  CollectorContext,
  CollectedRecord,
} from "../../types/inventory.js";
import { classifyError, isNotFoundError, toCollectorError } from "../errors.js";

/**
 * Key/Value tag pair as most AWS APIs return it
 */
export interface TagPair {
  Key?: string;
  Value?: string;
}

/**
 * Convert an AWS tag list to a key/value map
 */
export function tagsToRecord(
  tags: readonly TagPair[] | undefined
): Record<string, string> {
  const result: Record<string, string> = {};

  for (const tag of tags ?? []) {
    if (tag.Key !== undefined) {
      result[tag.Key] = tag.Value ?? "";
    }
  }

  return result;
}

/**
 * Human-readable label: the Name tag when present, else the fallback
 */
export function nameFromTags(
  tags: Readonly<Record<string, string>>,
  fallback?: string
): string | undefined {
  const name = tags["Name"];
  return name !== undefined && name.length > 0 ? name : fallback;
}

/**
 * Base SDK client settings for a collector call
 */
export function clientConfig(region: string, context: CollectorContext) {
  return {
    region,
    credentials: context.credentials,
    maxAttempts: context.maxAttempts,
  };
}

/**
 * Format an optional SDK date
 */
export function isoDate(value: Date | undefined): string | undefined {
  return value ? value.toISOString() : undefined;
}

/**
 * Run a per-resource lookup after a successful listing
 *
 * Access-denied and not-found failures yield undefined so the resource is
 * still reported; anything else fails the unit.
 */
export async function optionalLookup<T>(lookup: () => Promise<T>): Promise<T | undefined> {
  try {
    return await lookup();
  } catch (error) {
    if (classifyError(error) === "access-denied" || isNotFoundError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Define a collector whose failures surface as CollectorError
 */
export function defineCollector(
  service: string,
  collect: (region: string, context: CollectorContext) => Promise<CollectedRecord[]>
): Collector {
  return {
    service,
    async collect(region, context) {
      try {
        return await collect(region, context);
      } catch (error) {
        throw toCollectorError(service, region, error);
      }
    },
  };
}
