/**
 * Tag Filter Engine
 *
 * A filter maps tag keys to accepted values. Values of one key are OR'ed,
 * keys are AND'ed. An empty filter matches every resource.
 */

import type { TagFilter } from "../../types/inventory.js";
import { ownField } from "./fields.js";

/**
 * Check a resource's tags against a filter
 *
 * Only string tag values can match.
 */
export function matches(tags: unknown, filter: TagFilter): boolean {
  return Object.entries(filter).every(([key, accepted]) => {
    const value = ownField(tags, key);
    return typeof value === "string" && accepted.includes(value);
  });
}

export function isEmptyFilter(filter: TagFilter | undefined): boolean {
  return !filter || Object.keys(filter).length === 0;
}

/**
 * Build a filter from "Key=Value" entries
 *
 * Repeating a key adds an accepted value. Entries without "=" are returned
 * in `invalid` and left out of the filter.
 *
 * @example
 * ```ts
 * parseTagFilters(["Owner=John", "Owner=Jane", "Env=Prod"]);
 * // { filter: { Owner: ["John", "Jane"], Env: ["Prod"] }, invalid: [] }
 * ```
 */
export function parseTagFilters(entries: readonly string[]): {
  filter: Record<string, string[]>;
  invalid: string[];
} {
  const filter: Record<string, string[]> = {};
  const invalid: string[] = [];

  for (const entry of entries) {
    const separator = entry.indexOf("=");
    if (separator <= 0) {
      invalid.push(entry);
      continue;
    }

    const key = entry.slice(0, separator);
    const value = entry.slice(separator + 1);
    const values = filter[key] ?? [];

    if (!values.includes(value)) {
      values.push(value);
    }
    filter[key] = values;
  }

  return { filter, invalid };
}
