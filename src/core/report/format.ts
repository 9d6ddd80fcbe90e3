/**
 * Report formatting
 * Renders a ScanResult as JSON or CSV
 */

import type { OutputFormat } from "../../types/config.js";
import type { ResourceRecord, ScanResult } from "../../types/inventory.js";
import { ownField, ownKeys } from "../scan/fields.js";

export const CSV_COLUMNS = ["service", "type", "id", "name", "region", "arn", "tags"] as const;

/**
 * Pretty-printed `{ metadata, errors, resources }` document
 */
export function formatJson(result: ScanResult): string {
  return `${JSON.stringify(
    {
      metadata: result.metadata,
      errors: result.errors,
      resources: result.records,
    },
    null,
    2
  )}\n`;
}

/**
 * Quote a CSV field when it contains a delimiter, quote or line break
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Render tags as "k=v; k2=v2", keys sorted
 *
 * Non-string values are written as JSON.
 */
export function formatTags(tags: unknown): string {
  return ownKeys(tags)
    .sort()
    .map((key) => {
      const value = ownField(tags, key);
      return `${key}=${typeof value === "string" ? value : JSON.stringify(value)}`;
    })
    .join("; ");
}

function toRow(record: ResourceRecord): string {
  return [
    record.service,
    record.type,
    record.id,
    record.name ?? "",
    record.region,
    record.arn ?? "",
    formatTags(record.tags),
  ]
    .map(escapeCsvField)
    .join(",");
}

/**
 * One row per resource, CRLF line endings
 */
export function formatCsv(result: ScanResult): string {
  const lines = [CSV_COLUMNS.join(","), ...result.records.map(toRow)];
  return `${lines.join("\r\n")}\r\n`;
}

export function formatResult(result: ScanResult, format: OutputFormat): string {
  switch (format) {
    case "json":
      return formatJson(result);
    case "csv":
      return formatCsv(result);
  }
}
