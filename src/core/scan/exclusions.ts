/**
 * Exclusion rules
 * Static predicates that drop provider-created default resources
 */

import type { ResourceRecord } from "../../types/inventory.js";
import { ownField } from "./fields.js";

export interface ExclusionRule {
  /** Service the rule applies to */
  service: string;

  /** What the rule removes */
  description: string;

  matches(record: ResourceRecord): boolean;
}

export const DEFAULT_EXCLUSION_RULES: readonly ExclusionRule[] = [
  {
    service: "events",
    description: "default event bus",
    matches: (record) => record.type === "event-bus" && record.id === "default",
  },
  {
    service: "iam",
    description: "service-linked roles",
    matches: (record) => {
      const path = ownField(record.details, "path");
      return record.type === "role" && typeof path === "string" && path.startsWith("/aws-service-role/");
    },
  },
  {
    service: "kms",
    description: "AWS managed keys",
    matches: (record) => record.type === "key" && ownField(record.details, "keyManager") === "AWS",
  },
  {
    service: "kms",
    description: "AWS managed aliases",
    matches: (record) => record.type === "alias" && record.id.startsWith("alias/aws/"),
  },
];

/**
 * Check whether any rule for the record's service drops it
 */
export function isExcluded(
  record: ResourceRecord,
  rules: readonly ExclusionRule[]
): boolean {
  return rules.some((rule) => rule.service === record.service && rule.matches(record));
}
