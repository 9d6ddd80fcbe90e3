/**
 * Scheduler
 *
 * Executes work units on a bounded pool. Every dispatched unit yields exactly
 * one outcome; collector failures are caught at the unit boundary and never
 * reach sibling units. Units are not retried here.
 */

import pLimit from "p-limit";
import { z } from "zod";
import type {
  CollectorContext,
  ResourceRecord,
  WorkOutcome,
  WorkUnit,
} from "../../types/inventory.js";
import { toUnitError } from "../errors.js";
import type { ScanContext } from "./context.js";

/**
 * Default pool width
 */
export const DEFAULT_CONCURRENCY = 40;

export interface RunUnitsOptions {
  collectorContext: CollectorContext;

  /** Pool width (default: 40) */
  concurrency?: number;
}

/**
 * Identity every record must have when it leaves a collector
 */
const resourceRecordSchema = z.object({
  service: z.string().min(1, "service is required"),
  type: z.string().min(1, "type is required"),
  id: z.string().min(1, "id is required"),
  region: z.string().min(1, "region is required"),
  arn: z.string().optional(),
  name: z.string().optional(),
  details: z.unknown(),
  tags: z.unknown(),
});

type RecordCheck =
  | { ok: true; records: ResourceRecord[] }
  | { ok: false; message: string };

/**
 * Validate record identity and fill in missing details/tags maps
 */
export function normalizeRecords(unit: WorkUnit, value: unknown): RecordCheck {
  if (!Array.isArray(value)) {
    return {
      ok: false,
      message: `Collector for ${unit.service} returned ${typeof value} instead of a list of records`,
    };
  }

  const records: ResourceRecord[] = [];

  for (const [index, item] of value.entries()) {
    const parsed = resourceRecordSchema.safeParse(item);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join(".") || "record";
      return {
        ok: false,
        message: `Invalid record #${index} from ${unit.service}/${unit.region}: ${field}: ${issue?.message ?? "malformed"}`,
      };
    }

    // details and tags stay as reported; only a missing map becomes {}
    const { details = {}, tags = {}, ...identity } = parsed.data;
    records.push({ ...identity, details, tags });
  }

  return { ok: true, records };
}

/**
 * Run one unit and wrap its result or failure
 */
export async function executeUnit(
  unit: WorkUnit,
  collectorContext: CollectorContext,
  clock: () => number = Date.now
): Promise<WorkOutcome> {
  const startTime = clock();

  try {
    const result: unknown = await unit.collector.collect(unit.region, collectorContext);
    const checked = normalizeRecords(unit, result);

    if (!checked.ok) {
      return {
        status: "failed",
        unit,
        error: { code: "invalid-record", message: checked.message },
        elapsedMs: clock() - startTime,
      };
    }

    return {
      status: "fulfilled",
      unit,
      records: checked.records,
      elapsedMs: clock() - startTime,
    };
  } catch (error) {
    return {
      status: "failed",
      unit,
      error: toUnitError(error),
      elapsedMs: clock() - startTime,
    };
  }
}

/**
 * Execute units with at most `concurrency` in flight
 *
 * Cancellation is checked when a unit is about to start: once the context is
 * cancelled, remaining units are recorded as skipped and in-flight units run
 * to completion. Outcomes are returned in completion order.
 */
export async function runUnits(
  units: readonly WorkUnit[],
  context: ScanContext,
  options: RunUnitsOptions
): Promise<WorkOutcome[]> {
  const { collectorContext, concurrency = DEFAULT_CONCURRENCY } = options;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
  }

  const limit = pLimit(concurrency);
  const outcomes: WorkOutcome[] = [];

  context.begin(units);

  const tasks = units.map((unit) =>
    limit(async () => {
      if (context.cancelled) {
        context.recordSkipped(unit);
        return;
      }

      const outcome = await executeUnit(unit, collectorContext, context.clock);
      outcomes.push(outcome);
      context.recordOutcome(outcome);
    })
  );

  await Promise.all(tasks);

  return outcomes;
}
