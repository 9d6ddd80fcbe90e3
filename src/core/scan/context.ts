/**
 * Scan context
 *
 * Holds all mutable state of one scan run: progress counters, per-service
 * timings, skipped units and the cancellation signal. A fresh context is
 * created per run and passed to the scheduler and the aggregator.
 */

import type {
  ServiceTiming,
  WorkOutcome,
  WorkUnit,
} from "../../types/inventory.js";

/**
 * Progress notifications emitted while units complete
 */
export type ScanProgressEvent =
  | {
      type: "unit-complete";
      outcome: WorkOutcome;
      completed: number;
      skipped: number;
      total: number;
    }
  | {
      type: "service-complete";
      service: string;
      resources: number;
      failedUnits: number;
    }
  | {
      type: "unit-skipped";
      unit: WorkUnit;
      completed: number;
      skipped: number;
      total: number;
    };

export interface ScanContextOptions {
  /** Cancellation signal, checked before each unit is dispatched */
  signal?: AbortSignal;

  /** Progress callback */
  onProgress?: (event: ScanProgressEvent) => void;

  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
}

interface ServiceProgress {
  total: number;
  completed: number;
  failed: number;
  resources: number;
  elapsedMs: number;
}

export class ScanContext {
  readonly clock: () => number;
  readonly startedAt: number;

  private readonly signal?: AbortSignal;
  private readonly onProgress?: (event: ScanProgressEvent) => void;
  private readonly services = new Map<string, ServiceProgress>();
  private readonly skippedUnits: WorkUnit[] = [];
  private totalUnits = 0;
  private completedUnits = 0;

  constructor(options: ScanContextOptions = {}) {
    this.signal = options.signal;
    this.onProgress = options.onProgress;
    this.clock = options.clock ?? Date.now;
    this.startedAt = this.clock();
  }

  /**
   * Whether cancellation was requested
   */
  get cancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  /**
   * Units that were never dispatched because of cancellation
   */
  get skipped(): readonly WorkUnit[] {
    return this.skippedUnits;
  }

  get completed(): number {
    return this.completedUnits;
  }

  get total(): number {
    return this.totalUnits;
  }

  /**
   * Register the units about to be scheduled
   */
  begin(units: readonly WorkUnit[]): void {
    this.totalUnits += units.length;

    for (const unit of units) {
      const progress = this.getProgress(unit.service);
      progress.total += 1;
    }
  }

  recordOutcome(outcome: WorkOutcome): void {
    const progress = this.getProgress(outcome.unit.service);

    progress.completed += 1;
    progress.elapsedMs += outcome.elapsedMs;
    if (outcome.status === "fulfilled") {
      progress.resources += outcome.records.length;
    } else {
      progress.failed += 1;
    }
    this.completedUnits += 1;

    this.onProgress?.({
      type: "unit-complete",
      outcome,
      completed: this.completedUnits,
      skipped: this.skippedUnits.length,
      total: this.totalUnits,
    });

    if (progress.completed === progress.total) {
      this.onProgress?.({
        type: "service-complete",
        service: outcome.unit.service,
        resources: progress.resources,
        failedUnits: progress.failed,
      });
    }
  }

  recordSkipped(unit: WorkUnit): void {
    this.skippedUnits.push(unit);
    this.onProgress?.({
      type: "unit-skipped",
      unit,
      completed: this.completedUnits,
      skipped: this.skippedUnits.length,
      total: this.totalUnits,
    });
  }

  /**
   * Seconds since the context was created, rounded to 2 decimals
   */
  elapsedSeconds(): number {
    return Math.round((this.clock() - this.startedAt) / 10) / 100;
  }

  /**
   * Time spent per service, slowest first
   */
  serviceTimings(): ServiceTiming[] {
    return [...this.services.entries()]
      .filter(([, progress]) => progress.completed > 0)
      .map(([service, progress]) => ({
        service,
        seconds: Math.round(progress.elapsedMs / 10) / 100,
        units: progress.completed,
        resources: progress.resources,
      }))
      .sort((a, b) => b.seconds - a.seconds || (a.service < b.service ? -1 : 1));
  }

  private getProgress(service: string): ServiceProgress {
    let progress = this.services.get(service);
    if (!progress) {
      progress = { total: 0, completed: 0, failed: 0, resources: 0, elapsedMs: 0 };
      this.services.set(service, progress);
    }
    return progress;
  }
}
