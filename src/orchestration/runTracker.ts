/**
 * RunTracker: counters, phase and progress reporting for one bulk run
 *
 * Only the orchestrating flow calls into the tracker, and only between
 * dispatch barriers, so counters need no locking.
 */

import type {
  BatchTally,
  BulkMode,
  BulkRunReport,
  ClockFn,
  Logger,
  ProgressPolicy,
  RunCounters,
  RunPhase,
} from "@/types";

export interface RunTrackerOptions {
  mode: BulkMode;
  progress: ProgressPolicy;
  clock: ClockFn;
  logger: Logger;
}

/**
 * Round to one decimal place for log output
 */
function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

export class RunTracker {
  readonly counters: RunCounters;
  private currentPhase: RunPhase = "init";
  private readonly mode: BulkMode;
  private readonly progress: ProgressPolicy;
  private readonly clock: ClockFn;
  private readonly logger: Logger;

  constructor(options: RunTrackerOptions) {
    this.mode = options.mode;
    this.progress = options.progress;
    this.clock = options.clock;
    this.logger = options.logger;

    const now = this.clock();
    this.counters = {
      successes: 0,
      failures: 0,
      batches: 0,
      startedAtMs: now,
      lastProgressAtMs: now,
    };
  }

  get phase(): RunPhase {
    return this.currentPhase;
  }

  get processed(): number {
    return this.counters.successes + this.counters.failures;
  }

  transition(next: RunPhase): void {
    if (next === this.currentPhase) {
      return;
    }
    this.logger.debug("Run phase", { from: this.currentPhase, to: next });
    this.currentPhase = next;
  }

  /**
   * Fold one dispatched batch into the counters
   *
   * @param expectedTotal - Known total of items for the run (enables ETA)
   */
  recordBatch(tally: BatchTally, expectedTotal?: number): void {
    const previousSuccesses = this.counters.successes;
    this.counters.batches++;
    this.counters.successes += tally.succeeded;
    this.counters.failures += tally.failed;
    this.reportProgressIfDue(previousSuccesses, expectedTotal);
  }

  /**
   * Fold one sequentially processed item into the counters
   */
  recordItem(succeeded: boolean): void {
    const previousSuccesses = this.counters.successes;
    if (succeeded) {
      this.counters.successes++;
    } else {
      this.counters.failures++;
    }
    this.reportProgressIfDue(previousSuccesses);
  }

  elapsedMs(): number {
    return this.clock() - this.counters.startedAtMs;
  }

  /**
   * Successes per second since the run started (0 before any time passed)
   */
  ratePerSecond(): number {
    const elapsedSec = this.elapsedMs() / 1000;
    return elapsedSec > 0 ? this.counters.successes / elapsedSec : 0;
  }

  snapshot(): BulkRunReport {
    return {
      mode: this.mode,
      success: this.counters.successes,
      failed: this.counters.failures,
      totalTimeMs: this.elapsedMs(),
      batches: this.counters.batches,
    };
  }

  /**
   * Move to done, log the run summary and return the final report
   */
  finish(): BulkRunReport {
    this.transition("done");
    const report = this.snapshot();
    const processed = report.success + report.failed;
    const successRatePct = processed > 0 ? round1((report.success / processed) * 100) : 0;

    this.logger.info("Bulk run complete", {
      mode: report.mode,
      success: report.success,
      failed: report.failed,
      batches: report.batches,
      totalTimeMs: report.totalTimeMs,
      averageRatePerSec: round1(this.ratePerSecond()),
      successRatePct,
    });

    return report;
  }

  private reportProgressIfDue(previousSuccesses: number, expectedTotal?: number): void {
    const now = this.clock();
    const every = this.progress.everySuccesses;
    const crossedThreshold =
      Math.floor(this.counters.successes / every) > Math.floor(previousSuccesses / every);
    const intervalElapsed = now - this.counters.lastProgressAtMs >= this.progress.everyMs;

    if (!crossedThreshold && !intervalElapsed) {
      return;
    }

    const rate = this.ratePerSecond();
    const meta: Record<string, unknown> = {
      success: this.counters.successes,
      failed: this.counters.failures,
      ratePerSec: round1(rate),
    };

    if (expectedTotal !== undefined && rate > 0) {
      const remaining = Math.max(0, expectedTotal - this.processed);
      meta.etaSec = Math.round(remaining / rate);
    }

    this.logger.info("Progress", meta);
    this.counters.lastProgressAtMs = now;
  }
}
