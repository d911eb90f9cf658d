/**
 * Bulk orchestrator: search → batch → parallel dispatch → retry
 *
 * Drives one run of a BulkOperation through these phases:
 * - init: validate options, zero counters
 * - streaming: pull identifiers from the search stream into the current batch
 * - dispatching: run a full batch through the dispatcher, fold the tally in,
 *   report progress, stop streaming once the optional cap is reached
 * - draining: dispatch the trailing partial batch exactly once
 * - done: log the summary and return the report
 *
 * Modes:
 * - conservative: sequential, one item at a time with the fail-hard
 *   conservative profile; `batchSize` only sets the sleep cadence
 * - hybrid: streaming batches with the hybrid profile
 * - maximal: prefetches every identifier first, then dispatches slices with
 *   the single-attempt maximal profile
 *
 * Cap semantics (maxItems):
 * - hybrid: checked after each full batch is tallied, against successes; a
 *   batch straddling the cap is processed in full
 * - conservative: checked before each item, against items processed
 * - maximal: identifier collection stops at the cap
 */

import type {
  BulkMode,
  BulkRunOptions,
  BulkRunReport,
  ClockFn,
  ItemIdentifier,
  Logger,
  RandomFn,
  RetryPolicy,
  RetryProfileName,
  SearchQuery,
  SleepFn,
} from "@/types";
import type { BulkOperation, SearchPageFetcher } from "@/interfaces";
import { RateLimitMonitor } from "@/rateLimit";
import { searchItems } from "@/search";
import {
  createItemExecutor,
  dispatchBatch,
  executeWithRetry,
  tallyBatch,
  RetryExhaustedError,
} from "@/execution";
import type { ItemWorker, RetryExecutorDeps } from "@/execution";
import {
  RETRY_POLICIES,
  DEFAULT_BATCH_SIZE,
  DEFAULT_PARALLEL_WORKERS,
  DEFAULT_CONSERVATIVE_DELAY_MS,
  PROGRESS_POLICIES,
  INTERCOM_DEFAULT_PAGE_SIZE,
  BULK_MODES,
} from "@/constants";
import { sleep as defaultSleep } from "@/utils";
import { rootLogger, withContext, describeError } from "@/logger";
import { RunTracker } from "./runTracker";
import { BulkRunAbortedError, BulkRunValidationError } from "./errors";

export interface BulkOrchestratorConfig<T> {
  operation: BulkOperation<T>;
  fetcher: SearchPageFetcher;
  /** Shared by search pages and observed writes; built from sleep/random/logger when omitted */
  rateLimitMonitor?: RateLimitMonitor;
  /** Override individual retry profiles (defaults: RETRY_POLICIES) */
  retryPolicies?: Partial<Record<RetryProfileName, RetryPolicy>>;
  sleep?: SleepFn;
  random?: RandomFn;
  clock?: ClockFn;
  logger?: Logger;
}

/**
 * Run options after defaults are applied and validation passed
 */
interface ResolvedRunOptions {
  mode: BulkMode;
  query: SearchQuery;
  parallelWorkers: number;
  batchSize: number;
  maxItems: number | undefined;
  delayMs: number;
  pageSize: number;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export class BulkOrchestrator<T = unknown> {
  private readonly operation: BulkOperation<T>;
  private readonly fetcher: SearchPageFetcher;
  private readonly rateLimitMonitor: RateLimitMonitor;
  private readonly retryPolicies: Record<RetryProfileName, RetryPolicy>;
  private readonly sleep: SleepFn;
  private readonly random: RandomFn;
  private readonly clock: ClockFn;
  private readonly logger: Logger;

  constructor(config: BulkOrchestratorConfig<T>) {
    this.operation = config.operation;
    this.fetcher = config.fetcher;
    this.sleep = config.sleep ?? defaultSleep;
    this.random = config.random ?? Math.random;
    this.clock = config.clock ?? Date.now;
    this.logger = withContext({ operation: config.operation.name }, config.logger ?? rootLogger);
    this.rateLimitMonitor =
      config.rateLimitMonitor ??
      new RateLimitMonitor({ sleep: this.sleep, random: this.random, logger: this.logger });
    this.retryPolicies = { ...RETRY_POLICIES, ...config.retryPolicies };
  }

  /**
   * Execute one bulk run
   *
   * @throws {BulkRunValidationError} On invalid options (before any request)
   * @throws {HttpError} When a search page fails; pagination is never retried
   * @throws {BulkRunAbortedError} When a conservative-mode item exhausts its retries
   */
  async run(options: BulkRunOptions): Promise<BulkRunReport> {
    const resolved = this.resolveOptions(options);
    const tracker = new RunTracker({
      mode: resolved.mode,
      progress: PROGRESS_POLICIES[resolved.mode],
      clock: this.clock,
      logger: this.logger,
    });

    this.logger.info("Starting bulk run", {
      mode: resolved.mode,
      parallelWorkers: resolved.mode === "conservative" ? 1 : resolved.parallelWorkers,
      batchSize: resolved.batchSize,
      ...(resolved.maxItems !== undefined && { maxItems: resolved.maxItems }),
      ...(resolved.mode === "conservative" && { delayMs: resolved.delayMs }),
    });

    switch (resolved.mode) {
      case "conservative":
        await this.runSequential(resolved, tracker);
        break;
      case "hybrid":
        await this.runStreamingBatches(resolved, tracker);
        break;
      case "maximal":
        await this.runPrefetchedBatches(resolved, tracker);
        break;
    }

    return tracker.finish();
  }

  /**
   * Init phase: apply per-mode defaults and reject invalid options
   */
  private resolveOptions(options: BulkRunOptions): ResolvedRunOptions {
    const issues: string[] = [];

    if (!BULK_MODES.includes(options.mode)) {
      issues.push(`mode must be one of ${BULK_MODES.join(", ")}`);
    }
    if (!options.criteria.teamId || options.criteria.teamId.trim() === "") {
      issues.push("criteria.teamId is required");
    }

    const mode = options.mode;
    const parallelWorkers = options.parallelWorkers ?? DEFAULT_PARALLEL_WORKERS[mode];
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE[mode];
    const delayMs = options.delayMs ?? DEFAULT_CONSERVATIVE_DELAY_MS;
    const pageSize = options.pageSize ?? INTERCOM_DEFAULT_PAGE_SIZE;

    if (!isPositiveInteger(parallelWorkers)) {
      issues.push("parallelWorkers must be a positive integer");
    }
    if (!isPositiveInteger(batchSize)) {
      issues.push("batchSize must be a positive integer");
    }
    if (options.maxItems !== undefined && !isPositiveInteger(options.maxItems)) {
      issues.push("maxItems must be a positive integer when set");
    }
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      issues.push("delayMs must be a non-negative number");
    }
    if (!isPositiveInteger(pageSize)) {
      issues.push("pageSize must be a positive integer");
    }

    if (issues.length > 0) {
      throw new BulkRunValidationError(issues);
    }

    return {
      mode,
      query: this.operation.searchQuery.build(options.criteria),
      parallelWorkers,
      batchSize,
      maxItems: options.maxItems,
      delayMs,
      pageSize,
    };
  }

  private stream(resolved: ResolvedRunOptions): AsyncGenerator<ItemIdentifier, void, undefined> {
    return searchItems({
      fetcher: this.fetcher,
      query: resolved.query,
      rateLimitMonitor: this.rateLimitMonitor,
      pageSize: resolved.pageSize,
      extractId: this.operation.extractId,
      logger: this.logger,
    });
  }

  private executorDeps(): RetryExecutorDeps {
    return {
      rateLimitMonitor: this.rateLimitMonitor,
      sleep: this.sleep,
      random: this.random,
      logger: this.logger,
    };
  }

  /**
   * Dispatching phase for one batch: dispatch, then fold the tally in
   */
  private async dispatchAndRecord(
    batch: readonly ItemIdentifier[],
    worker: ItemWorker<T>,
    resolved: ResolvedRunOptions,
    tracker: RunTracker,
    expectedTotal?: number,
  ): Promise<void> {
    tracker.transition(tracker.phase === "draining" ? "draining" : "dispatching");
    this.logger.info("Processing batch", {
      batch: tracker.counters.batches + 1,
      size: batch.length,
      ...(tracker.phase === "draining" && { final: true }),
    });

    const result = await dispatchBatch(batch, worker, resolved.parallelWorkers, this.logger);
    tracker.recordBatch(tallyBatch(result), expectedTotal);
  }

  private capReached(resolved: ResolvedRunOptions, tracker: RunTracker): boolean {
    return resolved.maxItems !== undefined && tracker.counters.successes >= resolved.maxItems;
  }

  /**
   * Hybrid mode: batches fill from the lazy stream and dispatch as they fill
   */
  private async runStreamingBatches(
    resolved: ResolvedRunOptions,
    tracker: RunTracker,
  ): Promise<void> {
    const worker = createItemExecutor(
      this.operation.itemAction,
      this.retryPolicies.hybrid,
      this.executorDeps(),
    );

    let batch: ItemIdentifier[] = [];
    tracker.transition("streaming");

    for await (const itemId of this.stream(resolved)) {
      batch.push(itemId);
      if (batch.length < resolved.batchSize) {
        continue;
      }

      await this.dispatchAndRecord(batch, worker, resolved, tracker);
      batch = [];

      if (this.capReached(resolved, tracker)) {
        this.logger.info("Reached item limit, stopping search", {
          maxItems: resolved.maxItems,
          success: tracker.counters.successes,
        });
        break;
      }
      tracker.transition("streaming");
    }

    tracker.transition("draining");
    if (batch.length > 0) {
      await this.dispatchAndRecord(batch, worker, resolved, tracker);
    }
  }

  /**
   * Maximal mode: collect every identifier (up to the cap), then dispatch slices
   */
  private async runPrefetchedBatches(
    resolved: ResolvedRunOptions,
    tracker: RunTracker,
  ): Promise<void> {
    const worker = createItemExecutor(
      this.operation.itemAction,
      this.retryPolicies.maximal,
      this.executorDeps(),
    );

    tracker.transition("streaming");
    const itemIds: ItemIdentifier[] = [];
    for await (const itemId of this.stream(resolved)) {
      itemIds.push(itemId);
      if (resolved.maxItems !== undefined && itemIds.length >= resolved.maxItems) {
        this.logger.info("Reached item limit, stopping search", { maxItems: resolved.maxItems });
        break;
      }
    }

    this.logger.info("Collected items for processing", { count: itemIds.length });

    for (let start = 0; start < itemIds.length; start += resolved.batchSize) {
      const batch = itemIds.slice(start, start + resolved.batchSize);
      if (batch.length < resolved.batchSize) {
        tracker.transition("draining");
      }
      await this.dispatchAndRecord(batch, worker, resolved, tracker, itemIds.length);
    }
  }

  /**
   * Conservative mode: one item at a time, sleeping every `batchSize` items
   */
  private async runSequential(resolved: ResolvedRunOptions, tracker: RunTracker): Promise<void> {
    const policy = this.retryPolicies.conservative;
    const deps = this.executorDeps();

    tracker.transition("streaming");
    for await (const itemId of this.stream(resolved)) {
      if (resolved.maxItems !== undefined && tracker.processed >= resolved.maxItems) {
        this.logger.info("Reached item limit, stopping search", { maxItems: resolved.maxItems });
        break;
      }

      let result: T | null;
      try {
        result = await executeWithRetry(itemId, this.operation.itemAction, policy, deps);
      } catch (error) {
        if (error instanceof RetryExhaustedError) {
          const report = tracker.snapshot();
          this.logger.error("Bulk run aborted", {
            itemId,
            success: report.success,
            failed: report.failed,
            error: describeError(error),
          });
          throw new BulkRunAbortedError(report, error);
        }
        throw error;
      }

      tracker.recordItem(result !== null);

      if (tracker.processed % resolved.batchSize === 0) {
        await this.sleep(resolved.delayMs);
      }
    }

    tracker.transition("draining");
  }
}
