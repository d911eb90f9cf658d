/**
 * Bulk run type definitions: outcomes, counters, options and reports
 */

import type { ItemIdentifier, SearchCriteria } from "./search";
import type { RateLimitSnapshot } from "./rateLimit";

/**
 * Options passed to an item action for one call
 */
export interface ActionCallOptions {
  timeoutMs: number;
}

/**
 * Successful action result: parsed body plus the response's quota metadata
 */
export interface ActionOutcome<T> {
  data: T;
  rateLimit: RateLimitSnapshot | null;
}

export type ItemOutcome<T> =
  | { itemId: ItemIdentifier; ok: true; value: T }
  | { itemId: ItemIdentifier; ok: false; error?: unknown };

/**
 * One outcome per dispatched identifier, in input order
 */
export type BatchResult<T> = ItemOutcome<T>[];

export interface BatchTally {
  succeeded: number;
  failed: number;
}

export type BulkMode = "conservative" | "hybrid" | "maximal";

export type RunPhase = "init" | "streaming" | "dispatching" | "draining" | "done";

/**
 * Mutable aggregate state of one run, owned by the orchestrator
 */
export interface RunCounters {
  successes: number;
  failures: number;
  batches: number;
  startedAtMs: number;
  lastProgressAtMs: number;
}

/**
 * When progress lines are emitted
 */
export interface ProgressPolicy {
  /** Emit when successes cross a multiple of this value */
  everySuccesses: number;
  /** Emit when this much time passed since the last line */
  everyMs: number;
}

export interface BulkRunOptions {
  mode: BulkMode;
  criteria: SearchCriteria;
  /** Concurrent workers per batch (parallel modes) */
  parallelWorkers?: number;
  /** Dispatch unit in parallel modes; sleep cadence in conservative mode */
  batchSize?: number;
  /** Optional processing cap, see DESIGN.md for the exact cutoff */
  maxItems?: number;
  /** Conservative mode: sleep applied every `batchSize` items */
  delayMs?: number;
  /** Search page size hint */
  pageSize?: number;
}

export interface BulkRunReport {
  mode: BulkMode;
  success: number;
  failed: number;
  totalTimeMs: number;
  batches: number;
}
