/**
 * Bulk run constants: per-mode defaults and progress cadence
 */

import type { BulkMode, ProgressPolicy } from "@/types";

export const DEFAULT_PARALLEL_WORKERS: Record<BulkMode, number> = {
  conservative: 1,
  hybrid: 15,
  maximal: 20,
};

export const DEFAULT_BATCH_SIZE: Record<BulkMode, number> = {
  conservative: 50,
  hybrid: 50,
  maximal: 100,
};

/**
 * Conservative mode sleeps this long after every `batchSize` items
 */
export const DEFAULT_CONSERVATIVE_DELAY_MS = 100;

/**
 * Progress cadence. The sequential mode reports less often since it logs per
 * item at debug level anyway.
 */
export const PROGRESS_POLICIES: Record<BulkMode, ProgressPolicy> = {
  conservative: { everySuccesses: 100, everyMs: 30_000 },
  hybrid: { everySuccesses: 50, everyMs: 10_000 },
  maximal: { everySuccesses: 50, everyMs: 10_000 },
};

export const BULK_MODES: readonly BulkMode[] = ["conservative", "hybrid", "maximal"];
