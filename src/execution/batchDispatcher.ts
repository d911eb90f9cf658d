/**
 * Parallel batch dispatcher: runs one batch through a bounded worker pool
 *
 * A fresh pool is created per call and drained before the call resolves, so
 * every batch is a synchronization barrier. A failing item never cancels its
 * siblings.
 */

import pLimit from "p-limit";
import type { BatchResult, BatchTally, ItemIdentifier, ItemOutcome, Logger } from "@/types";
import { rootLogger, describeError } from "@/logger";

export type ItemWorker<T> = (itemId: ItemIdentifier) => Promise<T | null>;

/**
 * Apply `worker` to every item with at most `workerCount` in flight
 *
 * @returns One outcome per item, in input order. `null` results and thrown
 *   errors become failures.
 */
export async function dispatchBatch<T>(
  items: readonly ItemIdentifier[],
  worker: ItemWorker<T>,
  workerCount: number,
  logger: Logger = rootLogger,
): Promise<BatchResult<T>> {
  const limit = pLimit(Math.max(1, Math.floor(workerCount)));

  const runOne = async (itemId: ItemIdentifier): Promise<ItemOutcome<T>> => {
    try {
      const value = await worker(itemId);
      return value === null ? { itemId, ok: false } : { itemId, ok: true, value };
    } catch (error) {
      logger.warn("Batch item failed", { itemId, error: describeError(error) });
      return { itemId, ok: false, error };
    }
  };

  return Promise.all(items.map((itemId) => limit(runOne, itemId)));
}

/**
 * Count successes and failures of a dispatched batch
 */
export function tallyBatch<T>(result: BatchResult<T>): BatchTally {
  let succeeded = 0;
  for (const outcome of result) {
    if (outcome.ok) {
      succeeded++;
    }
  }
  return { succeeded, failed: result.length - succeeded };
}
