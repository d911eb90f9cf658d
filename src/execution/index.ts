export { executeWithRetry, createItemExecutor } from "./retryingExecutor";
export type { RetryExecutorDeps } from "./retryingExecutor";
export { dispatchBatch, tallyBatch } from "./batchDispatcher";
export type { ItemWorker } from "./batchDispatcher";
export { RetryExhaustedError } from "./errors";
export {
  classifyActionError,
  computeBackoffDelayMs,
  parseRetryAfter,
  resolveRateLimitWaitMs,
} from "./retryDelays";
