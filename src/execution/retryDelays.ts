/**
 * Retry delay computation: error classification, Retry-After parsing, backoff
 */

import type { ActionErrorClassification, RandomFn, RetryPolicy } from "@/types";
import { HttpError } from "@/clients/http";
import {
  RETRY_AFTER_HEADER,
  LINEAR_BACKOFF_STEP_MS,
  EXPONENTIAL_BACKOFF_BASE_MS,
} from "@/constants";

/**
 * Classify an action failure
 *
 * - RATE_LIMIT: HTTP 429
 * - TRANSIENT: everything else (network errors, timeouts, 5xx, other statuses)
 */
export function classifyActionError(error: unknown): ActionErrorClassification {
  if (error instanceof HttpError && error.isRateLimited) {
    return "RATE_LIMIT";
  }
  return "TRANSIENT";
}

/**
 * Parse Retry-After header value
 * Supports delay-seconds (decimals allowed) and HTTP-date formats
 * Returns delay in milliseconds, or null if invalid/missing
 */
export function parseRetryAfter(
  retryAfterHeader: string | null | undefined,
  nowMs: number = Date.now(),
): number | null {
  if (!retryAfterHeader) {
    return null;
  }

  const trimmed = retryAfterHeader.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  // Negative or malformed numbers are not dates
  if (/^[-+]?[\d.]+$/.test(trimmed)) {
    return null;
  }

  const dateMs = Date.parse(trimmed);
  if (!Number.isNaN(dateMs)) {
    const delayMs = dateMs - nowMs;
    return delayMs > 0 ? delayMs : 0;
  }

  return null;
}

/**
 * Wait before retrying a rate-limited call: the server's Retry-After when
 * present, the policy default otherwise
 */
export function resolveRateLimitWaitMs(error: unknown, policy: RetryPolicy): number {
  const header = error instanceof HttpError ? error.headers?.get(RETRY_AFTER_HEADER) : null;
  return parseRetryAfter(header) ?? policy.defaultRetryAfterMs;
}

/**
 * Wait before retrying a transient failure
 *
 * - linear: (1 + attempt) steps, i.e. 1s, 2s, 3s
 * - exponential: 2^attempt units plus uniform jitter, i.e. 1s, 2s, 4s, 8s (+ up to maxJitterMs)
 *
 * @param attempt - Zero-based index of the attempt that just failed
 */
export function computeBackoffDelayMs(
  attempt: number,
  policy: RetryPolicy,
  random: RandomFn = Math.random,
): number {
  if (policy.backoff === "linear") {
    return (1 + attempt) * LINEAR_BACKOFF_STEP_MS;
  }
  const exponential = Math.pow(2, attempt) * EXPONENTIAL_BACKOFF_BASE_MS;
  return exponential + random() * policy.maxJitterMs;
}
