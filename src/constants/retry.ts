/**
 * Retry profiles: presets of the single RetryPolicy shape
 *
 * Each profile is a distinct point between safety and throughput:
 * - conservative: long timeout, five attempts, exponential backoff, throws when exhausted
 * - hybrid: short timeout, three attempts, linear backoff, null when exhausted
 * - maximal: short timeout, single attempt, null on any failure
 */

import type { RetryPolicy, RetryProfileName } from "@/types";

export const CONSERVATIVE_RETRY_POLICY: RetryPolicy = {
  name: "conservative",
  maxAttempts: 5,
  timeoutMs: 30_000,
  backoff: "exponential",
  onExhaustion: "raise",
  defaultRetryAfterMs: 60_000,
  maxJitterMs: 5_000,
  observeRateLimits: true,
};

export const HYBRID_RETRY_POLICY: RetryPolicy = {
  name: "hybrid",
  maxAttempts: 3,
  timeoutMs: 10_000,
  backoff: "linear",
  onExhaustion: "returnNull",
  defaultRetryAfterMs: 5_000,
  maxJitterMs: 0,
  observeRateLimits: true,
};

export const MAXIMAL_RETRY_POLICY: RetryPolicy = {
  name: "maximal",
  maxAttempts: 1,
  timeoutMs: 10_000,
  backoff: "linear",
  onExhaustion: "returnNull",
  defaultRetryAfterMs: 0,
  maxJitterMs: 0,
  observeRateLimits: false,
};

export const RETRY_POLICIES: Record<RetryProfileName, RetryPolicy> = {
  conservative: CONSERVATIVE_RETRY_POLICY,
  hybrid: HYBRID_RETRY_POLICY,
  maximal: MAXIMAL_RETRY_POLICY,
};

/**
 * Step of the linear backoff: 1s, 2s, 3s, ...
 */
export const LINEAR_BACKOFF_STEP_MS = 1_000;

/**
 * Unit of the exponential backoff: 1s, 2s, 4s, 8s, ...
 */
export const EXPONENTIAL_BACKOFF_BASE_MS = 1_000;
