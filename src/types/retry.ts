/**
 * Retry policy type definitions
 */

export type BackoffKind = "linear" | "exponential";

/**
 * What happens once every attempt has failed
 * - raise: throw RetryExhaustedError (fail-hard)
 * - returnNull: resolve to null, counted as a failure (fail-soft)
 */
export type ExhaustionBehavior = "raise" | "returnNull";

export type RetryProfileName = "conservative" | "hybrid" | "maximal";

/**
 * Single parameterized retry policy; the named profiles are presets of it
 */
export interface RetryPolicy {
  name: RetryProfileName;
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Per-request timeout handed to the action */
  timeoutMs: number;
  backoff: BackoffKind;
  onExhaustion: ExhaustionBehavior;
  /** Wait used on 429 when the response carries no usable Retry-After */
  defaultRetryAfterMs: number;
  /** Upper bound of the random jitter added to exponential backoff */
  maxJitterMs: number;
  /** Feed rate-limit headers of successful writes to the monitor */
  observeRateLimits: boolean;
}

export type ActionErrorClassification = "RATE_LIMIT" | "TRANSIENT";
