/**
 * Rate-limit type definitions
 */

/**
 * Quota metadata parsed from one response. Never persisted.
 */
export interface RateLimitSnapshot {
  remaining: number;
  limit: number;
  /** Epoch seconds at which the window resets (0 when unknown) */
  reset: number;
}
