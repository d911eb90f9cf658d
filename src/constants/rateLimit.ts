/**
 * Rate-limit monitor constants
 */

/**
 * Below this many remaining calls the monitor starts slowing down
 */
export const RATE_LIMIT_LOW_WATER_MARK = 50;

/**
 * Fixed part of the slow-down delay
 */
export const RATE_LIMIT_BASE_DELAY_MS = 2_000;

/**
 * Upper bound of the random part of the slow-down delay
 */
export const RATE_LIMIT_MAX_JITTER_MS = 2_000;

/**
 * Values assumed when a response carries no rate-limit headers
 */
export const RATE_LIMIT_DEFAULT_REMAINING = 1_000;
export const RATE_LIMIT_DEFAULT_LIMIT = 10_000;
export const RATE_LIMIT_DEFAULT_RESET = 0;
