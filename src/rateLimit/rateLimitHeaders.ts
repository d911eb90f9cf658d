/**
 * Rate-limit header parsing
 */

import type { RateLimitSnapshot } from "@/types";
import {
  RATE_LIMIT_REMAINING_HEADER,
  RATE_LIMIT_LIMIT_HEADER,
  RATE_LIMIT_RESET_HEADER,
  RATE_LIMIT_DEFAULT_REMAINING,
  RATE_LIMIT_DEFAULT_LIMIT,
  RATE_LIMIT_DEFAULT_RESET,
} from "@/constants";
import { parseIntegerOrNull } from "@/utils";

/**
 * Read X-RateLimit-* headers into a snapshot
 * Missing or unparseable values fall back to permissive defaults, so a
 * response without quota headers never triggers a slow-down.
 */
export function parseRateLimitHeaders(headers: Headers): RateLimitSnapshot {
  return {
    remaining:
      parseIntegerOrNull(headers.get(RATE_LIMIT_REMAINING_HEADER)) ??
      RATE_LIMIT_DEFAULT_REMAINING,
    limit:
      parseIntegerOrNull(headers.get(RATE_LIMIT_LIMIT_HEADER)) ??
      RATE_LIMIT_DEFAULT_LIMIT,
    reset:
      parseIntegerOrNull(headers.get(RATE_LIMIT_RESET_HEADER)) ??
      RATE_LIMIT_DEFAULT_RESET,
  };
}
