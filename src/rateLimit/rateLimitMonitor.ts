/**
 * RateLimitMonitor: advisory backpressure driven by response quota metadata
 *
 * After each observed response, if the remaining quota is below the low-water
 * mark, the caller is suspended for a short randomized delay. The monitor
 * never rejects and never waits for the quota window to reset.
 */

import type { Logger, RandomFn, RateLimitSnapshot, SleepFn } from "@/types";
import {
  RATE_LIMIT_LOW_WATER_MARK,
  RATE_LIMIT_BASE_DELAY_MS,
  RATE_LIMIT_MAX_JITTER_MS,
} from "@/constants";
import { sleep as defaultSleep } from "@/utils";
import { rootLogger } from "@/logger";

export interface RateLimitMonitorOptions {
  lowWaterMark?: number;
  baseDelayMs?: number;
  maxJitterMs?: number;
  sleep?: SleepFn;
  random?: RandomFn;
  logger?: Logger;
}

export class RateLimitMonitor {
  private readonly lowWaterMark: number;
  private readonly baseDelayMs: number;
  private readonly maxJitterMs: number;
  private readonly sleep: SleepFn;
  private readonly random: RandomFn;
  private readonly logger: Logger;

  constructor(options: RateLimitMonitorOptions = {}) {
    this.lowWaterMark = options.lowWaterMark ?? RATE_LIMIT_LOW_WATER_MARK;
    this.baseDelayMs = options.baseDelayMs ?? RATE_LIMIT_BASE_DELAY_MS;
    this.maxJitterMs = options.maxJitterMs ?? RATE_LIMIT_MAX_JITTER_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.logger = options.logger ?? rootLogger;
  }

  /**
   * Delay applied when the quota is low: base + uniform(0, jitter)
   */
  computeDelayMs(): number {
    return this.baseDelayMs + this.random() * this.maxJitterMs;
  }

  /**
   * Inspect a snapshot, slow down if needed
   *
   * @returns The remaining quota from the snapshot
   */
  async check(snapshot: RateLimitSnapshot): Promise<number> {
    this.logger.debug("Rate limit", {
      remaining: snapshot.remaining,
      limit: snapshot.limit,
      reset: snapshot.reset,
    });

    if (snapshot.remaining < this.lowWaterMark) {
      const delayMs = Math.round(this.computeDelayMs());
      this.logger.info("Approaching rate limit, slowing down", {
        remaining: snapshot.remaining,
        limit: snapshot.limit,
        delayMs,
      });
      await this.sleep(delayMs);
    }

    return snapshot.remaining;
  }
}
