/**
 * Retrying action executor: applies one ItemAction to one item under a RetryPolicy
 *
 * Rate-limited attempts (429) wait for the server's Retry-After and retry;
 * other failures back off per the policy. Each of them uses up one attempt.
 * Once attempts run out, fail-soft policies resolve to null and fail-hard
 * policies throw RetryExhaustedError.
 */

import type {
  ActionOutcome,
  ItemIdentifier,
  Logger,
  RandomFn,
  RetryPolicy,
  SleepFn,
} from "@/types";
import type { ItemAction } from "@/interfaces";
import type { RateLimitMonitor } from "@/rateLimit";
import { sleep as defaultSleep } from "@/utils";
import { rootLogger, describeError } from "@/logger";
import { RetryExhaustedError } from "./errors";
import {
  classifyActionError,
  computeBackoffDelayMs,
  resolveRateLimitWaitMs,
} from "./retryDelays";

export interface RetryExecutorDeps {
  /** Receives quota metadata of successful writes when the policy observes it */
  rateLimitMonitor?: RateLimitMonitor;
  sleep?: SleepFn;
  random?: RandomFn;
  logger?: Logger;
}

/**
 * Run `action` for `itemId` with retries
 *
 * @returns The action's data, or null when a fail-soft policy is exhausted
 * @throws {RetryExhaustedError} When a fail-hard policy is exhausted
 */
export async function executeWithRetry<T>(
  itemId: ItemIdentifier,
  action: ItemAction<T>,
  policy: RetryPolicy,
  deps: RetryExecutorDeps = {},
): Promise<T | null> {
  const sleep = deps.sleep ?? defaultSleep;
  const random = deps.random ?? Math.random;
  const logger = deps.logger ?? rootLogger;

  let lastError: unknown;

  for (let attempt = 0; attempt < policy.maxAttempts; attempt++) {
    let outcome: ActionOutcome<T>;

    try {
      outcome = await action.perform(itemId, { timeoutMs: policy.timeoutMs });
    } catch (error) {
      lastError = error;

      // No wait after the final attempt
      if (attempt >= policy.maxAttempts - 1) {
        break;
      }

      const classification = classifyActionError(error);
      const delayMs =
        classification === "RATE_LIMIT"
          ? resolveRateLimitWaitMs(error, policy)
          : computeBackoffDelayMs(attempt, policy, random);

      if (classification === "RATE_LIMIT") {
        logger.info("Rate limited, waiting before retry", {
          itemId,
          attempt: attempt + 1,
          maxAttempts: policy.maxAttempts,
          delayMs,
        });
      } else {
        logger.warn("Action failed, retrying", {
          itemId,
          attempt: attempt + 1,
          maxAttempts: policy.maxAttempts,
          delayMs: Math.round(delayMs),
          error: describeError(error),
        });
      }

      await sleep(delayMs);
      continue;
    }

    if (policy.observeRateLimits && outcome.rateLimit && deps.rateLimitMonitor) {
      await deps.rateLimitMonitor.check(outcome.rateLimit);
    }
    return outcome.data;
  }

  logger.error("Action failed after all attempts", {
    itemId,
    policy: policy.name,
    attempts: policy.maxAttempts,
    error: describeError(lastError),
  });

  if (policy.onExhaustion === "raise") {
    throw new RetryExhaustedError({
      itemId,
      attempts: policy.maxAttempts,
      policy: policy.name,
      lastError,
    });
  }
  return null;
}

/**
 * Bind an action and a policy into a per-item function for the dispatcher
 */
export function createItemExecutor<T>(
  action: ItemAction<T>,
  policy: RetryPolicy,
  deps: RetryExecutorDeps = {},
): (itemId: ItemIdentifier) => Promise<T | null> {
  return (itemId) => executeWithRetry(itemId, action, policy, deps);
}
