/**
 * Execution errors
 */

import type { ItemIdentifier, RetryProfileName } from "@/types";

export interface RetryExhaustedErrorDetails {
  itemId: ItemIdentifier;
  attempts: number;
  policy: RetryProfileName;
  lastError: unknown;
}

/**
 * Thrown by fail-hard policies once every attempt for an item has failed
 */
export class RetryExhaustedError extends Error {
  public readonly itemId: ItemIdentifier;
  public readonly attempts: number;
  public readonly policy: RetryProfileName;
  public readonly lastError: unknown;

  constructor(details: RetryExhaustedErrorDetails) {
    const reason =
      details.lastError instanceof Error ? details.lastError.message : String(details.lastError);
    super(
      `Action failed for item ${details.itemId} after ${details.attempts} attempts (${details.policy}): ${reason}`,
      { cause: details.lastError },
    );
    this.name = "RetryExhaustedError";
    this.itemId = details.itemId;
    this.attempts = details.attempts;
    this.policy = details.policy;
    this.lastError = details.lastError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RetryExhaustedError);
    }
  }
}
