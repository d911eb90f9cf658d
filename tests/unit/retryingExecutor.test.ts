/**
 * Unit tests for the retrying action executor
 *
 * Sleeps are recorded, so retry timing is asserted without waiting.
 */

import { describe, it, expect } from "vitest";
import { executeWithRetry, createItemExecutor, RetryExhaustedError } from "@/execution";
import { HttpError } from "@/clients/http";
import { RateLimitMonitor } from "@/rateLimit";
import { RETRY_POLICIES } from "@/constants";
import {
  createCapturingLogger,
  createFakeAction,
  createRecordingSleep,
} from "../helpers/fakes";

function rateLimited(retryAfter?: string): HttpError {
  return new HttpError({
    status: 429,
    statusText: "Too Many Requests",
    url: "https://api.example.test/conversations/c1/parts",
    headers: new Headers(retryAfter ? { "Retry-After": retryAfter } : {}),
  });
}

function serverError(): HttpError {
  return new HttpError({
    status: 503,
    statusText: "Service Unavailable",
    url: "https://api.example.test/conversations/c1/parts",
  });
}

describe("executeWithRetry", () => {
  it("should return data on first success without sleeping", async () => {
    const recorder = createRecordingSleep();
    const action = createFakeAction();

    const result = await executeWithRetry("c1", action, RETRY_POLICIES.hybrid, {
      sleep: recorder.sleep,
      logger: createCapturingLogger(),
    });

    expect(result).toEqual({ id: "c1" });
    expect(action.calls).toHaveLength(1);
    expect(recorder.calls).toEqual([]);
  });

  it("should pass the policy timeout to the action", async () => {
    const action = createFakeAction();

    await executeWithRetry("c1", action, RETRY_POLICIES.conservative, {
      logger: createCapturingLogger(),
    });

    expect(action.calls[0].options).toEqual({ timeoutMs: 30000 });
  });

  it("should wait Retry-After seconds after a 429 and then succeed", async () => {
    const recorder = createRecordingSleep();
    const logger = createCapturingLogger();
    const action = createFakeAction((_, attempt) => {
      if (attempt === 1) throw rateLimited("3");
    });

    const result = await executeWithRetry("c1", action, RETRY_POLICIES.hybrid, {
      sleep: recorder.sleep,
      logger,
    });

    expect(result).toEqual({ id: "c1" });
    expect(action.calls).toHaveLength(2);
    expect(recorder.calls).toEqual([3000]);
    expect(logger.find("Rate limited, waiting before retry")[0].meta).toEqual({
      itemId: "c1",
      attempt: 1,
      maxAttempts: 3,
      delayMs: 3000,
    });
  });

  it("should wait fractional Retry-After seconds", async () => {
    const recorder = createRecordingSleep();
    const action = createFakeAction((_, attempt) => {
      if (attempt === 1) throw rateLimited("1.5");
    });

    await executeWithRetry("c1", action, RETRY_POLICIES.hybrid, {
      sleep: recorder.sleep,
      logger: createCapturingLogger(),
    });

    expect(recorder.calls).toEqual([1500]);
  });

  it("should use the policy default wait when a 429 has no Retry-After", async () => {
    const recorder = createRecordingSleep();
    const action = createFakeAction((_, attempt) => {
      if (attempt === 1) throw rateLimited();
    });

    await executeWithRetry("c1", action, RETRY_POLICIES.hybrid, {
      sleep: recorder.sleep,
      logger: createCapturingLogger(),
    });

    expect(recorder.calls).toEqual([5000]);
  });

  it("should count a 429 as one attempt", async () => {
    const recorder = createRecordingSleep();
    const action = createFakeAction(() => {
      throw rateLimited("1");
    });

    const result = await executeWithRetry("c1", action, RETRY_POLICIES.hybrid, {
      sleep: recorder.sleep,
      logger: createCapturingLogger(),
    });

    expect(result).toBeNull();
    expect(action.calls).toHaveLength(3);
    expect(recorder.calls).toEqual([1000, 1000]);
  });

  it("should back off linearly for hybrid and return null after 3 attempts", async () => {
    const recorder = createRecordingSleep();
    const logger = createCapturingLogger();
    const action = createFakeAction(() => {
      throw serverError();
    });

    const result = await executeWithRetry("c1", action, RETRY_POLICIES.hybrid, {
      sleep: recorder.sleep,
      logger,
    });

    expect(result).toBeNull();
    expect(action.calls).toHaveLength(3);
    // No sleep after the final attempt
    expect(recorder.calls).toEqual([1000, 2000]);
    expect(logger.find("Action failed after all attempts")[0].meta).toEqual({
      itemId: "c1",
      policy: "hybrid",
      attempts: 3,
      error: serverError().message,
    });
  });

  it("should make exactly one attempt for maximal", async () => {
    const recorder = createRecordingSleep();
    const action = createFakeAction(() => {
      throw serverError();
    });

    const result = await executeWithRetry("c1", action, RETRY_POLICIES.maximal, {
      sleep: recorder.sleep,
      logger: createCapturingLogger(),
    });

    expect(result).toBeNull();
    expect(action.calls).toHaveLength(1);
    expect(recorder.calls).toEqual([]);
  });

  it("should back off exponentially for conservative and throw after 5 attempts", async () => {
    const recorder = createRecordingSleep();
    const failure = new Error("connection reset");
    const action = createFakeAction(() => {
      throw failure;
    });

    const promise = executeWithRetry("c1", action, RETRY_POLICIES.conservative, {
      sleep: recorder.sleep,
      random: () => 0,
      logger: createCapturingLogger(),
    });

    await expect(promise).rejects.toBeInstanceOf(RetryExhaustedError);
    await expect(promise).rejects.toMatchObject({
      itemId: "c1",
      attempts: 5,
      policy: "conservative",
      lastError: failure,
    });
    expect(action.calls).toHaveLength(5);
    expect(recorder.calls).toEqual([1000, 2000, 4000, 8000]);
  });

  it("should report quota of successful writes to the monitor when the policy observes it", async () => {
    const recorder = createRecordingSleep();
    const monitor = new RateLimitMonitor({
      sleep: recorder.sleep,
      random: () => 0,
      logger: createCapturingLogger(),
    });
    const action = createFakeAction(undefined, { remaining: 5, limit: 1000, reset: 0 });

    await executeWithRetry("c1", action, RETRY_POLICIES.hybrid, {
      rateLimitMonitor: monitor,
      sleep: recorder.sleep,
      logger: createCapturingLogger(),
    });
    expect(recorder.calls).toEqual([2000]);

    await executeWithRetry("c2", action, RETRY_POLICIES.maximal, {
      rateLimitMonitor: monitor,
      sleep: recorder.sleep,
      logger: createCapturingLogger(),
    });
    expect(recorder.calls).toEqual([2000]);
  });
});

describe("createItemExecutor", () => {
  it("should bind action and policy into a per-item function", async () => {
    const action = createFakeAction();
    const execute = createItemExecutor(action, RETRY_POLICIES.maximal, {
      logger: createCapturingLogger(),
    });

    await expect(execute("c9")).resolves.toEqual({ id: "c9" });
    expect(action.calls.map((call) => call.itemId)).toEqual(["c9"]);
  });
});
