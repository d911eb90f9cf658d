/**
 * Unit tests for the timer-based sleep
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { sleep, MAX_TIMER_DELAY_MS } from "@/utils";

describe("sleep", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve after the requested delay", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(500).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("should not fire early for delays above the timer limit", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(MAX_TIMER_DELAY_MS + 1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(1000);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(MAX_TIMER_DELAY_MS - 1000);
    expect(done).toBe(false);

    await vi.advanceTimersByTimeAsync(1000);
    await pending;
    expect(done).toBe(true);
  });

  it("should treat negative delays as zero", async () => {
    vi.useFakeTimers();
    let done = false;
    const pending = sleep(-50).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(0);
    await pending;
    expect(done).toBe(true);
  });
});
