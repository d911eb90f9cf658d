import type { SleepFn } from "@/types";

/**
 * Largest delay setTimeout accepts; longer delays fire almost immediately
 */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleep for the specified number of milliseconds
 * Delays above the timer limit are slept in chunks.
 */
export const sleep: SleepFn = async (ms) => {
  let remaining = Math.max(0, ms);
  while (remaining > MAX_TIMER_DELAY_MS) {
    await wait(MAX_TIMER_DELAY_MS);
    remaining -= MAX_TIMER_DELAY_MS;
  }
  await wait(remaining);
};
