/**
 * Runtime seams: time and randomness are injected so tests stay deterministic
 */

/** Suspends the calling task for `ms` milliseconds */
export type SleepFn = (ms: number) => Promise<void>;

/** Returns a float in [0, 1), same contract as Math.random */
export type RandomFn = () => number;

/** Returns the current time in epoch milliseconds */
export type ClockFn = () => number;
