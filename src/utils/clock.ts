/**
 * Wall-clock and sleep primitives.
 *
 * Services take these by injection so tests can drive time without real delays.
 */

export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
}

export type SleepFn = (ms: number) => Promise<void>;

export const systemClock: Clock = {
  now: () => Date.now(),
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
