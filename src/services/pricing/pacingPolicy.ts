import { sleep as realSleep, systemClock, type Clock, type SleepFn } from "../../utils/clock";

export interface PacingPolicyOptions {
  intervalMs: number;
  clock?: Clock;
  sleep?: SleepFn;
}

/**
 * Minimum spacing between consecutive external requests.
 *
 * The first acquire() returns immediately; each later one waits out whatever is
 * left of the interval since the previous acquire().
 */
export class PacingPolicy {
  private lastAcquiredAt: number | null = null;
  private waitCount = 0;
  private readonly clock: Clock;
  private readonly sleepFn: SleepFn;

  constructor(private readonly options: PacingPolicyOptions) {
    this.clock = options.clock ?? systemClock;
    this.sleepFn = options.sleep ?? realSleep;
  }

  /** Number of times acquire() actually slept */
  get waits(): number {
    return this.waitCount;
  }

  async acquire(): Promise<void> {
    if (this.lastAcquiredAt !== null) {
      const remaining = this.options.intervalMs - (this.clock.now() - this.lastAcquiredAt);
      if (remaining > 0) {
        this.waitCount++;
        await this.sleepFn(remaining);
      }
    }
    this.lastAcquiredAt = this.clock.now();
  }

  /** Plain delay through the same sleep function, for backoff waits */
  pause(ms: number): Promise<void> {
    return this.sleepFn(ms);
  }
}
