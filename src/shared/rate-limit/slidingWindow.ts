import type { Clock } from "../time/clock";

export type SlidingWindowOptions = {
  maxPerWindow: number;
  windowMs?: number;
  minWaitMs?: number;
  clock: Clock;
};

/**
 * Admits at most `maxPerWindow` events in any trailing window of `windowMs`.
 * When the window is full, waits until the oldest event leaves it (never less than `minWaitMs`).
 */
export class SlidingWindowRateLimiter {
  private readonly timestamps: number[] = [];
  private readonly maxPerWindow: number;
  private readonly windowMs: number;
  private readonly minWaitMs: number;
  private readonly clock: Clock;

  constructor(opts: SlidingWindowOptions) {
    if (!Number.isInteger(opts.maxPerWindow) || opts.maxPerWindow < 1) {
      throw new Error("maxPerWindow must be an integer >= 1");
    }
    this.maxPerWindow = opts.maxPerWindow;
    this.windowMs = opts.windowMs ?? 60_000;
    this.minWaitMs = opts.minWaitMs ?? 1000;
    this.clock = opts.clock;
  }

  private prune(now: number) {
    while (this.timestamps.length > 0 && now - this.timestamps[0] >= this.windowMs) {
      this.timestamps.shift();
    }
  }

  /** Blocks until a slot is free, records the event and returns the time spent waiting. */
  async acquire(): Promise<number> {
    let waited = 0;
    let now = this.clock.now();
    this.prune(now);

    while (this.timestamps.length >= this.maxPerWindow) {
      const oldest = this.timestamps[0];
      const waitMs = Math.max(this.minWaitMs, oldest + this.windowMs - now);
      await this.clock.sleep(waitMs);
      waited += waitMs;
      now = this.clock.now();
      this.prune(now);
    }

    this.timestamps.push(now);
    return waited;
  }

  inWindow(): number {
    this.prune(this.clock.now());
    return this.timestamps.length;
  }
}

export const jitterDelayMs = (baseSleepMs: number, random: () => number): number => {
  const normalized = Math.min(1, Math.max(0, random()));
  return baseSleepMs * 0.5 + baseSleepMs * normalized;
};
