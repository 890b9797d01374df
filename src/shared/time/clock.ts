export type Clock = {
  now(): number;
  sleep(ms: number): Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)))
};

export type RandomFn = () => number;

/** UTC timestamp as YYYYMMDDHHmmss, used to name quarantined files. */
export const compactUtcTimestamp = (epochMs: number): string =>
  new Date(epochMs).toISOString().replace(/[-:T]/g, "").slice(0, 14);
