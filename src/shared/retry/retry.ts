import { TransientFetchError } from "../../core/errors";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type RetryContext = { attempt: number; maxAttempts: number; delayMs: number; error: unknown };

export type RetryOptions = {
  retries: number;          // extra attempts after the first one
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry?: (err: unknown) => RetryDecision;
  onRetry?: (ctx: RetryContext) => void;
  onGiveUp?: (ctx: Omit<RetryContext, "delayMs">) => void;
  sleep?: (ms: number) => Promise<void>;
  randomFn?: () => number;
  jitterRatio?: number;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/** Retries transient fetch failures only; a server-supplied delay wins over backoff. */
export const retryTransient = (err: unknown): RetryDecision => {
  if (!(err instanceof TransientFetchError)) return false;
  return { retry: true, delayMs: err.retryDelayMs };
};

export const backoffDelayMs = (
  attempt: number,
  opts: Pick<RetryOptions, "minDelayMs" | "maxDelayMs" | "jitterRatio">,
  random: number,
  customDelayMs?: number
): number => {
  const base =
    customDelayMs != null
      ? Math.min(opts.maxDelayMs, customDelayMs)
      : Math.min(opts.maxDelayMs, opts.minDelayMs * Math.pow(2, attempt));
  const ratio = Math.min(1, Math.max(0, opts.jitterRatio ?? 0.2));
  return base + Math.floor(base * ratio * Math.min(1, Math.max(0, random)));
};

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    shouldRetry = retryTransient,
    onRetry,
    onGiveUp,
    sleep = defaultSleep,
    randomFn = Math.random
  } = opts;

  const maxAttempts = retries + 1;
  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized = typeof decision === "boolean" ? { retry: decision, delayMs: undefined } : decision;
      if (attempt >= retries || !normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err });
        throw err;
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const delayMs = backoffDelayMs(attempt, opts, randomFn(), customDelayMs);
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs);
    }
  }
};
