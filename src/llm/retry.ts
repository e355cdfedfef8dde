import { sleep as defaultSleep, type Sleep } from './util';

export type RetryPolicy = {
  /** Attempts after the first one. */
  maxRetries: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelayMs: 500,
  factor: 2,
  maxDelayMs: 8000
};

/** Delay before retry number `retry` (1-based). */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  const raw = policy.baseDelayMs * Math.pow(policy.factor, Math.max(0, retry - 1));
  return Math.min(raw, policy.maxDelayMs);
}

type RetryOpts = {
  policy: RetryPolicy;
  shouldRetry: (err: unknown) => boolean;
  sleep?: Sleep;
  onRetry?: (err: unknown, retry: number, delayMs: number) => void;
};

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOpts): Promise<T> {
  const wait = opts.sleep ?? defaultSleep;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      const retry = attempt;
      if (retry > opts.policy.maxRetries || !opts.shouldRetry(err)) throw err;
      const delayMs = backoffDelay(opts.policy, retry);
      opts.onRetry?.(err, retry, delayMs);
      await wait(delayMs);
    }
  }
}
