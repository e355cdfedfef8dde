import { logger, errorMessage } from '../observability/logger';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Runs `fn` with an AbortSignal that fires after `ms`. The returned promise
 * rejects with `onTimeout()` at the deadline even if `fn` ignores the signal.
 */
export async function withDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  ms: number,
  onTimeout: () => Error
): Promise<T> {
  const controller = new AbortController();
  let timedOut = false;
  const work = fn(controller.signal);
  // before the deadline the race below delivers the rejection to the caller
  work.catch((err: unknown) => {
    if (timedOut) logger.debug('work rejected after deadline', { error: errorMessage(err) });
  });
  let timer: ReturnType<typeof setTimeout> | null = null;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
      reject(onTimeout());
    }, ms);
  });
  return Promise.race([work, deadline]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
