/**
 * Async Utilities
 * Sleeping and cancellation against an AbortSignal.
 */

import { ErrorContext, ScraperErrors } from '../core/errors';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function throwIfCancelled(signal?: AbortSignal, context?: ErrorContext): void {
  if (signal?.aborted) {
    throw ScraperErrors.cancelled(context);
  }
}

/**
 * Sleeps for `ms`, rejecting with a CANCELLED ScraperError as soon as `signal` aborts.
 */
export function sleepOrCancel(ms: number, signal?: AbortSignal, context?: ErrorContext): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(ScraperErrors.cancelled(context));
  }
  if (ms <= 0) return Promise.resolve();

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(ScraperErrors.cancelled(context));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Waits for every task to settle, then rethrows the first rejection. Unlike Promise.all, no
 * task is left running unobserved when another fails.
 */
export async function settleAll<T>(tasks: Array<Promise<T>>): Promise<T[]> {
  const results = await Promise.allSettled(tasks);
  const values: T[] = [];
  for (const result of results) {
    if (result.status === 'rejected') throw result.reason;
    values.push(result.value);
  }
  return values;
}
