/**
 * 重试策略
 * 固定间隔重试，作为显式对象由调用方持有和组合
 */

import { sleepOrCancel } from './async';

export interface RetryPolicyOptions {
  /** Total attempts, the first call included. */
  maxAttempts: number;
  delayMs: number;
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number) => void;
}

export class RetryPolicy {
  private readonly options: RetryPolicyOptions;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.options = { ...options, delayMs: Math.max(0, options.delayMs) };
  }

  /**
   * Runs `fn` until it resolves, the predicate refuses the error, or attempts run out. The last
   * error is rethrown as-is.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    const { maxAttempts, delayMs, shouldRetry, onRetry } = this.options;

    for (let attempt = 1; ; attempt++) {
      try {
        return await fn(attempt);
      } catch (error: unknown) {
        if (attempt >= maxAttempts) throw error;
        if (shouldRetry && !shouldRetry(error, attempt)) throw error;
        if (onRetry) onRetry(error, attempt);
        await sleepOrCancel(delayMs, signal);
      }
    }
  }
}
