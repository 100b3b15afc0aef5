/**
 * Retry Logic
 *
 * Bounded retry wrapper with exponential backoff.
 */

import { sleep } from './time.js';

export interface RetryOptions {
  maxAttempts: number;
  initialDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
  retryIf?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delay: number) => void;
  signal?: AbortSignal;
}

export const defaultRetryOptions: RetryOptions = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
};

/**
 * Delay before the attempt following `attempt` (1-based)
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'initialDelay' | 'maxDelay' | 'backoffMultiplier'>
): number {
  const delay = options.initialDelay * Math.pow(options.backoffMultiplier, attempt - 1);
  return Math.min(delay, options.maxDelay);
}

/**
 * Execute a function with automatic retry on failure.
 * The attempt number (1-based) is passed to `fn`.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...defaultRetryOptions, ...options };
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (opts.retryIf && !opts.retryIf(error)) {
        throw error;
      }

      if (attempt === maxAttempts || opts.signal?.aborted) {
        throw error;
      }

      const delay = backoffDelay(attempt, opts);
      opts.onRetry?.(error, attempt, delay);

      await sleep(delay, opts.signal);
    }
  }

  throw lastError;
}
