import { BridgesimError } from './errors.js';
import type { RetryStrategy } from './types.js';

export type Sleep = (ms: number) => Promise<void>;

/** Timer-backed sleep used wherever a caller does not inject one. */
export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RetryOptions {
  sleep?: Sleep;
  /**
   * Per-error delay override. Returning `undefined` falls back to the
   * strategy's backoff for that attempt.
   */
  delayFor?: (error: unknown, attempt: number) => number | undefined;
  /** Called before each wait, with the zero-based attempt that just failed. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Compute delay for a given attempt using the retry strategy.
 */
export function computeDelay(strategy: RetryStrategy, attempt: number): number {
  let delay: number;

  switch (strategy.backoff) {
    case 'constant':
      delay = strategy.baseDelayMs;
      break;
    case 'linear':
      delay = strategy.baseDelayMs * (attempt + 1);
      break;
    case 'exponential':
      delay = strategy.baseDelayMs * Math.pow(2, attempt);
      break;
  }

  return Math.min(delay, strategy.maxDelayMs);
}

function isRetryable(error: unknown): boolean {
  return error instanceof BridgesimError && error.retryable;
}

/**
 * Execute a function with retry logic.
 *
 * - Only retries a BridgesimError with retryable=true
 * - Anything else is thrown immediately
 * - After `maxRetries` retries the last error is thrown
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  strategy: RetryStrategy,
  options: RetryOptions = {},
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= strategy.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (!isRetryable(error)) {
        throw error;
      }

      if (attempt < strategy.maxRetries) {
        const delay = options.delayFor?.(error, attempt) ?? computeDelay(strategy, attempt);
        options.onRetry?.(error, attempt, delay);
        await wait(delay);
      }
    }
  }

  // Max retries exhausted
  throw lastError;
}
