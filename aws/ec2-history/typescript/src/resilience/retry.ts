/**
 * Retry executor with exponential backoff and jitter
 */

import { HistoryError } from '../error/error.js';
import { ThrottlingError } from '../error/categories.js';
import { abortReason, sleep } from './abort.js';
import type { RetryConfig, RetryListener } from './types.js';

export interface RetryOptions {
  /** Stops retrying, and interrupts a pending backoff, when aborted */
  signal?: AbortSignal;
  onRetry?: RetryListener;
}

/**
 * Executes AWS calls with retry logic and exponential backoff
 *
 * - Retries only errors flagged `isRetryable` (throttling, 5xx, network resets)
 * - Throttling errors back off from twice the base delay
 * - Never retries once the signal has been aborted
 */
export class RetryExecutor {
  private config: RetryConfig;

  constructor(config: RetryConfig) {
    this.config = config;
  }

  /**
   * Execute an operation with retry logic
   * @param operation - Receives the 1-indexed attempt number
   * @returns The result of the operation
   * @throws The last error if all attempts are exhausted
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
  ): Promise<T> {
    const { signal, onRetry } = options;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) {
        throw abortReason(signal);
      }

      try {
        return await operation(attempt);
      } catch (error) {
        if (signal?.aborted) {
          throw abortReason(signal);
        }
        if (!this.isRetryable(error) || attempt >= this.config.maxAttempts) {
          throw error;
        }

        const delay = this.calculateDelay(attempt, error);
        onRetry?.(attempt, error, delay);
        await sleep(delay, signal);
      }
    }
  }

  private isRetryable(error: unknown): error is HistoryError {
    return error instanceof HistoryError && error.isRetryable;
  }

  /**
   * Calculate the delay for a given retry attempt using exponential backoff with jitter
   * @param attempt - The attempt that just failed (1-indexed)
   */
  calculateDelay(attempt: number, error: unknown): number {
    const baseDelay =
      error instanceof ThrottlingError ? this.config.baseDelayMs * 2 : this.config.baseDelayMs;

    const exponentialDelay = baseDelay * Math.pow(2, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    // Adds between 0% and jitterFactor% on top of the capped delay
    const jitterFactor = this.config.jitterFactor ?? 0.5;
    const jitter = cappedDelay * Math.random() * jitterFactor;

    return Math.floor(cappedDelay + jitter);
  }
}

/**
 * Create a default retry configuration
 *
 * Default values:
 * - maxAttempts: 3
 * - baseDelayMs: 200
 * - maxDelayMs: 5000
 * - jitterFactor: 0.5
 */
export function createDefaultRetryConfig(): RetryConfig {
  return {
    maxAttempts: 3,
    baseDelayMs: 200,
    maxDelayMs: 5000,
    jitterFactor: 0.5,
  };
}
