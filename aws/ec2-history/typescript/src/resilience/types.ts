/**
 * Configuration interfaces for the resilience layer
 */

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Maximum number of attempts, including the first one */
  maxAttempts: number;
  /** Base delay in milliseconds before first retry */
  baseDelayMs: number;
  /** Maximum delay in milliseconds between retries */
  maxDelayMs: number;
  /** Jitter factor (0-1) to add randomness to delays */
  jitterFactor?: number;
}

/**
 * Called before each retry sleep
 */
export type RetryListener = (attempt: number, error: Error, delayMs: number) => void;
