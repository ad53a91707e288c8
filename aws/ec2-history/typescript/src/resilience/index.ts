/**
 * Resilience
 *
 * Retry, timeout and concurrency control for region fetches.
 */

export type { RetryConfig, RetryListener } from './types.js';
export type { RetryOptions } from './retry.js';
export { RetryExecutor, createDefaultRetryConfig } from './retry.js';
export type { TimeoutOptions } from './timeout.js';
export { withTimeout } from './timeout.js';
export { Semaphore } from './semaphore.js';
export { abortReason, sleep } from './abort.js';
