/**
 * Abort signal helpers shared by retry and timeout handling
 */

import { RunCancelledError } from '../error/categories.js';
import { HistoryError } from '../error/error.js';

/**
 * Error a signal was aborted with. A bare `abort()` leaves a DOMException
 * as the reason; that and anything else outside the hierarchy becomes a
 * plain cancellation.
 */
export function abortReason(signal: AbortSignal): HistoryError {
  const reason: unknown = signal.reason;
  return reason instanceof HistoryError ? reason : new RunCancelledError();
}

/**
 * Sleeps for `ms`, rejecting early with the abort reason if `signal` fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) {
        reject(abortReason(signal));
      }
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
