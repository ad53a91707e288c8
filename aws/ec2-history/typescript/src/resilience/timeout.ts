/**
 * Time-bounded execution with cooperative cancellation
 */

export interface TimeoutOptions {
  /** Aborting this signal aborts the operation too */
  parentSignal?: AbortSignal;
  /** Error to reject with when the time budget runs out */
  onTimeout: () => Error;
  /** Error to reject with when the parent signal aborts */
  onCancel: () => Error;
}

/**
 * Runs `operation` with a child signal that aborts after `timeoutMs` or when
 * the parent signal aborts, whichever comes first. The returned promise
 * settles as soon as that happens; the operation is expected to observe its
 * signal and wind down on its own.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: TimeoutOptions
): Promise<T> {
  const { parentSignal, onTimeout, onCancel } = options;
  if (parentSignal?.aborted) {
    throw onCancel();
  }

  const controller = new AbortController();
  let rejectAborted: (error: Error) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });

  const abort = (error: Error): void => {
    rejectAborted(error);
    controller.abort(error);
  };

  const timer = setTimeout(() => abort(onTimeout()), timeoutMs);
  const onParentAbort = (): void => abort(onCancel());
  parentSignal?.addEventListener('abort', onParentAbort, { once: true });

  try {
    return await Promise.race([operation(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener('abort', onParentAbort);
  }
}
