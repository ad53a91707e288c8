/**
 * Tests for retry, timeout and concurrency helpers
 */

import { describe, it, expect, vi } from 'vitest';
import { RetryExecutor } from '../retry.js';
import { withTimeout } from '../timeout.js';
import { Semaphore } from '../semaphore.js';
import { abortReason, sleep } from '../abort.js';
import {
  AccessDeniedError,
  RegionTimeoutError,
  RunCancelledError,
  ServiceError,
  ThrottlingError,
} from '../../error/categories.js';

const noDelay = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 };

function retryable(): ServiceError {
  return new ServiceError({ code: 'InternalError', message: 'boom', isRetryable: true });
}

describe('RetryExecutor', () => {
  it('should return the first successful result', async () => {
    const executor = new RetryExecutor(noDelay);
    const operation = vi.fn().mockRejectedValueOnce(retryable()).mockResolvedValueOnce('ok');

    await expect(executor.execute(operation)).resolves.toBe('ok');
    expect(operation).toHaveBeenCalledTimes(2);
    expect(operation).toHaveBeenNthCalledWith(2, 2);
  });

  it('should stop after maxAttempts', async () => {
    const executor = new RetryExecutor(noDelay);
    const operation = vi.fn().mockRejectedValue(retryable());

    await expect(executor.execute(operation)).rejects.toBeInstanceOf(ServiceError);
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('should not retry non-retryable errors', async () => {
    const executor = new RetryExecutor(noDelay);
    const operation = vi.fn().mockRejectedValue(new AccessDeniedError('denied'));

    await expect(executor.execute(operation)).rejects.toBeInstanceOf(AccessDeniedError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should not retry plain errors', async () => {
    const executor = new RetryExecutor(noDelay);
    const operation = vi.fn().mockRejectedValue(new Error('plain'));

    await expect(executor.execute(operation)).rejects.toThrow('plain');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should report each retry', async () => {
    const executor = new RetryExecutor(noDelay);
    const onRetry = vi.fn();
    const operation = vi.fn().mockRejectedValueOnce(retryable()).mockResolvedValueOnce(1);

    await executor.execute(operation, { onRetry });

    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
    expect(onRetry.mock.calls[0][2]).toBe(0);
  });

  it('should not start when the signal is already aborted', async () => {
    const executor = new RetryExecutor(noDelay);
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn().mockResolvedValue('ok');

    await expect(executor.execute(operation, { signal: controller.signal })).rejects.toBeInstanceOf(
      RunCancelledError
    );
    expect(operation).not.toHaveBeenCalled();
  });

  it('should stop retrying when aborted during backoff', async () => {
    const executor = new RetryExecutor({ maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 1000, jitterFactor: 0 });
    const controller = new AbortController();
    const operation = vi.fn().mockRejectedValue(retryable());

    const pending = executor.execute(operation, { signal: controller.signal });
    setTimeout(() => controller.abort(new RegionTimeoutError('eu-west-1', 5)), 5);

    await expect(pending).rejects.toBeInstanceOf(RegionTimeoutError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('should reject with a cancellation when aborted without a reason during backoff', async () => {
    const executor = new RetryExecutor({ maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 1000, jitterFactor: 0 });
    const controller = new AbortController();
    const operation = vi.fn().mockRejectedValue(retryable());

    const pending = executor.execute(operation, { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);

    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });

  describe('calculateDelay', () => {
    const executor = new RetryExecutor({ maxAttempts: 5, baseDelayMs: 100, maxDelayMs: 1000, jitterFactor: 0 });

    it('should back off exponentially', () => {
      expect(executor.calculateDelay(1, retryable())).toBe(100);
      expect(executor.calculateDelay(3, retryable())).toBe(400);
    });

    it('should double the base delay for throttling and cap it', () => {
      expect(executor.calculateDelay(2, new ThrottlingError('slow down'))).toBe(400);
      expect(executor.calculateDelay(4, new ThrottlingError('slow down'))).toBe(1000);
    });
  });
});

describe('abortReason', () => {
  it('should turn a bare abort into a cancellation', () => {
    const controller = new AbortController();
    controller.abort();

    expect(abortReason(controller.signal)).toBeInstanceOf(RunCancelledError);
  });

  it('should keep a history error given as the reason', () => {
    const controller = new AbortController();
    const timeout = new RegionTimeoutError('eu-west-1', 5);
    controller.abort(timeout);

    expect(abortReason(controller.signal)).toBe(timeout);
  });

  it('should not pass other errors through', () => {
    const controller = new AbortController();
    controller.abort(new Error('elsewhere'));

    expect(abortReason(controller.signal)).toBeInstanceOf(RunCancelledError);
  });
});

describe('sleep', () => {
  it('should reject with a cancellation on a bare abort', async () => {
    const controller = new AbortController();
    const pending = sleep(1000, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });
});

describe('withTimeout', () => {
  const options = {
    onTimeout: () => new RegionTimeoutError('eu-west-1', 10),
    onCancel: () => new RunCancelledError('eu-west-1'),
  };

  it('should resolve with the operation result', async () => {
    await expect(withTimeout(async () => 'done', 1000, options)).resolves.toBe('done');
  });

  it('should reject with the timeout error and abort the operation', async () => {
    const seen: AbortSignal[] = [];
    const never = (signal: AbortSignal): Promise<string> => {
      seen.push(signal);
      return new Promise<string>(() => undefined);
    };

    await expect(withTimeout(never, 10, options)).rejects.toBeInstanceOf(RegionTimeoutError);
    expect(seen[0].aborted).toBe(true);
  });

  it('should reject with the cancel error when the parent aborts', async () => {
    const parent = new AbortController();
    const pending = withTimeout(() => new Promise<string>(() => undefined), 1000, {
      ...options,
      parentSignal: parent.signal,
    });
    parent.abort();

    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });

  it('should not start when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    const operation = vi.fn().mockResolvedValue('x');

    await expect(withTimeout(operation, 1000, { ...options, parentSignal: parent.signal })).rejects.toBeInstanceOf(
      RunCancelledError
    );
    expect(operation).not.toHaveBeenCalled();
  });

  it('should pass operation errors through', async () => {
    await expect(withTimeout(async () => Promise.reject(new Error('inner')), 1000, options)).rejects.toThrow('inner');
  });
});

describe('Semaphore', () => {
  it('should bound the number of concurrent tasks', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let maxActive = 0;

    const task = async (): Promise<void> => {
      active++;
      maxActive = Math.max(maxActive, active);
      await sleep(5);
      active--;
    };

    await Promise.all(Array.from({ length: 6 }, () => semaphore.run(task)));

    expect(maxActive).toBe(2);
    expect(semaphore.available).toBe(2);
  });

  it('should release the permit when a task fails', async () => {
    const semaphore = new Semaphore(1);

    await expect(semaphore.run(async () => Promise.reject(new Error('fail')))).rejects.toThrow('fail');
    await expect(semaphore.run(async () => 'next')).resolves.toBe('next');
  });
});
