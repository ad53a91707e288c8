import type { RecordKind } from '../types/raw.js';
import { HistoryError } from './error.js';

/**
 * Error thrown when the client or a run is misconfigured
 */
export class ConfigurationError extends HistoryError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ConfigurationError',
      message,
      isRetryable: false,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Window end before window start, a bound that is not a finite timestamp,
 * or a calendar date that does not exist. Detected before any fetch begins.
 */
export class InvalidWindowError extends ConfigurationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'InvalidWindowError';
  }

  static forBounds(start: number, end: number): InvalidWindowError {
    return new InvalidWindowError(`Invalid report window: start=${start} end=${end}`, { start, end });
  }
}

/**
 * Error for an invalid region identifier
 */
export class InvalidRegionError extends ConfigurationError {
  constructor(region: string) {
    super(`Invalid region: ${region}`);
    this.name = 'InvalidRegionError';
  }
}

/**
 * A single raw record that could not be normalized. Scoped to that record:
 * it is skipped and reported, the batch carries on.
 */
export class MalformedRecordError extends HistoryError {
  public readonly recordKind: RecordKind;
  public readonly reason: string;

  constructor(region: string, recordKind: RecordKind, reason: string, details?: Record<string, unknown>) {
    super({
      code: 'MalformedRecord',
      message: `Malformed ${recordKind} record in ${region}: ${reason}`,
      isRetryable: false,
      region,
      details,
    });
    this.name = 'MalformedRecordError';
    this.recordKind = recordKind;
    this.reason = reason;
  }
}

/**
 * A region that exhausted its retry budget. The region contributes nothing
 * to the report and is marked failed.
 */
export class RegionFetchError extends HistoryError {
  public readonly attempts: number;

  constructor(region: string, attempts: number, cause: Error) {
    super({
      code: 'RegionFetchFailure',
      message: `Fetch failed for region ${region} after ${attempts} attempt(s): ${cause.message}`,
      isRetryable: false,
      region,
      originalError: cause,
    });
    this.name = 'RegionFetchError';
    this.attempts = attempts;
  }
}

/**
 * A region that did not finish within its time budget
 */
export class RegionTimeoutError extends HistoryError {
  constructor(region: string, timeoutMs: number) {
    super({
      code: 'RegionTimeout',
      message: `Region ${region} did not complete within ${timeoutMs}ms`,
      isRetryable: false,
      region,
      details: { timeoutMs },
    });
    this.name = 'RegionTimeoutError';
  }
}

/**
 * The caller aborted the run before finalization
 */
export class RunCancelledError extends HistoryError {
  constructor(region?: string) {
    super({
      code: 'RunCancelled',
      message: region ? `Run cancelled while fetching ${region}` : 'Run cancelled',
      isRetryable: false,
      region,
    });
    this.name = 'RunCancelledError';
  }
}

/**
 * Request rate exceeded on the AWS side
 */
export class ThrottlingError extends HistoryError {
  constructor(message: string, region?: string, originalError?: Error) {
    super({
      code: 'ThrottlingException',
      message,
      httpStatusCode: 400,
      isRetryable: true,
      region,
      originalError,
    });
    this.name = 'ThrottlingError';
  }
}

/**
 * Credentials lack permission for the call
 */
export class AccessDeniedError extends HistoryError {
  constructor(message: string, region?: string, originalError?: Error) {
    super({
      code: 'AccessDenied',
      message,
      httpStatusCode: 403,
      isRetryable: false,
      region,
      originalError,
    });
    this.name = 'AccessDeniedError';
  }
}

/**
 * Server side or transport failure
 */
export class ServiceError extends HistoryError {
  constructor(options: {
    code: string;
    message: string;
    httpStatusCode?: number;
    isRetryable: boolean;
    region?: string;
    originalError?: Error;
  }) {
    super(options);
    this.name = 'ServiceError';
  }
}
