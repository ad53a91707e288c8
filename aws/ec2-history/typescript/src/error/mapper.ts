/**
 * Error mapping utilities for converting AWS SDK errors to HistoryError instances.
 */

import { HistoryError } from './error.js';
import { AccessDeniedError, RunCancelledError, ServiceError, ThrottlingError } from './categories.js';

/**
 * AWS SDK error interface
 */
interface AwsError extends Error {
  code?: string;
  $metadata?: {
    httpStatusCode?: number;
    requestId?: string;
  };
  $fault?: 'client' | 'server';
  $retryable?: { throttling?: boolean };
}

const THROTTLING_CODES = new Set([
  'Throttling',
  'ThrottlingException',
  'RequestLimitExceeded',
  'TooManyRequestsException',
  'RequestThrottled',
  'RequestThrottledException',
]);

const ACCESS_DENIED_CODES = new Set([
  'AccessDenied',
  'AccessDeniedException',
  'UnauthorizedOperation',
  'AuthFailure',
  'OptInRequired',
  'UnrecognizedClientException',
]);

const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'TimeoutError',
  'RequestTimeout',
  'RequestTimeoutException',
]);

/**
 * Type guard to check if error looks like an AWS SDK error
 */
function isAwsError(error: unknown): error is AwsError {
  return error instanceof Error;
}

/**
 * Maps AWS SDK errors to HistoryError instances
 *
 * @param error - Whatever the SDK call rejected with
 * @param region - Region the call was made against
 */
export function mapAwsError(error: unknown, region?: string): HistoryError {
  if (error instanceof HistoryError) {
    return error;
  }

  if (!isAwsError(error)) {
    return new HistoryError({
      code: 'UnknownError',
      message: String(error),
      isRetryable: false,
      region,
    });
  }

  if (error.name === 'AbortError') {
    return new RunCancelledError(region);
  }

  const errorCode = error.code || error.name || 'UnknownError';
  const message = error.message;
  const httpStatusCode = error.$metadata?.httpStatusCode;

  if (THROTTLING_CODES.has(errorCode) || error.$retryable?.throttling === true) {
    return new ThrottlingError(message, region, error);
  }

  if (ACCESS_DENIED_CODES.has(errorCode)) {
    return new AccessDeniedError(message, region, error);
  }

  if (TRANSIENT_NETWORK_CODES.has(errorCode)) {
    return new ServiceError({
      code: errorCode,
      message: message || 'Network error',
      httpStatusCode,
      isRetryable: true,
      region,
      originalError: error,
    });
  }

  return mapByStatusOrFault(error, errorCode, message, region, httpStatusCode);
}

/**
 * Maps errors based on HTTP status code or fault type
 */
function mapByStatusOrFault(
  error: AwsError,
  errorCode: string,
  message: string,
  region: string | undefined,
  httpStatusCode?: number
): HistoryError {
  if (httpStatusCode === 403) {
    return new AccessDeniedError(message, region, error);
  }

  if (httpStatusCode === 429) {
    return new ThrottlingError(message, region, error);
  }

  const isRetryable =
    error.$fault === 'server' || (httpStatusCode !== undefined && httpStatusCode >= 500);

  return new ServiceError({
    code: errorCode,
    message: message || 'An error occurred',
    httpStatusCode,
    isRetryable,
    region,
    originalError: error,
  });
}
