/**
 * Base error class for all EC2 history errors.
 * Carries an error code, retryability, the region it relates to (if any)
 * and the original error from the AWS SDK.
 */
export class HistoryError extends Error {
  /**
   * Error code (e.g., 'MalformedRecord', 'RegionFetchFailure', 'ThrottlingException')
   */
  public readonly code: string;

  /**
   * HTTP status code associated with the error, if applicable
   */
  public readonly httpStatusCode?: number;

  /**
   * Indicates whether the failed operation can be retried
   */
  public readonly isRetryable: boolean;

  /**
   * Region the error relates to
   */
  public readonly region?: string;

  /**
   * The original error, if applicable
   */
  public readonly originalError?: Error;

  /**
   * Additional error details
   */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    code: string;
    message: string;
    httpStatusCode?: number;
    isRetryable?: boolean;
    region?: string;
    originalError?: Error;
    details?: Record<string, unknown>;
  }) {
    super(options.message);
    this.name = 'HistoryError';
    this.code = options.code;
    this.httpStatusCode = options.httpStatusCode;
    this.isRetryable = options.isRetryable ?? false;
    this.region = options.region;
    this.originalError = options.originalError;
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Returns a string representation of the error
   */
  toString(): string {
    let result = `[${this.code}] ${this.message}`;
    if (this.region) {
      result += ` (region ${this.region})`;
    }
    if (this.httpStatusCode) {
      result += ` (HTTP ${this.httpStatusCode})`;
    }
    if (this.isRetryable) {
      result += ' [retryable]';
    }
    return result;
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatusCode: this.httpStatusCode,
      isRetryable: this.isRetryable,
      region: this.region,
      details: this.details,
    };
  }
}
