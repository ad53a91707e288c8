/**
 * Configuration validation.
 * @module config/validation
 */

import { ConfigurationError, InvalidRegionError, InvalidWindowError } from '../error/categories.js';
import type { RetryConfig } from '../resilience/types.js';
import type { ReportWindow } from '../types/window.js';
import type { HistoryConfig, CredentialsConfig } from './config.js';
import { MAX_CONCURRENCY } from './defaults.js';

const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;

/**
 * Validates client configuration.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: HistoryConfig): void {
  if (config.regions !== undefined) {
    if (config.regions.length === 0) {
      throw new ConfigurationError('regions must not be empty when provided');
    }
    config.regions.forEach(validateRegion);
  }

  if (config.discoveryRegion !== undefined) {
    validateRegion(config.discoveryRegion);
  }

  if (config.credentials !== undefined) {
    validateCredentials(config.credentials);
  }

  if (config.concurrency !== undefined) {
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1 || config.concurrency > MAX_CONCURRENCY) {
      throw new ConfigurationError(`concurrency must be an integer between 1 and ${MAX_CONCURRENCY}`);
    }
  }

  if (config.retryConfig !== undefined) {
    validateRetryConfig(config.retryConfig);
  }

  if (config.regionTimeoutMs !== undefined) {
    if (!Number.isFinite(config.regionTimeoutMs) || config.regionTimeoutMs <= 0) {
      throw new ConfigurationError('regionTimeoutMs must be a positive number');
    }
  }

  if (config.snapshotStates !== undefined && config.snapshotStates.length === 0) {
    throw new ConfigurationError('snapshotStates must not be empty when provided');
  }
}

/**
 * Validates a report window. The window is inclusive on both ends, so a
 * window with `start === end` is accepted.
 *
 * @throws {InvalidWindowError} If a bound is not finite or end precedes start
 */
export function validateWindow(window: ReportWindow): void {
  if (!Number.isFinite(window.start) || !Number.isFinite(window.end) || window.end < window.start) {
    throw InvalidWindowError.forBounds(window.start, window.end);
  }
}

/**
 * Validates AWS region format.
 *
 * @throws {InvalidRegionError} If region is invalid
 */
export function validateRegion(region: string): void {
  if (!REGION_PATTERN.test(region)) {
    throw new InvalidRegionError(region);
  }
}

function validateCredentials(credentials: CredentialsConfig): void {
  switch (credentials.type) {
    case 'static':
      if (credentials.accessKeyId.trim().length === 0) {
        throw new ConfigurationError('Static credentials require non-empty accessKeyId');
      }
      if (credentials.secretAccessKey.trim().length === 0) {
        throw new ConfigurationError('Static credentials require non-empty secretAccessKey');
      }
      break;
    case 'profile':
      if (credentials.profileName.trim().length === 0) {
        throw new ConfigurationError('Profile credentials require non-empty profileName');
      }
      break;
    case 'role':
    case 'webIdentity':
      if (!credentials.roleArn.startsWith('arn:aws')) {
        throw new ConfigurationError(`Invalid role ARN: ${credentials.roleArn}`);
      }
      break;
    case 'environment':
      break;
  }
}

function validateRetryConfig(retry: RetryConfig): void {
  if (!Number.isInteger(retry.maxAttempts) || retry.maxAttempts < 1) {
    throw new ConfigurationError('retryConfig.maxAttempts must be a positive integer');
  }
  if (retry.baseDelayMs < 0 || retry.maxDelayMs < retry.baseDelayMs) {
    throw new ConfigurationError('retryConfig delays must satisfy 0 <= baseDelayMs <= maxDelayMs');
  }
  if (retry.jitterFactor !== undefined && (retry.jitterFactor < 0 || retry.jitterFactor > 1)) {
    throw new ConfigurationError('retryConfig.jitterFactor must be between 0 and 1');
  }
}
