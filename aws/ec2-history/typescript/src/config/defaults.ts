/**
 * Default configuration values.
 * @module config/defaults
 */

import type { RetryConfig } from '../resilience/types.js';
import { createDefaultRetryConfig } from '../resilience/retry.js';

/**
 * Region used to enumerate the account's regions.
 */
export const DEFAULT_DISCOVERY_REGION = 'us-east-1';

/**
 * Regions fetched at the same time. CloudTrail LookupEvents is limited to
 * two requests per second per region and account, so the bound is kept low.
 */
export const DEFAULT_CONCURRENCY = 5;

export const MAX_CONCURRENCY = 50;

/**
 * Time budget for one region, in milliseconds (2 minutes).
 */
export const DEFAULT_REGION_TIMEOUT = 120000;

export const DEFAULT_SNAPSHOT_STATES: readonly string[] = ['running'];

/**
 * Default retry configuration instance.
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = createDefaultRetryConfig();
