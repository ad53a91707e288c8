/**
 * Configuration
 *
 * Configuration interfaces and utilities for the EC2 history client.
 */

export type { HistoryConfig, CredentialsConfig, RetryConfig } from './config.js';
export { HistoryConfigBuilder } from './config.js';
export {
  DEFAULT_DISCOVERY_REGION,
  DEFAULT_CONCURRENCY,
  MAX_CONCURRENCY,
  DEFAULT_REGION_TIMEOUT,
  DEFAULT_SNAPSHOT_STATES,
  DEFAULT_RETRY_CONFIG,
} from './defaults.js';
export { validateConfig, validateWindow, validateRegion } from './validation.js';
export { loadConfigFromEnv, getEnvNumber } from './environment.js';
