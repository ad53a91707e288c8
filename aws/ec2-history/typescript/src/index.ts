/**
 * AWS EC2 History Integration
 *
 * Reconstructs the lifecycle of EC2 instances across every region of an
 * account for a closed reporting window, by correlating CloudTrail launch
 * and termination events with a snapshot of currently running instances.
 *
 * @module @lifecycle-audit/aws-ec2-history
 */

// ============================================================================
// Configuration
// ============================================================================

export type { HistoryConfig, CredentialsConfig, RetryConfig } from './config/index.js';
export {
  HistoryConfigBuilder,
  loadConfigFromEnv,
  validateConfig,
  validateWindow,
  DEFAULT_CONCURRENCY,
  DEFAULT_REGION_TIMEOUT,
  DEFAULT_RETRY_CONFIG,
} from './config/index.js';

// ============================================================================
// Error Handling
// ============================================================================

export * from './error/index.js';

// ============================================================================
// Types
// ============================================================================

export * from './types/index.js';

// ============================================================================
// Normalization and Correlation
// ============================================================================

export * from './normalize/index.js';
export * from './correlation/index.js';

// ============================================================================
// Report
// ============================================================================

export * from './report/index.js';

// ============================================================================
// Sources
// ============================================================================

export * from './sources/index.js';

// ============================================================================
// Observability
// ============================================================================

export * from './observability/index.js';

// ============================================================================
// Resilience
// ============================================================================

export * from './resilience/index.js';

// ============================================================================
// Runner and Client
// ============================================================================

export * from './runner/index.js';
export type { Ec2HistoryClientOptions, ReconstructOptions } from './client/index.js';
export { Ec2HistoryClient, createEc2HistoryClient, resolveCredentials } from './client/index.js';

// ============================================================================
// Version
// ============================================================================

export const EC2_HISTORY_INTEGRATION_VERSION = '0.1.0';
