/**
 * Configuration types and interfaces for the EC2 history client.
 * @module config
 */

import type { LogLevel } from '../observability/logging.js';
import type { RetryConfig } from '../resilience/types.js';

export type { RetryConfig };

/**
 * Credentials configuration with support for multiple authentication methods.
 */
export type CredentialsConfig =
  | { type: 'static'; accessKeyId: string; secretAccessKey: string; sessionToken?: string }
  | { type: 'profile'; profileName: string }
  | { type: 'role'; roleArn: string; externalId?: string }
  | { type: 'webIdentity'; roleArn: string; tokenFile: string }
  | { type: 'environment' };

/**
 * Main configuration interface for the EC2 history client.
 */
export interface HistoryConfig {
  /**
   * Credentials used for every regional client.
   * Defaults to the AWS SDK credential chain.
   */
  credentials?: CredentialsConfig;

  /**
   * Regions to reconstruct. When omitted, every enabled region of the
   * account is enumerated through `discoveryRegion`.
   * @example ['us-east-1', 'eu-west-1']
   */
  regions?: string[];

  /**
   * Region used to enumerate regions.
   * @default 'us-east-1'
   */
  discoveryRegion?: string;

  /**
   * Maximum number of regions fetched at the same time.
   * @default 5
   */
  concurrency?: number;

  /**
   * Retry policy applied to each of a region's three fetches.
   */
  retryConfig?: RetryConfig;

  /**
   * Overall time budget for one region, across its fetches and retries.
   * @default 120000
   */
  regionTimeoutMs?: number;

  /**
   * Instance states that count as "currently active" in the snapshot.
   * @default ['running']
   */
  snapshotStates?: string[];

  /**
   * Minimum level for the default console logger.
   * @default 'info'
   */
  logLevel?: LogLevel;
}

/**
 * Fluent builder for creating HistoryConfig objects.
 */
export class HistoryConfigBuilder {
  private config: HistoryConfig = {};

  /**
   * Sets static credentials.
   */
  withStaticCredentials(
    accessKeyId: string,
    secretAccessKey: string,
    sessionToken?: string
  ): this {
    this.config.credentials = {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken,
    };
    return this;
  }

  /**
   * Sets profile-based credentials.
   */
  withProfileCredentials(profileName: string): this {
    this.config.credentials = { type: 'profile', profileName };
    return this;
  }

  /**
   * Sets role-based credentials (assumed through STS).
   */
  withRoleCredentials(roleArn: string, externalId?: string): this {
    this.config.credentials = { type: 'role', roleArn, externalId };
    return this;
  }

  /**
   * Sets web identity credentials.
   */
  withWebIdentityCredentials(roleArn: string, tokenFile: string): this {
    this.config.credentials = { type: 'webIdentity', roleArn, tokenFile };
    return this;
  }

  /**
   * Uses the SDK's default credential chain.
   */
  withEnvironmentCredentials(): this {
    this.config.credentials = { type: 'environment' };
    return this;
  }

  /**
   * Restricts the run to the given regions.
   */
  withRegions(regions: string[]): this {
    this.config.regions = [...regions];
    return this;
  }

  withDiscoveryRegion(region: string): this {
    this.config.discoveryRegion = region;
    return this;
  }

  withConcurrency(concurrency: number): this {
    this.config.concurrency = concurrency;
    return this;
  }

  withRetryConfig(config: RetryConfig): this {
    this.config.retryConfig = config;
    return this;
  }

  withRegionTimeout(timeoutMs: number): this {
    this.config.regionTimeoutMs = timeoutMs;
    return this;
  }

  withSnapshotStates(states: string[]): this {
    this.config.snapshotStates = [...states];
    return this;
  }

  withLogLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Returns a copy of the configuration built so far.
   */
  build(): HistoryConfig {
    return { ...this.config };
  }
}
