/**
 * Environment variable loading for EC2 history configuration.
 * @module config/environment
 */

import { isLogLevel } from '../observability/logging.js';
import type { HistoryConfig, CredentialsConfig } from './config.js';
import { DEFAULT_DISCOVERY_REGION, DEFAULT_RETRY_CONFIG } from './defaults.js';

type Env = Record<string, string | undefined>;

/**
 * Loads configuration from environment variables.
 *
 * Supported environment variables:
 * - AWS_REGION / AWS_DEFAULT_REGION: region used to enumerate regions
 * - AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_SESSION_TOKEN: static credentials
 * - AWS_PROFILE: profile-based credentials
 * - AWS_ROLE_ARN, AWS_EXTERNAL_ID: role to assume
 * - AWS_WEB_IDENTITY_TOKEN_FILE: web identity token file (with AWS_ROLE_ARN)
 * - EC2_HISTORY_REGIONS: comma separated list of regions
 * - EC2_HISTORY_CONCURRENCY: concurrent regions
 * - EC2_HISTORY_MAX_ATTEMPTS: attempts per fetch
 * - EC2_HISTORY_REGION_TIMEOUT_MS: time budget per region
 * - EC2_HISTORY_LOG_LEVEL: error | warn | info | debug | trace
 *
 * Values are not validated here; pass the result through `validateConfig`.
 */
export function loadConfigFromEnv(env: Env = process.env): HistoryConfig {
  const config: HistoryConfig = {
    discoveryRegion: env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_DISCOVERY_REGION,
    credentials: loadCredentialsFromEnv(env),
  };

  const regions = env.EC2_HISTORY_REGIONS;
  if (regions) {
    config.regions = regions
      .split(',')
      .map((region) => region.trim())
      .filter((region) => region.length > 0);
  }

  const concurrency = getEnvNumber(env, 'EC2_HISTORY_CONCURRENCY');
  if (concurrency !== undefined) {
    config.concurrency = concurrency;
  }

  const maxAttempts = getEnvNumber(env, 'EC2_HISTORY_MAX_ATTEMPTS');
  if (maxAttempts !== undefined) {
    config.retryConfig = { ...DEFAULT_RETRY_CONFIG, maxAttempts };
  }

  const regionTimeoutMs = getEnvNumber(env, 'EC2_HISTORY_REGION_TIMEOUT_MS');
  if (regionTimeoutMs !== undefined) {
    config.regionTimeoutMs = regionTimeoutMs;
  }

  const logLevel = env.EC2_HISTORY_LOG_LEVEL?.toLowerCase();
  if (logLevel && isLogLevel(logLevel)) {
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Loads credentials configuration from environment variables.
 *
 * Priority order:
 * 1. Web Identity (if AWS_WEB_IDENTITY_TOKEN_FILE and AWS_ROLE_ARN are set)
 * 2. Role (if AWS_ROLE_ARN is set without web identity)
 * 3. Static credentials (if AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are set)
 * 4. Profile (if AWS_PROFILE is set)
 * 5. Environment (default fallback for AWS SDK credential chain)
 */
function loadCredentialsFromEnv(env: Env): CredentialsConfig {
  const webIdentityTokenFile = env.AWS_WEB_IDENTITY_TOKEN_FILE;
  const roleArn = env.AWS_ROLE_ARN;

  if (webIdentityTokenFile && roleArn) {
    return { type: 'webIdentity', roleArn, tokenFile: webIdentityTokenFile };
  }

  if (roleArn) {
    return { type: 'role', roleArn, externalId: env.AWS_EXTERNAL_ID };
  }

  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;
  if (accessKeyId && secretAccessKey) {
    return {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken: env.AWS_SESSION_TOKEN,
    };
  }

  const profile = env.AWS_PROFILE;
  if (profile) {
    return { type: 'profile', profileName: profile };
  }

  return { type: 'environment' };
}

/**
 * Gets an environment variable as an integer, or undefined when unset or
 * not a number.
 */
export function getEnvNumber(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined) {
    return undefined;
  }

  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}
