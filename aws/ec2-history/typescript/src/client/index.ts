/**
 * EC2 History Client
 *
 * Wires per-region AWS SDK clients, the CloudTrail and EC2 sources, and
 * the runner behind one entry point.
 */

import { CloudTrailClient } from '@aws-sdk/client-cloudtrail';
import type { CloudTrailClientConfig } from '@aws-sdk/client-cloudtrail';
import { EC2Client } from '@aws-sdk/client-ec2';
import { fromIni, fromTemporaryCredentials, fromTokenFile } from '@aws-sdk/credential-providers';

import type { CredentialsConfig, HistoryConfig } from '../config/config.js';
import {
  DEFAULT_DISCOVERY_REGION,
  DEFAULT_RETRY_CONFIG,
  DEFAULT_SNAPSHOT_STATES,
} from '../config/defaults.js';
import { validateConfig, validateWindow } from '../config/validation.js';
import type { Logger } from '../observability/logging.js';
import { ConsoleLogger } from '../observability/logging.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { InMemoryMetricsCollector } from '../observability/metrics.js';
import { RetryExecutor } from '../resilience/retry.js';
import type { LifecycleReport } from '../report/types.js';
import { HistoryRunner } from '../runner/runner.js';
import { CloudTrailEventSource, lookupEventsWith } from '../sources/cloudtrail.js';
import { Ec2RegionList, Ec2RunningSnapshotSource, describeInstancesWith, describeRegionsWith } from '../sources/ec2.js';
import type { HistorySources, RegionList } from '../sources/types.js';
import type { ReportWindow } from '../types/window.js';

type AwsCredentials = CloudTrailClientConfig['credentials'];

const ROLE_SESSION_NAME = 'ec2-history';

/**
 * Optional collaborators. Anything left out is built from the config.
 */
export interface Ec2HistoryClientOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
  sources?: HistorySources;
  regionList?: RegionList;
}

export interface ReconstructOptions {
  signal?: AbortSignal;
}

/**
 * Resolves the configured credentials into what the SDK clients take.
 * `undefined` leaves the SDK's default provider chain in charge.
 */
export function resolveCredentials(credentials?: CredentialsConfig): AwsCredentials {
  if (!credentials) {
    return undefined;
  }

  switch (credentials.type) {
    case 'static':
      return {
        accessKeyId: credentials.accessKeyId,
        secretAccessKey: credentials.secretAccessKey,
        sessionToken: credentials.sessionToken,
      };
    case 'profile':
      return fromIni({ profile: credentials.profileName });
    case 'role':
      return fromTemporaryCredentials({
        params: {
          RoleArn: credentials.roleArn,
          ExternalId: credentials.externalId,
          RoleSessionName: ROLE_SESSION_NAME,
        },
      });
    case 'webIdentity':
      return fromTokenFile({
        roleArn: credentials.roleArn,
        webIdentityTokenFile: credentials.tokenFile,
        roleSessionName: ROLE_SESSION_NAME,
      });
    case 'environment':
      return undefined;
  }
}

export class Ec2HistoryClient {
  private readonly config: HistoryConfig;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;
  private readonly credentials: AwsCredentials;
  private readonly cloudTrailClients = new Map<string, CloudTrailClient>();
  private readonly ec2Clients = new Map<string, EC2Client>();
  private readonly regionList: RegionList;
  private readonly retryExecutor: RetryExecutor;
  private readonly runner: HistoryRunner;

  /**
   * @throws {ConfigurationError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const client = new Ec2HistoryClient(
   *   new HistoryConfigBuilder().withProfileCredentials('audit').withConcurrency(8).build()
   * );
   * const report = await client.reconstruct(windowFromDates('2024-12-01', '2024-12-31'));
   * process.stdout.write(renderCsv(report));
   * await client.close();
   * ```
   */
  constructor(config: HistoryConfig, options: Ec2HistoryClientOptions = {}) {
    validateConfig(config);
    this.config = config;

    this.logger = options.logger ?? new ConsoleLogger(config.logLevel ?? 'info');
    this.metrics = options.metrics ?? new InMemoryMetricsCollector();
    this.credentials = resolveCredentials(config.credentials);
    this.retryExecutor = new RetryExecutor(config.retryConfig ?? DEFAULT_RETRY_CONFIG);

    const sources = options.sources ?? this.createAwsSources();
    this.regionList =
      options.regionList ??
      new Ec2RegionList(describeRegionsWith(this.ec2Client(config.discoveryRegion ?? DEFAULT_DISCOVERY_REGION)));

    this.runner = new HistoryRunner({
      sources,
      concurrency: config.concurrency,
      retryConfig: config.retryConfig,
      regionTimeoutMs: config.regionTimeoutMs,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  /**
   * Regions a run covers: the configured list, or every enabled region.
   */
  async listRegions(signal?: AbortSignal): Promise<string[]> {
    if (this.config.regions) {
      return [...this.config.regions];
    }
    return this.retryExecutor.execute(() => this.regionList.listRegions(signal), { signal });
  }

  /**
   * Reconstructs instance lifecycles over `window` across all regions.
   *
   * @throws {InvalidWindowError} Before any AWS call, if the window is invalid
   * @throws {RunCancelledError} If `signal` aborts before the report is built
   */
  async reconstruct(window: ReportWindow, options: ReconstructOptions = {}): Promise<LifecycleReport> {
    validateWindow(window);
    const regions = await this.listRegions(options.signal);
    return this.runner.run({ window, regions, signal: options.signal });
  }

  getLogger(): Logger {
    return this.logger;
  }

  getMetrics(): MetricsCollector {
    return this.metrics;
  }

  /**
   * Releases every SDK client created so far.
   */
  async close(): Promise<void> {
    this.logger.debug('Closing EC2 history client', {
      cloudTrailClients: this.cloudTrailClients.size,
      ec2Clients: this.ec2Clients.size,
    });
    this.cloudTrailClients.forEach((client) => client.destroy());
    this.ec2Clients.forEach((client) => client.destroy());
    this.cloudTrailClients.clear();
    this.ec2Clients.clear();
  }

  private createAwsSources(): HistorySources {
    const cloudTrail = new CloudTrailEventSource(
      lookupEventsWith((region) => this.cloudTrailClient(region)),
      this.logger
    );
    return {
      launches: cloudTrail,
      terminations: cloudTrail,
      running: new Ec2RunningSnapshotSource(
        describeInstancesWith((region) => this.ec2Client(region)),
        this.config.snapshotStates ?? DEFAULT_SNAPSHOT_STATES
      ),
    };
  }

  // SDK-level retries are turned off: the RetryExecutor owns the budget.
  private cloudTrailClient(region: string): CloudTrailClient {
    let client = this.cloudTrailClients.get(region);
    if (!client) {
      client = new CloudTrailClient({ region, credentials: this.credentials, maxAttempts: 1 });
      this.cloudTrailClients.set(region, client);
    }
    return client;
  }

  private ec2Client(region: string): EC2Client {
    let client = this.ec2Clients.get(region);
    if (!client) {
      client = new EC2Client({ region, credentials: this.credentials, maxAttempts: 1 });
      this.ec2Clients.set(region, client);
    }
    return client;
  }
}

/**
 * Creates an EC2 history client from configuration.
 */
export function createEc2HistoryClient(
  config: HistoryConfig,
  options?: Ec2HistoryClientOptions
): Ec2HistoryClient {
  return new Ec2HistoryClient(config, options);
}
