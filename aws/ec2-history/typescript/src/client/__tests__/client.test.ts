/**
 * Tests for the EC2 History Client
 */

import { describe, it, expect } from 'vitest';
import { Ec2HistoryClient, createEc2HistoryClient, resolveCredentials } from '../index.js';
import { HistoryConfigBuilder } from '../../config/config.js';
import { ConfigurationError, InvalidWindowError, RunCancelledError, ThrottlingError } from '../../error/categories.js';
import { NoopLogger } from '../../observability/logging.js';
import { InMemoryMetricsCollector } from '../../observability/metrics.js';
import type { RegionList } from '../../sources/types.js';
import { windowFromDates } from '../../types/window.js';
import { FakeHistorySources } from '../../runner/__tests__/fake-sources.js';

const window = windowFromDates('2025-01-01', '2025-01-31');
const noDelay = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 };

class FakeRegionList implements RegionList {
  calls = 0;
  private readonly regions: string[];
  private readonly failures: number;

  constructor(regions: string[], failures = 0) {
    this.regions = regions;
    this.failures = failures;
  }

  async listRegions(): Promise<string[]> {
    this.calls++;
    if (this.calls <= this.failures) {
      throw new ThrottlingError('Rate exceeded');
    }
    return [...this.regions];
  }
}

function sources(): FakeHistorySources {
  return new FakeHistorySources({
    'eu-west-1': {
      launches: [{ eventId: 'e-1', instanceId: 'i-1', instanceType: 't3.micro', eventTime: '2025-01-02T00:00:00Z' }],
    },
    'us-east-1': {
      running: [{ instanceId: 'i-2', instanceType: 'm5.large', launchTime: new Date('2024-06-01T00:00:00Z') }],
    },
  });
}

describe('Ec2HistoryClient', () => {
  it('should reject an invalid configuration', () => {
    expect(() => new Ec2HistoryClient({ regions: [] }, { logger: new NoopLogger() })).toThrow(ConfigurationError);
  });

  it('should use the configured regions', async () => {
    const regionList = new FakeRegionList(['ap-south-1']);
    const client = createEc2HistoryClient(
      new HistoryConfigBuilder().withRegions(['us-east-1']).build(),
      { logger: new NoopLogger(), sources: sources(), regionList }
    );

    await expect(client.listRegions()).resolves.toEqual(['us-east-1']);
    expect(regionList.calls).toBe(0);
  });

  it('should enumerate regions with retries', async () => {
    const regionList = new FakeRegionList(['eu-west-1', 'us-east-1'], 2);
    const client = new Ec2HistoryClient(
      { retryConfig: noDelay },
      { logger: new NoopLogger(), sources: sources(), regionList }
    );

    await expect(client.listRegions()).resolves.toEqual(['eu-west-1', 'us-east-1']);
    expect(regionList.calls).toBe(3);
  });

  it('should reconstruct every enumerated region', async () => {
    const metrics = new InMemoryMetricsCollector();
    const client = new Ec2HistoryClient(
      { retryConfig: noDelay },
      {
        logger: new NoopLogger(),
        metrics,
        sources: sources(),
        regionList: new FakeRegionList(['us-east-1', 'eu-west-1']),
      }
    );

    const report = await client.reconstruct(window);

    expect(report.complete).toBe(true);
    expect(report.records.map((record) => `${record.key.region}/${record.key.instanceId}`)).toEqual([
      'eu-west-1/i-1',
      'us-east-1/i-2',
    ]);
    expect(client.getMetrics()).toBe(metrics);
    await client.close();
  });

  it('should check the window before listing regions', async () => {
    const regionList = new FakeRegionList(['us-east-1']);
    const client = new Ec2HistoryClient({}, { logger: new NoopLogger(), sources: sources(), regionList });

    await expect(client.reconstruct({ start: window.end, end: window.start })).rejects.toBeInstanceOf(
      InvalidWindowError
    );
    expect(regionList.calls).toBe(0);
  });

  it('should surface a cancellation during region discovery as RunCancelledError', async () => {
    const controller = new AbortController();
    const regionList = new FakeRegionList(['us-east-1'], Number.POSITIVE_INFINITY);
    const client = new Ec2HistoryClient(
      { retryConfig: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 1000, jitterFactor: 0 } },
      { logger: new NoopLogger(), sources: sources(), regionList }
    );

    const pending = client.reconstruct(window, { signal: controller.signal });
    setTimeout(() => controller.abort(), 5);

    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
    expect(regionList.calls).toBe(1);
  });
});

describe('resolveCredentials', () => {
  it('should defer to the default chain', () => {
    expect(resolveCredentials()).toBeUndefined();
    expect(resolveCredentials({ type: 'environment' })).toBeUndefined();
  });

  it('should pass static credentials through', () => {
    expect(
      resolveCredentials({ type: 'static', accessKeyId: 'test-key', secretAccessKey: 'test-secret' })
    ).toEqual({ accessKeyId: 'test-key', secretAccessKey: 'test-secret', sessionToken: undefined });
  });

  it('should build a provider for profiles', () => {
    expect(typeof resolveCredentials({ type: 'profile', profileName: 'audit' })).toBe('function');
  });
});
