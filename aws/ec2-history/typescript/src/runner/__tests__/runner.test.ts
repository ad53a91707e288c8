/**
 * Tests for the History Runner
 */

import { describe, it, expect } from 'vitest';
import { HistoryRunner } from '../runner.js';
import type { HistoryRunnerOptions } from '../runner.js';
import { FakeHistorySources } from './fake-sources.js';
import type { FakeRegion } from './fake-sources.js';
import {
  AccessDeniedError,
  ConfigurationError,
  InvalidWindowError,
  RunCancelledError,
  ThrottlingError,
} from '../../error/categories.js';
import { HistoryMetricNames, InMemoryMetricsCollector } from '../../observability/metrics.js';
import { STILL_RUNNING } from '../../types/records.js';
import { windowFromDates } from '../../types/window.js';

const window = windowFromDates('2025-01-01', '2025-01-31');
const noDelay = { maxAttempts: 4, baseDelayMs: 0, maxDelayMs: 0, jitterFactor: 0 };

function accountRegions(overrides: Record<string, Partial<FakeRegion>> = {}): Record<string, FakeRegion> {
  return {
    'us-east-1': {
      launches: [
        { eventId: 'e-1', instanceId: 'i-1', instanceType: 't3.micro', eventTime: '2025-01-03T10:00:00Z' },
      ],
      terminations: [{ eventId: 'e-2', instanceId: 'i-1', eventTime: '2025-01-04T10:00:00Z' }],
      running: [
        { instanceId: 'i-old', instanceType: 'm5.large', launchTime: new Date('2024-11-01T00:00:00Z') },
        { instanceId: 'i-new', instanceType: 't3.small', launchTime: new Date('2025-01-10T00:00:00Z') },
      ],
      ...overrides['us-east-1'],
    },
    'eu-west-1': {
      terminations: [{ eventId: 'e-3', instanceId: 'i-9', eventTime: '2025-01-20T00:00:00Z' }],
      ...overrides['eu-west-1'],
    },
  };
}

function runner(sources: FakeHistorySources, options: Partial<HistoryRunnerOptions> = {}): HistoryRunner {
  return new HistoryRunner({ sources, retryConfig: noDelay, ...options });
}

describe('HistoryRunner', () => {
  it('should reconstruct lifecycles across regions', async () => {
    const sources = new FakeHistorySources(accountRegions());

    const report = await runner(sources).run({ window, regions: ['us-east-1', 'eu-west-1'] });

    expect(report.records).toEqual([
      {
        key: { region: 'us-east-1', instanceId: 'i-1' },
        instanceType: 't3.micro',
        launchTimestamp: Date.parse('2025-01-03T10:00:00Z'),
        launchOrigin: 'event',
        termination: Date.parse('2025-01-04T10:00:00Z'),
      },
      {
        key: { region: 'us-east-1', instanceId: 'i-old' },
        instanceType: 'm5.large',
        launchTimestamp: Date.parse('2024-11-01T00:00:00Z'),
        launchOrigin: 'snapshot',
        termination: STILL_RUNNING,
      },
    ]);
    expect(report.orphans).toEqual([
      { key: { region: 'eu-west-1', instanceId: 'i-9' }, terminationTimestamp: Date.parse('2025-01-20T00:00:00Z') },
    ]);
    expect(report.complete).toBe(true);
    expect(report.rejectedRecords).toEqual([]);
    expect(report.regions.map((region) => [region.region, region.status])).toEqual([
      ['eu-west-1', 'complete'],
      ['us-east-1', 'complete'],
    ]);
    expect(report.regions[1]).toMatchObject({
      fetched: { launches: 1, terminations: 1, running: 2 },
      committedUnits: 3,
      rejectedRecords: 0,
      attempts: 3,
    });
  });

  it('should give the same report whatever the region order', async () => {
    const forward = await runner(new FakeHistorySources(accountRegions())).run({
      window,
      regions: ['us-east-1', 'eu-west-1'],
    });
    const backward = await runner(new FakeHistorySources(accountRegions())).run({
      window,
      regions: ['eu-west-1', 'us-east-1'],
    });

    expect(backward.records).toEqual(forward.records);
    expect(backward.orphans).toEqual(forward.orphans);
  });

  it('should retry transient failures within the budget', async () => {
    const metrics = new InMemoryMetricsCollector();
    const sources = new FakeHistorySources(
      accountRegions({
        'us-east-1': {
          fail: (source, attempt) =>
            source === 'launches' && attempt <= 3 ? new ThrottlingError('Rate exceeded', 'us-east-1') : undefined,
        },
      })
    );

    const report = await runner(sources, { metrics }).run({ window, regions: ['us-east-1'] });

    expect(report.complete).toBe(true);
    expect(report.records).toHaveLength(2);
    expect(report.regions[0].attempts).toBe(6);
    expect(sources.attemptsFor('us-east-1', 'launches')).toBe(4);
    expect(
      metrics.getCounter(HistoryMetricNames.FETCH_ATTEMPTS, { region: 'us-east-1', source: 'launches' })
    ).toBe(4);
  });

  it('should fail a region that exhausts its retries without committing any of it', async () => {
    const sources = new FakeHistorySources(
      accountRegions({
        'us-east-1': {
          fail: (source) => (source === 'launches' ? new ThrottlingError('Rate exceeded', 'us-east-1') : undefined),
        },
      })
    );

    const report = await runner(sources).run({ window, regions: ['us-east-1', 'eu-west-1'] });

    expect(sources.attemptsFor('us-east-1', 'launches')).toBe(4);
    expect(report.complete).toBe(false);
    expect(report.records).toEqual([]);
    expect(report.orphans.map((orphan) => orphan.key.instanceId)).toEqual(['i-9']);

    const failed = report.regions.find((region) => region.region === 'us-east-1');
    expect(failed).toMatchObject({ status: 'failed', committedUnits: 0, error: { code: 'RegionFetchFailure' } });
    expect(failed?.error?.message).toContain('Rate exceeded');
  });

  it('should not retry a non-retryable failure', async () => {
    const sources = new FakeHistorySources(
      accountRegions({
        'us-east-1': {
          fail: (source) => (source === 'running' ? new AccessDeniedError('not authorized', 'us-east-1') : undefined),
        },
      })
    );

    const report = await runner(sources).run({ window, regions: ['us-east-1'] });

    expect(sources.attemptsFor('us-east-1', 'running')).toBe(1);
    expect(report.regions[0]).toMatchObject({ status: 'failed', error: { code: 'RegionFetchFailure' } });
    expect(report.records).toEqual([]);
  });

  it('should fail a region that exceeds its time budget', async () => {
    const sources = new FakeHistorySources(accountRegions({ 'us-east-1': { hang: true } }));

    const report = await runner(sources, { regionTimeoutMs: 20 }).run({
      window,
      regions: ['us-east-1', 'eu-west-1'],
    });

    expect(report.complete).toBe(false);
    expect(report.regions).toMatchObject([
      { region: 'eu-west-1', status: 'complete' },
      { region: 'us-east-1', status: 'failed', error: { code: 'RegionTimeout' } },
    ]);
    expect(report.orphans).toHaveLength(1);
  });

  it('should produce no report when cancelled', async () => {
    const controller = new AbortController();
    const sources = new FakeHistorySources(accountRegions({ 'us-east-1': { hang: true } }));

    const pending = runner(sources).run({ window, regions: ['us-east-1', 'eu-west-1'], signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toBeInstanceOf(RunCancelledError);
  });

  it('should not fetch when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const sources = new FakeHistorySources(accountRegions());

    await expect(
      runner(sources).run({ window, regions: ['us-east-1'], signal: controller.signal })
    ).rejects.toBeInstanceOf(RunCancelledError);
    expect(sources.totalAttempts).toBe(0);
  });

  it('should reject an invalid window before fetching', async () => {
    const sources = new FakeHistorySources(accountRegions());

    await expect(
      runner(sources).run({ window: { start: window.end, end: window.start }, regions: ['us-east-1'] })
    ).rejects.toBeInstanceOf(InvalidWindowError);
    expect(sources.totalAttempts).toBe(0);
  });

  it('should bound the number of regions fetched at once', async () => {
    const regions = ['us-east-1', 'us-east-2', 'us-west-1', 'us-west-2', 'eu-west-1'];
    const sources = new FakeHistorySources(
      Object.fromEntries(regions.map((region) => [region, { delayMs: 10 }]))
    );

    const report = await runner(sources, { concurrency: 2 }).run({ window, regions });

    expect(sources.maxActiveRegions).toBe(2);
    expect(report.regions).toHaveLength(5);
    expect(report.complete).toBe(true);
  });

  it('should report malformed records without failing the region', async () => {
    const sources = new FakeHistorySources(
      accountRegions({
        'us-east-1': {
          launches: [
            { eventId: 'e-1', instanceId: 'i-1', instanceType: 't3.micro', eventTime: '2025-01-03T10:00:00Z' },
            { eventId: 'e-bad', instanceType: 't3.micro', eventTime: '2025-01-03T11:00:00Z' },
          ],
        },
      })
    );

    const report = await runner(sources).run({ window, regions: ['us-east-1'] });

    expect(report.complete).toBe(true);
    expect(report.records).toHaveLength(2);
    expect(report.regions[0].rejectedRecords).toBe(1);
    expect(report.rejectedRecords).toEqual([
      { region: 'us-east-1', recordKind: 'launch', reason: 'instanceId: missing', eventId: 'e-bad' },
    ]);
  });

  it('should order rejected records the same whichever region finishes first', async () => {
    const malformed = (region: string, delayMs: number): FakeRegion => ({
      delayMs,
      launches: [{ eventId: `bad-${region}`, instanceType: 't3.micro', eventTime: '2025-01-03T11:00:00Z' }],
      terminations: [{ eventId: `late-${region}`, instanceId: 'i-5' }],
    });
    const slowEast = new FakeHistorySources({
      'us-east-1': malformed('us-east-1', 20),
      'eu-west-1': malformed('eu-west-1', 1),
    });
    const slowWest = new FakeHistorySources({
      'us-east-1': malformed('us-east-1', 1),
      'eu-west-1': malformed('eu-west-1', 20),
    });
    const regions = ['us-east-1', 'eu-west-1'];

    const first = await runner(slowEast).run({ window, regions });
    const second = await runner(slowWest).run({ window, regions });

    expect(first.rejectedRecords).toEqual(second.rejectedRecords);
    expect(first.rejectedRecords).toEqual([
      { region: 'eu-west-1', recordKind: 'launch', reason: 'instanceId: missing', eventId: 'bad-eu-west-1' },
      { region: 'eu-west-1', recordKind: 'terminate', reason: 'eventTime: missing', eventId: 'late-eu-west-1' },
      { region: 'us-east-1', recordKind: 'launch', reason: 'instanceId: missing', eventId: 'bad-us-east-1' },
      { region: 'us-east-1', recordKind: 'terminate', reason: 'eventTime: missing', eventId: 'late-us-east-1' },
    ]);
  });

  it.each([
    ['a concurrency of zero', { concurrency: 0 }],
    ['a fractional concurrency', { concurrency: 1.5 }],
    ['a non-positive region timeout', { regionTimeoutMs: 0 }],
    ['a retry budget of zero attempts', { retryConfig: { ...noDelay, maxAttempts: 0 } }],
  ])('should refuse %s before any fetch', (_label, options) => {
    const sources = new FakeHistorySources(accountRegions());

    expect(() => runner(sources, options)).toThrow(ConfigurationError);
    expect(sources.totalAttempts).toBe(0);
  });

  it('should fetch a repeated region once', async () => {
    const sources = new FakeHistorySources(accountRegions());

    const report = await runner(sources).run({ window, regions: ['us-east-1', 'us-east-1'] });

    expect(report.regions).toHaveLength(1);
    expect(sources.attemptsFor('us-east-1', 'launches')).toBe(1);
  });

  it('should record run metrics', async () => {
    const metrics = new InMemoryMetricsCollector();
    const sources = new FakeHistorySources(accountRegions());

    await runner(sources, { metrics }).run({ window, regions: ['us-east-1', 'eu-west-1'] });

    expect(metrics.getCounter(HistoryMetricNames.REGIONS_TOTAL, { status: 'complete' })).toBe(2);
    expect(metrics.getCounter(HistoryMetricNames.UNITS_COMMITTED, { region: 'us-east-1' })).toBe(3);
    expect(metrics.getGauge(HistoryMetricNames.LIFECYCLE_RECORDS)).toBe(2);
    expect(metrics.getGauge(HistoryMetricNames.ORPHAN_TERMINATIONS)).toBe(1);
    expect(metrics.getHistogram(HistoryMetricNames.REGION_DURATION, { region: 'eu-west-1' })).toHaveLength(1);
  });
});
