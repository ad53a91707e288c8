/**
 * History Runner
 *
 * Drives one reconstruction: fetches every region under a concurrency
 * bound, normalizes each region once all three of its sources have
 * answered, commits the region to a fresh correlator in one step, then
 * finalizes and assembles the report.
 *
 * @module runner/runner
 */

import { DEFAULT_CONCURRENCY, DEFAULT_REGION_TIMEOUT, DEFAULT_RETRY_CONFIG } from '../config/defaults.js';
import { validateConfig, validateWindow } from '../config/validation.js';
import { LifecycleCorrelator } from '../correlation/correlator.js';
import { RegionFetchError, RegionTimeoutError, RunCancelledError } from '../error/categories.js';
import type { HistoryError } from '../error/error.js';
import { mapAwsError } from '../error/mapper.js';
import { RecordErrorCollector } from '../normalize/collector.js';
import { Normalizer } from '../normalize/normalizer.js';
import type { RegionBatch } from '../normalize/normalizer.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger, logRegionFailure } from '../observability/logging.js';
import type { MetricsCollector } from '../observability/metrics.js';
import { HistoryMetricNames, NoopMetricsCollector } from '../observability/metrics.js';
import { abortReason } from '../resilience/abort.js';
import { RetryExecutor } from '../resilience/retry.js';
import { Semaphore } from '../resilience/semaphore.js';
import { withTimeout } from '../resilience/timeout.js';
import type { RetryConfig } from '../resilience/types.js';
import { assembleReport } from '../report/assembler.js';
import type { LifecycleReport, RegionOutcome, RegionStatus } from '../report/types.js';
import type { HistorySources } from '../sources/types.js';
import type { ReportWindow } from '../types/window.js';

export interface HistoryRunnerOptions {
  sources: HistorySources;
  /** @default 5 */
  concurrency?: number;
  retryConfig?: RetryConfig;
  /** @default 120000 */
  regionTimeoutMs?: number;
  logger?: Logger;
  metrics?: MetricsCollector;
}

export interface RunRequest {
  window: ReportWindow;
  regions: string[];
  /** Aborting cancels the run; no report is produced */
  signal?: AbortSignal;
}

/**
 * Per-run state. Never shared between runs.
 */
interface RunContext {
  window: ReportWindow;
  signal?: AbortSignal;
  correlator: LifecycleCorrelator;
  normalizer: Normalizer;
  errors: RecordErrorCollector;
}

type SourceName = 'launches' | 'terminations' | 'running';

export class HistoryRunner {
  private readonly sources: HistorySources;
  private readonly concurrency: number;
  private readonly regionTimeoutMs: number;
  private readonly retryExecutor: RetryExecutor;
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  /**
   * @throws {ConfigurationError} If concurrency, timeout or retry settings are invalid
   */
  constructor(options: HistoryRunnerOptions) {
    validateConfig({
      concurrency: options.concurrency,
      regionTimeoutMs: options.regionTimeoutMs,
      retryConfig: options.retryConfig,
    });
    this.sources = options.sources;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.regionTimeoutMs = options.regionTimeoutMs ?? DEFAULT_REGION_TIMEOUT;
    this.retryExecutor = new RetryExecutor(options.retryConfig ?? DEFAULT_RETRY_CONFIG);
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
  }

  /**
   * Reconstructs instance lifecycles for `regions` over `window`.
   *
   * @throws {InvalidWindowError} Before any fetch, if the window is invalid
   * @throws {RunCancelledError} If the signal aborts before finalization
   */
  async run(request: RunRequest): Promise<LifecycleReport> {
    const { window, signal } = request;
    validateWindow(window);
    if (signal?.aborted) {
      throw new RunCancelledError();
    }

    const regions = [...new Set(request.regions)];
    const errors = new RecordErrorCollector(this.logger);
    const context: RunContext = {
      window,
      signal,
      correlator: new LifecycleCorrelator(),
      normalizer: new Normalizer(window, errors),
      errors,
    };

    this.logger.info('Starting lifecycle reconstruction', {
      regions: regions.length,
      concurrency: this.concurrency,
      windowStart: new Date(window.start).toISOString(),
      windowEnd: new Date(window.end).toISOString(),
    });

    const semaphore = new Semaphore(this.concurrency);
    const outcomes = await Promise.all(
      regions.map((region) => semaphore.run(() => this.runRegion(region, context)))
    );

    if (signal?.aborted) {
      this.logger.warn('Run cancelled before finalization');
      throw new RunCancelledError();
    }

    const report = assembleReport(context.correlator.finalize(), {
      window,
      regions: outcomes,
      rejectedRecords: errors.toRejectedRecords(),
    });

    this.metrics.recordGauge(HistoryMetricNames.LIFECYCLE_RECORDS, report.records.length);
    this.metrics.recordGauge(HistoryMetricNames.ORPHAN_TERMINATIONS, report.orphans.length);
    this.logger.info('Lifecycle reconstruction finished', {
      records: report.records.length,
      orphans: report.orphans.length,
      rejectedRecords: report.rejectedRecords.length,
      complete: report.complete,
    });

    return report;
  }

  private async runRegion(region: string, context: RunContext): Promise<RegionOutcome> {
    const started = Date.now();
    const counter = { attempts: 0 };

    if (context.signal?.aborted) {
      return this.failedOutcome(region, 'cancelled', counter.attempts, started, new RunCancelledError(region));
    }

    try {
      const batch = await withTimeout(
        (signal) => this.fetchRegion(region, context.window, signal, counter),
        this.regionTimeoutMs,
        {
          parentSignal: context.signal,
          onTimeout: () => new RegionTimeoutError(region, this.regionTimeoutMs),
          onCancel: () => new RunCancelledError(region),
        }
      );

      if (context.signal?.aborted) {
        return this.failedOutcome(region, 'cancelled', counter.attempts, started, new RunCancelledError(region));
      }

      // Nothing below awaits: the region lands in the correlator as a whole.
      const rejectedBefore = context.errors.countFor(region);
      const units = context.normalizer.normalizeRegion(region, batch);
      context.correlator.commit(units);
      const rejected = context.errors.countFor(region) - rejectedBefore;

      const outcome: RegionOutcome = {
        region,
        status: 'complete',
        fetched: {
          launches: batch.launches.length,
          terminations: batch.terminations.length,
          running: batch.running.length,
        },
        committedUnits: units.length,
        rejectedRecords: rejected,
        attempts: counter.attempts,
        durationMs: Date.now() - started,
      };

      this.metrics.incrementCounter(HistoryMetricNames.REGIONS_TOTAL, 1, { status: 'complete' });
      this.metrics.incrementCounter(HistoryMetricNames.UNITS_COMMITTED, units.length, { region });
      if (rejected > 0) {
        this.metrics.incrementCounter(HistoryMetricNames.RECORDS_REJECTED, rejected, { region });
      }
      this.metrics.recordHistogram(HistoryMetricNames.REGION_DURATION, outcome.durationMs / 1000, { region });
      this.logger.info('Region committed', {
        region,
        units: units.length,
        rejected,
        attempts: counter.attempts,
      });

      return outcome;
    } catch (error) {
      if (context.signal?.aborted) {
        return this.failedOutcome(region, 'cancelled', counter.attempts, started, new RunCancelledError(region));
      }

      const failure: HistoryError =
        error instanceof RegionTimeoutError
          ? error
          : new RegionFetchError(region, counter.attempts, mapAwsError(error, region));
      logRegionFailure(this.logger, region, failure);
      return this.failedOutcome(region, 'failed', counter.attempts, started, failure);
    }
  }

  /**
   * Fetches the three sources in parallel. The first terminal failure
   * aborts the other two.
   */
  private async fetchRegion(
    region: string,
    window: ReportWindow,
    regionSignal: AbortSignal,
    counter: { attempts: number }
  ): Promise<RegionBatch> {
    const controller = new AbortController();
    const onRegionAbort = (): void => controller.abort(abortReason(regionSignal));
    regionSignal.addEventListener('abort', onRegionAbort, { once: true });
    const signal = controller.signal;

    const fetchSource = async <T>(source: SourceName, operation: () => Promise<T>): Promise<T> => {
      try {
        return await this.retryExecutor.execute(
          async () => {
            counter.attempts++;
            this.metrics.incrementCounter(HistoryMetricNames.FETCH_ATTEMPTS, 1, { region, source });
            return operation();
          },
          {
            signal,
            onRetry: (attempt, error, delayMs) =>
              this.logger.debug('Retrying fetch', { region, source, attempt, delayMs, error: error.message }),
          }
        );
      } catch (error) {
        controller.abort(error);
        throw error;
      }
    };

    try {
      const [launches, terminations, running] = await Promise.all([
        fetchSource('launches', () => this.sources.launches.fetchLaunches(region, window, signal)),
        fetchSource('terminations', () => this.sources.terminations.fetchTerminations(region, window, signal)),
        fetchSource('running', () => this.sources.running.fetchRunning(region, signal)),
      ]);
      return { launches, terminations, running };
    } finally {
      regionSignal.removeEventListener('abort', onRegionAbort);
    }
  }

  private failedOutcome(
    region: string,
    status: Exclude<RegionStatus, 'complete'>,
    attempts: number,
    started: number,
    error: HistoryError
  ): RegionOutcome {
    this.metrics.incrementCounter(HistoryMetricNames.REGIONS_TOTAL, 1, { status });
    return {
      region,
      status,
      fetched: { launches: 0, terminations: 0, running: 0 },
      committedUnits: 0,
      rejectedRecords: 0,
      attempts,
      durationMs: Date.now() - started,
      error: { code: error.code, message: error.message },
    };
  }
}
