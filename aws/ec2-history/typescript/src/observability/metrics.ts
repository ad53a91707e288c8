/**
 * Metrics collection for EC2 history runs
 */

export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: Record<string, string>): void;
  recordHistogram(name: string, value: number, labels?: Record<string, string>): void;
  recordGauge(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * Standard metric names
 */
export const HistoryMetricNames = {
  REGIONS_TOTAL: 'ec2_history_regions_total',
  FETCH_ATTEMPTS: 'ec2_history_fetch_attempts_total',
  RECORDS_REJECTED: 'ec2_history_records_rejected_total',
  UNITS_COMMITTED: 'ec2_history_units_committed_total',
  REGION_DURATION: 'ec2_history_region_duration_seconds',
  LIFECYCLE_RECORDS: 'ec2_history_lifecycle_records',
  ORPHAN_TERMINATIONS: 'ec2_history_orphan_terminations',
} as const;

/**
 * In-memory metrics collector for testing and development
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();
  private gauges: Map<string, number> = new Map();

  incrementCounter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const current = this.counters.get(key) ?? 0;
    this.counters.set(key, current + value);
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  recordGauge(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    this.gauges.set(key, value);
  }

  /**
   * Get a specific counter value
   */
  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  /**
   * Get a specific gauge value
   */
  getGauge(name: string, labels?: Record<string, string>): number | undefined {
    return this.gauges.get(this.makeKey(name, labels));
  }

  /**
   * Observations recorded for a histogram, in recording order
   */
  getHistogram(name: string, labels?: Record<string, string>): readonly number[] {
    return this.histograms.get(this.makeKey(name, labels)) ?? [];
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}:${labelStr}`;
  }
}

/**
 * No-op metrics collector for when metrics are disabled
 */
export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value?: number, _labels?: Record<string, string>): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _labels?: Record<string, string>): void {
    // No-op
  }

  recordGauge(_name: string, _value: number, _labels?: Record<string, string>): void {
    // No-op
  }
}
