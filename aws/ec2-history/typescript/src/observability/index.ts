/**
 * Observability
 *
 * Logging and metrics for EC2 history runs.
 */

export type { Logger, LogLevel, LogContext } from './logging.js';
export { ConsoleLogger, NoopLogger, LOG_LEVELS, isLogLevel, logRegionFailure } from './logging.js';
export type { MetricsCollector } from './metrics.js';
export { HistoryMetricNames, InMemoryMetricsCollector, NoopMetricsCollector } from './metrics.js';
