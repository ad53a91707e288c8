/**
 * Structured logging utilities for EC2 history runs
 */

import type { HistoryError } from '../error/error.js';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'trace'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

/**
 * Type guard for log level strings coming from configuration
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console-based logger with structured output.
 * Lines read `[time] [LEVEL] [component] message {context}`.
 */
export class ConsoleLogger implements Logger {
  private minLevel: LogLevel;
  private component: string;

  constructor(minLevel: LogLevel = 'info', component: string = 'ec2-history') {
    this.minLevel = minLevel;
    this.component = component;
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : '';

    const logMessage = `[${timestamp}] [${level.toUpperCase()}] [${this.component}] ${message}${contextStr}`;

    switch (level) {
      case 'error':
        console.error(logMessage);
        break;
      case 'warn':
        console.warn(logMessage);
        break;
      case 'debug':
      case 'trace':
        console.debug(logMessage);
        break;
      default:
        console.log(logMessage);
    }
  }
}

/**
 * No-op logger for when logging is disabled
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: LogContext): void {
    // No-op
  }

  warn(_message: string, _context?: LogContext): void {
    // No-op
  }

  info(_message: string, _context?: LogContext): void {
    // No-op
  }

  debug(_message: string, _context?: LogContext): void {
    // No-op
  }

  trace(_message: string, _context?: LogContext): void {
    // No-op
  }
}

/**
 * Logs a region that contributes nothing to the report
 */
export function logRegionFailure(logger: Logger, region: string, error: HistoryError): void {
  logger.error('Region excluded from report', {
    region,
    code: error.code,
    errorMessage: error.message,
    cause: error.originalError?.message,
  });
}
