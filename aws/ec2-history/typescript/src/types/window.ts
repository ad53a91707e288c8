/**
 * Reporting window.
 */

import { InvalidWindowError } from '../error/categories.js';
import type { Timestamp } from './records.js';

/**
 * Inclusive, closed time range being reconstructed.
 */
export interface ReportWindow {
  readonly start: Timestamp;
  readonly end: Timestamp;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parses a calendar date (YYYY-MM-DD) to midnight UTC.
 *
 * @throws {InvalidWindowError} If the string is not a real calendar date
 */
export function parseCalendarDate(value: string): Timestamp {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidWindowError(`Invalid date: '${value}'. Expected YYYY-MM-DD`, { value });
  }

  const [, year, month, day] = match;
  const ms = Date.UTC(Number(year), Number(month) - 1, Number(day));
  // Date.UTC rolls 2024-02-31 over into March; reject that.
  if (new Date(ms).toISOString().slice(0, 10) !== value.trim()) {
    throw new InvalidWindowError(`Invalid date: '${value}'`, { value });
  }
  return ms;
}

/**
 * Expands two calendar dates to a window covering both days in full
 * (start 00:00:00.000Z, end 23:59:59.999Z).
 *
 * @example
 * ```typescript
 * const window = windowFromDates('2024-12-01', '2024-12-31');
 * ```
 */
export function windowFromDates(startDate: string, endDate: string): ReportWindow {
  const start = parseCalendarDate(startDate);
  const end = parseCalendarDate(endDate) + DAY_MS - 1;
  if (end < start) {
    throw InvalidWindowError.forBounds(start, end);
  }
  return { start, end };
}
