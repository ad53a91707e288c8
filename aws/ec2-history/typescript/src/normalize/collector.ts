/**
 * Collects per-record normalization failures.
 * @module normalize/collector
 */

import type { MalformedRecordError } from '../error/categories.js';
import type { Logger } from '../observability/logging.js';
import { NoopLogger } from '../observability/logging.js';
import type { RecordKind } from '../types/raw.js';

/**
 * Report-friendly view of a rejected record.
 */
export interface RejectedRecord {
  region: string;
  recordKind: RecordKind;
  reason: string;
  eventId?: string;
}

export class RecordErrorCollector {
  private readonly collected: MalformedRecordError[] = [];
  private readonly logger: Logger;

  constructor(logger: Logger = new NoopLogger()) {
    this.logger = logger;
  }

  report(error: MalformedRecordError): void {
    this.collected.push(error);
    this.logger.warn('Skipping malformed record', {
      region: error.region,
      recordKind: error.recordKind,
      reason: error.reason,
      ...error.details,
    });
  }

  get errors(): readonly MalformedRecordError[] {
    return this.collected;
  }

  get size(): number {
    return this.collected.length;
  }

  countFor(region: string): number {
    return this.collected.filter((error) => error.region === region).length;
  }

  toRejectedRecords(): RejectedRecord[] {
    return this.collected.map((error) => {
      const eventId = error.details?.eventId;
      return {
        region: error.region ?? 'unknown',
        recordKind: error.recordKind,
        reason: error.reason,
        ...(typeof eventId === 'string' ? { eventId } : {}),
      };
    });
  }
}
