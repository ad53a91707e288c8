/**
 * Normalizer
 *
 * Turns one raw source record into a typed unit, or rejects it. A rejected
 * record is reported to the collector and skipped; it never aborts the
 * region's batch.
 *
 * @module normalize/normalizer
 */

import { MalformedRecordError } from '../error/categories.js';
import { createInstanceKey } from '../types/key.js';
import type { RawLaunchRecord, RawRunningRecord, RawTerminationRecord, RecordKind } from '../types/raw.js';
import type {
  LaunchEvent,
  NormalizedRunningInstance,
  NormalizedUnit,
  TerminateEvent,
} from '../types/records.js';
import type { ReportWindow } from '../types/window.js';
import type { RecordErrorCollector } from './collector.js';
import {
  describeIssues,
  launchRecordSchema,
  runningRecordSchema,
  terminationRecordSchema,
} from './schemas.js';

/**
 * Instance type used when a record does not carry one.
 */
export const UNKNOWN_INSTANCE_TYPE = 'unknown';

/**
 * Everything fetched for one region, before normalization.
 */
export interface RegionBatch {
  launches: RawLaunchRecord[];
  terminations: RawTerminationRecord[];
  running: RawRunningRecord[];
}

export class Normalizer {
  private readonly window: ReportWindow;
  private readonly errors: RecordErrorCollector;

  constructor(window: ReportWindow, errors: RecordErrorCollector) {
    this.window = window;
    this.errors = errors;
  }

  normalizeLaunch(region: string, raw: RawLaunchRecord): LaunchEvent | undefined {
    const parsed = launchRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.reject(region, 'launch', describeIssues(parsed.error), raw.eventId);
      return undefined;
    }

    return {
      kind: 'launch',
      key: createInstanceKey(region, parsed.data.instanceId),
      timestamp: parsed.data.eventTime,
      instanceType: parsed.data.instanceType ?? UNKNOWN_INSTANCE_TYPE,
    };
  }

  normalizeTermination(region: string, raw: RawTerminationRecord): TerminateEvent | undefined {
    const parsed = terminationRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.reject(region, 'terminate', describeIssues(parsed.error), raw.eventId);
      return undefined;
    }

    return {
      kind: 'terminate',
      key: createInstanceKey(region, parsed.data.instanceId),
      timestamp: parsed.data.eventTime,
    };
  }

  /**
   * Instances launched at or after the window start are dropped without a
   * report: their launch is covered by a launch event.
   */
  normalizeRunning(region: string, raw: RawRunningRecord): NormalizedRunningInstance | undefined {
    const parsed = runningRecordSchema.safeParse(raw);
    if (!parsed.success) {
      this.reject(region, 'running', describeIssues(parsed.error));
      return undefined;
    }

    if (parsed.data.launchTime >= this.window.start) {
      return undefined;
    }

    return {
      kind: 'running',
      key: createInstanceKey(region, parsed.data.instanceId),
      instanceType: parsed.data.instanceType ?? UNKNOWN_INSTANCE_TYPE,
      launchTimestamp: parsed.data.launchTime,
    };
  }

  /**
   * Normalizes a region's full batch, dropping rejected records.
   */
  normalizeRegion(region: string, batch: RegionBatch): NormalizedUnit[] {
    const units: NormalizedUnit[] = [];
    const keep = (unit: NormalizedUnit | undefined): void => {
      if (unit) {
        units.push(unit);
      }
    };

    batch.launches.forEach((raw) => keep(this.normalizeLaunch(region, raw)));
    batch.terminations.forEach((raw) => keep(this.normalizeTermination(region, raw)));
    batch.running.forEach((raw) => keep(this.normalizeRunning(region, raw)));

    return units;
  }

  private reject(region: string, kind: RecordKind, reason: string, eventId?: string): void {
    this.errors.report(
      new MalformedRecordError(region, kind, reason, eventId !== undefined ? { eventId } : undefined)
    );
  }
}
