/**
 * Report Assembler
 *
 * Orders the correlator's output so that identical inputs always produce
 * an identical report, whatever order regions and events arrived in.
 *
 * @module report/assembler
 */

import type { CorrelationState } from '../correlation/types.js';
import { resolveLifecycles } from '../correlation/correlator.js';
import type { RejectedRecord } from '../normalize/collector.js';
import { compareInstanceKeys } from '../types/key.js';
import type { ReportWindow } from '../types/window.js';
import type { LifecycleReport, RegionOutcome } from './types.js';

export interface AssembleOptions {
  window: ReportWindow;
  regions?: RegionOutcome[];
  rejectedRecords?: RejectedRecord[];
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Rejections arrive in the order regions finished; order them by content.
 */
function compareRejected(a: RejectedRecord, b: RejectedRecord): number {
  return (
    compareText(a.region, b.region) ||
    compareText(a.recordKind, b.recordKind) ||
    compareText(a.eventId ?? '', b.eventId ?? '') ||
    compareText(a.reason, b.reason)
  );
}

export function assembleReport(state: CorrelationState, options: AssembleOptions): LifecycleReport {
  const { records, orphans } = resolveLifecycles(state);
  const regions = [...(options.regions ?? [])].sort((a, b) => compareText(a.region, b.region));

  return {
    window: options.window,
    records: records.sort((a, b) => compareInstanceKeys(a.key, b.key)),
    orphans: orphans.sort((a, b) => compareInstanceKeys(a.key, b.key)),
    regions,
    complete: regions.every((outcome) => outcome.status === 'complete'),
    rejectedRecords: [...(options.rejectedRecords ?? [])].sort(compareRejected),
  };
}
