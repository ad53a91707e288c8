/**
 * Report types.
 * @module report/types
 */

import type { RejectedRecord } from '../normalize/collector.js';
import type { LifecycleRecord, OrphanTermination } from '../types/records.js';
import type { ReportWindow } from '../types/window.js';

/**
 * How a region's fetch ended.
 * - `complete`: all three sources fetched and committed
 * - `failed`: retries exhausted or timed out; nothing committed
 * - `cancelled`: the run was aborted before the region committed
 */
export type RegionStatus = 'complete' | 'failed' | 'cancelled';

export interface RegionOutcome {
  region: string;
  status: RegionStatus;
  /** Raw records received per source; zero when the region did not complete */
  fetched: {
    launches: number;
    terminations: number;
    running: number;
  };
  /** Units committed to the correlator */
  committedUnits: number;
  /** Records rejected by the normalizer */
  rejectedRecords: number;
  /** Fetch attempts across the three sources */
  attempts: number;
  durationMs: number;
  error?: {
    code: string;
    message: string;
  };
}

export interface LifecycleReport {
  window: ReportWindow;
  /** Sorted by (region, instanceId) */
  records: LifecycleRecord[];
  /** Sorted by (region, instanceId) */
  orphans: OrphanTermination[];
  /** Sorted by region */
  regions: RegionOutcome[];
  /** False when any region failed or was cancelled */
  complete: boolean;
  rejectedRecords: RejectedRecord[];
}
