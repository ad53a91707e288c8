/**
 * Source collaborator contracts.
 *
 * Sources own pagination and transport; they hand back plain raw records
 * and reject with a `HistoryError` (retryable or not) on failure.
 *
 * @module sources/types
 */

import type { RawLaunchRecord, RawRunningRecord, RawTerminationRecord } from '../types/raw.js';
import type { ReportWindow } from '../types/window.js';

/**
 * Ordered set of region identifiers for a run.
 */
export interface RegionList {
  listRegions(signal?: AbortSignal): Promise<string[]>;
}

export interface LaunchEventSource {
  fetchLaunches(region: string, window: ReportWindow, signal?: AbortSignal): Promise<RawLaunchRecord[]>;
}

export interface TerminationEventSource {
  fetchTerminations(region: string, window: ReportWindow, signal?: AbortSignal): Promise<RawTerminationRecord[]>;
}

/**
 * Currently active instances of a region.
 */
export interface RunningSnapshotSource {
  fetchRunning(region: string, signal?: AbortSignal): Promise<RawRunningRecord[]>;
}

/**
 * The three per-region sources a run reads from.
 */
export interface HistorySources {
  launches: LaunchEventSource;
  terminations: TerminationEventSource;
  running: RunningSnapshotSource;
}
