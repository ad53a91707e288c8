/**
 * Correlation state types.
 * @module correlation/types
 */

import type { InstanceKey } from '../types/key.js';
import type { LaunchOrigin, Timestamp } from '../types/records.js';

/**
 * Resolved launch origin for one key.
 */
export interface LaunchEntry {
  readonly key: InstanceKey;
  readonly instanceType: string;
  readonly launchTimestamp: Timestamp;
  readonly origin: LaunchOrigin;
}

/**
 * Earliest termination seen for one key.
 */
export interface TerminationEntry {
  readonly key: InstanceKey;
  readonly timestamp: Timestamp;
}

/**
 * Finalized correlator state, keyed by `instanceKeyId`.
 */
export interface CorrelationState {
  readonly launches: ReadonlyMap<string, LaunchEntry>;
  readonly terminations: ReadonlyMap<string, TerminationEntry>;
}
