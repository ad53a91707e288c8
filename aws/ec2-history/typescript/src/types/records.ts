/**
 * Normalized units and lifecycle records.
 */

import type { InstanceKey } from './key.js';

/**
 * Epoch milliseconds (UTC).
 */
export type Timestamp = number;

// ============================================================================
// Normalized Units
// ============================================================================

/**
 * Kind of audit event.
 */
export type EventKind = 'launch' | 'terminate';

/**
 * Accepted launch event. Only launches carry an instance type.
 */
export interface LaunchEvent {
  readonly kind: 'launch';
  readonly key: InstanceKey;
  readonly timestamp: Timestamp;
  readonly instanceType: string;
}

/**
 * Accepted termination event.
 */
export interface TerminateEvent {
  readonly kind: 'terminate';
  readonly key: InstanceKey;
  readonly timestamp: Timestamp;
}

export type NormalizedEvent = LaunchEvent | TerminateEvent;

/**
 * An instance observed running at snapshot time that was launched before
 * the window opened.
 */
export interface NormalizedRunningInstance {
  readonly kind: 'running';
  readonly key: InstanceKey;
  readonly instanceType: string;
  readonly launchTimestamp: Timestamp;
}

export type NormalizedUnit = NormalizedEvent | NormalizedRunningInstance;

// ============================================================================
// Lifecycle Output
// ============================================================================

/**
 * Marks an instance with no observed termination.
 */
export const STILL_RUNNING: unique symbol = Symbol('StillRunning');

export type StillRunning = typeof STILL_RUNNING;

export type TerminationState = Timestamp | StillRunning;

/**
 * Where the launch time of a record came from.
 */
export type LaunchOrigin = 'event' | 'snapshot';

/**
 * Reconstructed lifecycle of one instance.
 */
export interface LifecycleRecord {
  readonly key: InstanceKey;
  readonly instanceType: string;
  readonly launchTimestamp: Timestamp;
  readonly launchOrigin: LaunchOrigin;
  readonly termination: TerminationState;
}

/**
 * Termination evidence with no launch origin. Reported, never turned into
 * a lifecycle record.
 */
export interface OrphanTermination {
  readonly key: InstanceKey;
  /** Earliest termination seen for the key */
  readonly terminationTimestamp: Timestamp;
}

/**
 * Type guard for the still-running sentinel.
 */
export function isStillRunning(termination: TerminationState): termination is StillRunning {
  return termination === STILL_RUNNING;
}
