/**
 * Type exports for the EC2 history integration.
 */

export type { InstanceKey } from './key.js';
export { createInstanceKey, instanceKeyId, compareInstanceKeys } from './key.js';

export type {
  Timestamp,
  EventKind,
  LaunchEvent,
  TerminateEvent,
  NormalizedEvent,
  NormalizedRunningInstance,
  NormalizedUnit,
  StillRunning,
  TerminationState,
  LaunchOrigin,
  LifecycleRecord,
  OrphanTermination,
} from './records.js';
export { STILL_RUNNING, isStillRunning } from './records.js';

export type {
  RecordKind,
  RawLaunchRecord,
  RawTerminationRecord,
  RawRunningRecord,
} from './raw.js';

export type { ReportWindow } from './window.js';
export { parseCalendarDate, windowFromDates } from './window.js';
