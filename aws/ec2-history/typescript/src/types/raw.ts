/**
 * Raw records as handed over by the source collaborators.
 *
 * Field values are left as `unknown`: upstream data is validated by the
 * normalizer, not by the sources. Timestamps may arrive as ISO-8601
 * strings, `Date` instances or epoch milliseconds.
 */

/**
 * Which source a raw record came from.
 */
export type RecordKind = 'launch' | 'terminate' | 'running';

export interface RawLaunchRecord {
  instanceId?: unknown;
  instanceType?: unknown;
  eventTime?: unknown;
  /** Upstream event id, used only for error reporting */
  eventId?: string;
}

export interface RawTerminationRecord {
  instanceId?: unknown;
  eventTime?: unknown;
  eventId?: string;
}

export interface RawRunningRecord {
  instanceId?: unknown;
  instanceType?: unknown;
  launchTime?: unknown;
}
