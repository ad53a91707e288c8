/**
 * Lifecycle Correlator
 *
 * Accumulates normalized units from every region and resolves, per instance
 * key, one launch origin and the earliest termination. Ingestion is
 * commutative: the final state does not depend on arrival order.
 *
 * One instance per run. Not safe for concurrent mutation; regions are
 * committed whole through `commit()`, which runs synchronously.
 *
 * @module correlation/correlator
 */

import { HistoryError } from '../error/error.js';
import { instanceKeyId } from '../types/key.js';
import type { LifecycleRecord, NormalizedUnit, OrphanTermination } from '../types/records.js';
import { STILL_RUNNING } from '../types/records.js';
import type { CorrelationState, LaunchEntry, TerminationEntry } from './types.js';

export class LifecycleCorrelator {
  private readonly launches = new Map<string, LaunchEntry>();
  private readonly terminations = new Map<string, TerminationEntry>();
  private finalized = false;

  /**
   * Applies one unit.
   *
   * - launch: inserted if absent; over an event entry keeps the earlier
   *   timestamp; over a snapshot entry always replaces it.
   * - running: inserted only if no entry of either origin exists.
   * - terminate: keeps the minimum timestamp.
   */
  ingest(unit: NormalizedUnit): void {
    this.assertOpen();
    const id = instanceKeyId(unit.key);

    switch (unit.kind) {
      case 'launch': {
        const existing = this.launches.get(id);
        if (existing?.origin === 'event' && !this.precedes(unit, existing)) {
          return;
        }
        this.launches.set(id, {
          key: unit.key,
          instanceType: unit.instanceType,
          launchTimestamp: unit.timestamp,
          origin: 'event',
        });
        return;
      }

      case 'running': {
        if (this.launches.has(id)) {
          return;
        }
        this.launches.set(id, {
          key: unit.key,
          instanceType: unit.instanceType,
          launchTimestamp: unit.launchTimestamp,
          origin: 'snapshot',
        });
        return;
      }

      case 'terminate': {
        const existing = this.terminations.get(id);
        if (existing === undefined || unit.timestamp < existing.timestamp) {
          this.terminations.set(id, { key: unit.key, timestamp: unit.timestamp });
        }
        return;
      }
    }
  }

  /**
   * Applies a whole region's units at once.
   */
  commit(units: readonly NormalizedUnit[]): void {
    this.assertOpen();
    for (const unit of units) {
      this.ingest(unit);
    }
  }

  /**
   * Closes the correlator and returns its state. Further ingestion throws.
   */
  finalize(): CorrelationState {
    this.finalized = true;
    return {
      launches: new Map(this.launches),
      terminations: new Map(this.terminations),
    };
  }

  get size(): number {
    return this.launches.size;
  }

  // On equal timestamps the lexically smaller instance type wins, so
  // conflicting replays resolve the same way in any order.
  private precedes(
    unit: { timestamp: number; instanceType: string },
    existing: LaunchEntry
  ): boolean {
    if (unit.timestamp !== existing.launchTimestamp) {
      return unit.timestamp < existing.launchTimestamp;
    }
    return unit.instanceType < existing.instanceType;
  }

  private assertOpen(): void {
    if (this.finalized) {
      throw new HistoryError({
        code: 'CorrelatorFinalized',
        message: 'LifecycleCorrelator has been finalized',
      });
    }
  }
}

/**
 * Lifecycle records and orphans derived from a finalized state, in map
 * order. Callers that need a stable order go through `assembleReport`.
 */
export interface ResolvedLifecycles {
  records: LifecycleRecord[];
  orphans: OrphanTermination[];
}

/**
 * Applies the finalization rule: every launch entry becomes a record,
 * terminated at its earliest termination or still running; termination
 * entries without a launch become orphans.
 */
export function resolveLifecycles(state: CorrelationState): ResolvedLifecycles {
  const records: LifecycleRecord[] = [];
  for (const [id, launch] of state.launches) {
    const termination = state.terminations.get(id);
    records.push({
      key: launch.key,
      instanceType: launch.instanceType,
      launchTimestamp: launch.launchTimestamp,
      launchOrigin: launch.origin,
      termination: termination ? termination.timestamp : STILL_RUNNING,
    });
  }

  const orphans: OrphanTermination[] = [];
  for (const [id, termination] of state.terminations) {
    if (!state.launches.has(id)) {
      orphans.push({ key: termination.key, terminationTimestamp: termination.timestamp });
    }
  }

  return { records, orphans };
}
