/**
 * Versioned storage for crisis records.
 *
 * Every write names the version it was computed from; a mismatch raises
 * VersionConflictError so a writer working from a stale read never
 * overwrites a newer record. Records are frozen and never deleted.
 */

import { deepFreeze } from '../lib/deep-freeze';
import { VersionConflictError } from '../lib/errors';
import { isOpen } from './crisis-state-machine';
import type { CrisisRecord } from '../types/crisis';

export interface CrisisRecordStore {
  get(crisisId: string): CrisisRecord | undefined;
  /**
   * @param expectedVersion Version the caller read, or null for a new record
   */
  save(record: CrisisRecord, expectedVersion: number | null): CrisisRecord;
  findOpenBySession(sessionId: string): CrisisRecord | undefined;
  list(): CrisisRecord[];
}

export class InMemoryCrisisRecordStore implements CrisisRecordStore {
  private readonly records = new Map<string, CrisisRecord>();

  get(crisisId: string): CrisisRecord | undefined {
    return this.records.get(crisisId);
  }

  save(record: CrisisRecord, expectedVersion: number | null): CrisisRecord {
    const current = this.records.get(record.crisis_id);
    const actualVersion = current ? current.version : 0;
    const expected = expectedVersion ?? 0;

    if (actualVersion !== expected || record.version !== expected + 1) {
      throw new VersionConflictError(record.crisis_id, expected, actualVersion);
    }

    const frozen = deepFreeze({ ...record });
    this.records.set(record.crisis_id, frozen);
    return frozen;
  }

  findOpenBySession(sessionId: string): CrisisRecord | undefined {
    for (const record of this.records.values()) {
      if (record.session_id === sessionId && isOpen(record.state)) {
        return record;
      }
    }
    return undefined;
  }

  list(): CrisisRecord[] {
    return [...this.records.values()];
  }
}
