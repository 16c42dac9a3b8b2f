/**
 * Audit Ledger
 *
 * Append-only, hash-chained record of every safety decision and crisis
 * transition. Each entry stores sha256(canonical JSON of the entry without
 * its own hash), and that hash becomes the next entry's previous_hash.
 *
 * append() is synchronous, so a single ledger instance is the one sequencer:
 * reading the head and writing the next entry never interleave.
 *
 * Verification failures are logged and reported, never repaired.
 */

import { randomUUID } from 'crypto';
import { canonicalJson, sha256Hex } from '../lib/canonical-json';
import { deepFreeze } from '../lib/deep-freeze';
import { AuditSequenceError } from '../lib/errors';
import { createLogger, errorMessage } from '../lib/logger';
import {
  GENESIS_HASH,
  type AuditAppendListener,
  type AuditEntry,
  type AuditEntryDraft,
  type AuditQuery,
  type ChainInspection
} from '../types/audit';

const log = createLogger('AuditLedger');

export interface AuditLedgerOptions {
  clock?: () => Date;
  idGenerator?: () => string;
}

// =============================================================================
// Hashing & Verification
// =============================================================================

export function computeEntryHash(entry: Omit<AuditEntry, 'entry_hash'>): string {
  return sha256Hex(
    canonicalJson({
      sequence: entry.sequence,
      entry_id: entry.entry_id,
      timestamp: entry.timestamp,
      action: entry.action,
      entity_type: entry.entity_type,
      entity_ref: entry.entity_ref,
      actor_ref: entry.actor_ref,
      details: entry.details,
      previous_hash: entry.previous_hash
    })
  );
}

/**
 * Walk entries in sequence order and report the first break, if any.
 * Without an anchor the walk starts from genesis (sequence 1); with one, the
 * anchor is re-hashed and the walk continues from it.
 */
export function inspectChain(
  entries: readonly AuditEntry[],
  options: { anchor?: AuditEntry } = {}
): ChainInspection {
  const ordered = [...entries].sort((a, b) => a.sequence - b.sequence);
  const { anchor } = options;

  if (anchor && computeEntryHash(anchor) !== anchor.entry_hash) {
    return { valid: false, checked: 0, failed_at_sequence: anchor.sequence, reason: 'anchor_hash_mismatch' };
  }

  let expectedSequence = anchor ? anchor.sequence + 1 : 1;
  let expectedPrevious = anchor ? anchor.entry_hash : GENESIS_HASH;
  let checked = 0;

  for (const entry of ordered) {
    if (entry.sequence !== expectedSequence) {
      return { valid: false, checked, failed_at_sequence: entry.sequence, reason: 'sequence_gap' };
    }
    if (entry.previous_hash !== expectedPrevious) {
      return { valid: false, checked, failed_at_sequence: entry.sequence, reason: 'previous_hash_mismatch' };
    }
    if (computeEntryHash(entry) !== entry.entry_hash) {
      return { valid: false, checked, failed_at_sequence: entry.sequence, reason: 'entry_hash_mismatch' };
    }

    checked++;
    expectedSequence++;
    expectedPrevious = entry.entry_hash;
  }

  return { valid: true, checked };
}

export function verifyChain(entries: readonly AuditEntry[], options: { anchor?: AuditEntry } = {}): boolean {
  return inspectChain(entries, options).valid;
}

// =============================================================================
// Ledger
// =============================================================================

export class AuditLedger {
  private readonly chain: AuditEntry[] = [];
  private readonly listeners = new Set<AuditAppendListener>();
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;

  constructor(options: AuditLedgerOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? randomUUID;
  }

  /**
   * Hash of the latest entry, or the genesis value for an empty ledger.
   */
  head(): string {
    const last = this.chain[this.chain.length - 1];
    return last ? last.entry_hash : GENESIS_HASH;
  }

  size(): number {
    return this.chain.length;
  }

  entries(): readonly AuditEntry[] {
    return [...this.chain];
  }

  get(sequence: number): AuditEntry | undefined {
    return this.chain[sequence - 1];
  }

  append(draft: AuditEntryDraft): AuditEntry {
    const head = this.head();
    if (draft.previous_hash !== undefined && draft.previous_hash !== head) {
      throw new AuditSequenceError(head, draft.previous_hash);
    }

    const unsigned: Omit<AuditEntry, 'entry_hash'> = {
      sequence: this.chain.length + 1,
      entry_id: this.idGenerator(),
      timestamp: this.clock().toISOString(),
      action: draft.action,
      entity_type: draft.entity_type,
      entity_ref: draft.entity_ref,
      actor_ref: draft.actor_ref,
      details: structuredClone(draft.details ?? {}),
      previous_hash: head
    };

    const entry = deepFreeze({ ...unsigned, entry_hash: computeEntryHash(unsigned) });
    this.chain.push(entry);

    log.debug('Entry appended', { sequence: entry.sequence, action: entry.action, entity_type: entry.entity_type });

    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (err: unknown) {
        log.error('Append listener failed', { sequence: entry.sequence, error: errorMessage(err) });
      }
    }

    return entry;
  }

  /**
   * Verify the whole ledger. A broken chain is logged at error level.
   */
  verify(): ChainInspection {
    const inspection = inspectChain(this.chain);
    if (!inspection.valid) {
      log.error('Chain verification failed', {
        failed_at_sequence: inspection.failed_at_sequence,
        reason: inspection.reason
      });
    }
    return inspection;
  }

  *query(filters: AuditQuery = {}): IterableIterator<AuditEntry> {
    const since = filters.since ? Date.parse(filters.since) : null;
    const until = filters.until ? Date.parse(filters.until) : null;
    const start = filters.from_sequence ? filters.from_sequence - 1 : 0;
    let yielded = 0;

    for (let i = start; i < this.chain.length; i++) {
      if (filters.limit !== undefined && yielded >= filters.limit) {
        return;
      }

      const entry = this.chain[i];
      if (filters.action && entry.action !== filters.action) continue;
      if (filters.entity_type && entry.entity_type !== filters.entity_type) continue;
      if (filters.entity_ref && entry.entity_ref !== filters.entity_ref) continue;
      if (filters.actor_ref && entry.actor_ref !== filters.actor_ref) continue;

      const at = Date.parse(entry.timestamp);
      if (since !== null && at < since) continue;
      if (until !== null && at > until) continue;

      yielded++;
      yield entry;
    }
  }

  /**
   * Subscribe to appends (replication, metrics). Returns an unsubscribe.
   */
  onAppend(listener: AuditAppendListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
