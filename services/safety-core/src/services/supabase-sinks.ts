/**
 * Supabase persistence for ledger entries and crisis notices.
 *
 * Both sinks are listeners: the core never waits on them and a failed write
 * is logged, not thrown back into scanning or escalation. Writes go out in
 * the order they were observed.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { createLogger, errorMessage, type Logger } from '../lib/logger';
import type { AuditEntry } from '../types/audit';
import type { CrisisTransitionNotice } from '../types/crisis';
import type { AuditLedger } from './audit-ledger';
import type { CrisisEscalationService } from './crisis-escalation-service';

export const AUDIT_ENTRIES_TABLE = 'audit_entries';
export const CRISIS_NOTIFICATIONS_TABLE = 'crisis_notifications';

export interface SinkWriteResult {
  ok: boolean;
  error?: string;
}

abstract class OrderedSupabaseSink<T> {
  private tail: Promise<void> = Promise.resolve();
  private failures = 0;
  private readonly log: Logger;

  protected constructor(
    protected readonly client: SupabaseClient,
    private readonly table: string,
    tag: string
  ) {
    this.log = createLogger(tag);
  }

  protected abstract toRow(item: T): Record<string, unknown>;
  protected abstract describe(item: T): Record<string, unknown>;

  async write(item: T): Promise<SinkWriteResult> {
    try {
      const { error } = await this.client.from(this.table).insert(this.toRow(item));
      if (error) {
        this.failures++;
        this.log.error(`Insert into ${this.table} failed`, { ...this.describe(item), error: error.message });
        return { ok: false, error: error.message };
      }
      return { ok: true };
    } catch (err: unknown) {
      this.failures++;
      this.log.error(`Insert into ${this.table} threw`, { ...this.describe(item), error: errorMessage(err) });
      return { ok: false, error: errorMessage(err) };
    }
  }

  /** Queue a write behind earlier ones. */
  enqueue(item: T): void {
    this.tail = this.tail.then(async () => {
      await this.write(item);
    });
  }

  /** Resolves when every queued write has settled. */
  flush(): Promise<void> {
    return this.tail;
  }

  get failureCount(): number {
    return this.failures;
  }
}

// =============================================================================
// Audit Replication
// =============================================================================

export class SupabaseAuditSink extends OrderedSupabaseSink<AuditEntry> {
  constructor(client: SupabaseClient) {
    super(client, AUDIT_ENTRIES_TABLE, 'AuditSink');
  }

  attach(ledger: AuditLedger): () => void {
    return ledger.onAppend((entry) => this.enqueue(entry));
  }

  protected toRow(entry: AuditEntry): Record<string, unknown> {
    return {
      sequence: entry.sequence,
      entry_id: entry.entry_id,
      timestamp: entry.timestamp,
      action: entry.action,
      entity_type: entry.entity_type,
      entity_ref: entry.entity_ref,
      actor_ref: entry.actor_ref,
      details: entry.details,
      previous_hash: entry.previous_hash,
      entry_hash: entry.entry_hash
    };
  }

  protected describe(entry: AuditEntry): Record<string, unknown> {
    return { sequence: entry.sequence, action: entry.action };
  }
}

// =============================================================================
// Crisis Notification Dispatch
// =============================================================================

export class SupabaseCrisisNotifier extends OrderedSupabaseSink<CrisisTransitionNotice> {
  constructor(client: SupabaseClient) {
    super(client, CRISIS_NOTIFICATIONS_TABLE, 'CrisisNotifier');
  }

  attach(service: CrisisEscalationService): () => void {
    return service.onTransition((notice) => this.enqueue(notice));
  }

  protected toRow(notice: CrisisTransitionNotice): Record<string, unknown> {
    return {
      crisis_id: notice.crisis_id,
      state: notice.state,
      previous_state: notice.previous_state,
      escalation_path: [...notice.escalation_path],
      recipient: notice.escalation_path[notice.escalation_path.length - 1] ?? null,
      session_id: notice.session_id,
      school_id: notice.school_id ?? null,
      occurred_at: notice.occurred_at
    };
  }

  protected describe(notice: CrisisTransitionNotice): Record<string, unknown> {
    return { crisis_id: notice.crisis_id, state: notice.state };
  }
}
