/**
 * Crisis Escalation Service
 *
 * Owns crisis records and drives them through the transition table in
 * crisis-state-machine.ts. Guarantees:
 *   - one open record per session; repeat detections merge evidence into it
 *   - mutations are serialized per crisis (and per session for detection),
 *     and every write passes an optimistic version check
 *   - each transition appends exactly one audit entry and notifies listeners
 *   - a NOTIFYING crisis nobody acknowledges within the timeout escalates
 *
 * Rejected transitions are returned as values and leave the record unchanged.
 */

import { randomUUID } from 'crypto';
import { KeyedSerialQueue } from '../lib/keyed-queue';
import { VersionConflictError } from '../lib/errors';
import { createLogger, errorMessage } from '../lib/logger';
import { hashTextForAudit, type PiiHasher } from '../lib/pii';
import { AuditLedger } from './audit-ledger';
import { EscalationTimers } from './escalation-timers';
import { InMemoryCrisisRecordStore, type CrisisRecordStore } from './crisis-record-store';
import { evaluateTransition, isOpen } from './crisis-state-machine';
import type { AuditAction } from '../types/audit';
import type { Message, ScanResult } from '../types/risk';
import type {
  CrisisEvent,
  CrisisRecord,
  CrisisState,
  CrisisTransitionListener,
  CrisisTransitionNotice,
  CrisisTriggerSource,
  DetectionResult,
  EscalationPath,
  TransitionRejection,
  TransitionRejectionCode,
  TransitionResult
} from '../types/crisis';

const log = createLogger('CrisisEscalation');

export const DEFAULT_ACK_TIMEOUT_MS = 300_000;
export const SYSTEM_ACTOR = 'system';

const STATE_ACTIONS: Record<CrisisState, AuditAction> = {
  DETECTED: 'crisis.detected',
  NOTIFYING: 'crisis.notifying',
  ACKNOWLEDGED: 'crisis.acknowledged',
  IN_PROGRESS: 'crisis.in_progress',
  ESCALATED: 'crisis.escalated',
  RESOLVED: 'crisis.resolved'
};

export interface CrisisEscalationOptions {
  ledger: AuditLedger;
  hashStudentRef: PiiHasher;
  ackTimeoutMs?: number;
  store?: CrisisRecordStore;
  clock?: () => Date;
  idGenerator?: () => string;
}

export interface TransitionOptions {
  /** Reject with VERSION_CONFLICT unless the record is still at this version */
  expectedVersion?: number;
}

type RecordPatch = (record: CrisisRecord, now: string) => Partial<CrisisRecord>;

function triggerSourceFor(scan: ScanResult): CrisisTriggerSource {
  return scan.decision_source === 'critical_marker' ? 'semantic_analyzer' : 'keyword_scanner';
}

function defaultCrisisId(): string {
  return `crisis_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

export class CrisisEscalationService {
  private readonly ledger: AuditLedger;
  private readonly hashStudentRef: PiiHasher;
  private readonly store: CrisisRecordStore;
  private readonly clock: () => Date;
  private readonly idGenerator: () => string;
  private readonly queue = new KeyedSerialQueue();
  private readonly timers: EscalationTimers;
  private readonly listeners = new Set<CrisisTransitionListener>();
  private readonly pendingExpiries = new Set<Promise<TransitionResult>>();

  constructor(options: CrisisEscalationOptions) {
    this.ledger = options.ledger;
    this.hashStudentRef = options.hashStudentRef;
    this.store = options.store ?? new InMemoryCrisisRecordStore();
    this.clock = options.clock ?? (() => new Date());
    this.idGenerator = options.idGenerator ?? defaultCrisisId;
    this.timers = new EscalationTimers(options.ackTimeoutMs ?? DEFAULT_ACK_TIMEOUT_MS, (crisisId, token) =>
      this.trackExpiry(crisisId, token)
    );
  }

  // ===========================================================================
  // Detection
  // ===========================================================================

  /**
   * Open a crisis for a CRISIS scan, or merge the new evidence into the
   * session's open crisis. Repeating a message already on record is a no-op.
   */
  detect(scan: ScanResult, message: Message): Promise<DetectionResult> {
    if (scan.risk_level !== 'CRISIS') {
      return Promise.resolve(
        this.reject('NOT_CRISIS', null, null, 'DETECT', `Scan ${scan.message_id} is ${scan.risk_level}, not CRISIS`)
      );
    }

    return this.queue.run(`session:${message.session_id}`, async (): Promise<DetectionResult> => {
      const open = this.store.findOpenBySession(message.session_id);
      if (open) {
        return this.queue.run(`crisis:${open.crisis_id}`, () => this.mergeEvidence(open.crisis_id, scan, message));
      }
      return this.openCrisis(scan, message);
    });
  }

  private openCrisis(scan: ScanResult, message: Message): DetectionResult {
    const now = this.clock().toISOString();
    const record: CrisisRecord = {
      crisis_id: this.idGenerator(),
      student_ref_hash: this.hashStudentRef(message.student_ref),
      session_id: message.session_id,
      school_id: message.school_id,
      state: 'DETECTED',
      trigger_source: triggerSourceFor(scan),
      trigger_terms: [...scan.matched_terms],
      trigger_message_ids: [message.message_id],
      created_at: now,
      updated_at: now,
      escalation_path: ['counselor_alert'],
      version: 1
    };

    const saved = this.store.save(record, null);
    const entry = this.ledger.append({
      action: 'crisis.detected',
      entity_type: 'crisis_event',
      entity_ref: saved.crisis_id,
      actor_ref: SYSTEM_ACTOR,
      details: {
        session_id: saved.session_id,
        school_id: saved.school_id ?? null,
        student_ref_hash: saved.student_ref_hash,
        message_id: message.message_id,
        text_hash: hashTextForAudit(message.text),
        trigger_source: saved.trigger_source,
        trigger_terms: [...saved.trigger_terms],
        risk_score: scan.risk_score,
        version: saved.version
      }
    });

    log.warn('Crisis detected', {
      crisis_id: saved.crisis_id,
      session_id: saved.session_id,
      trigger_source: saved.trigger_source
    });
    this.emit(saved, null);

    return { ok: true, record: saved, created: true, audit_entry_id: entry.entry_id };
  }

  private mergeEvidence(crisisId: string, scan: ScanResult, message: Message): DetectionResult {
    const current = this.store.get(crisisId);
    if (!current || !isOpen(current.state)) {
      // Resolved while this detection waited; the session needs a new crisis
      return this.openCrisis(scan, message);
    }

    if (current.trigger_message_ids.includes(message.message_id)) {
      return { ok: true, record: current, created: false, audit_entry_id: null };
    }

    const terms = [...new Set([...current.trigger_terms, ...scan.matched_terms])].sort();
    const saved = this.store.save(
      {
        ...current,
        trigger_terms: terms,
        trigger_message_ids: [...current.trigger_message_ids, message.message_id],
        updated_at: this.clock().toISOString(),
        version: current.version + 1
      },
      current.version
    );

    const entry = this.ledger.append({
      action: 'crisis.evidence_updated',
      entity_type: 'crisis_event',
      entity_ref: crisisId,
      actor_ref: SYSTEM_ACTOR,
      details: {
        state: saved.state,
        message_id: message.message_id,
        text_hash: hashTextForAudit(message.text),
        trigger_terms: [...saved.trigger_terms],
        risk_score: scan.risk_score,
        version: saved.version
      }
    });

    log.info('Crisis evidence merged', { crisis_id: crisisId, message_count: saved.trigger_message_ids.length });
    return { ok: true, record: saved, created: false, audit_entry_id: entry.entry_id };
  }

  // ===========================================================================
  // Transitions
  // ===========================================================================

  /**
   * DETECTED → NOTIFYING, and start the acknowledgment timer.
   */
  notify(crisisId: string): Promise<TransitionResult> {
    return this.transition(crisisId, { type: 'NOTIFY' }, SYSTEM_ACTOR, () => ({}), {}, () => {
      this.timers.schedule(crisisId);
    });
  }

  /**
   * NOTIFYING | ESCALATED → ACKNOWLEDGED. Cancels any pending escalation.
   */
  acknowledge(crisisId: string, actor: string, options: TransitionOptions = {}): Promise<TransitionResult> {
    return this.transition(
      crisisId,
      { type: 'ACKNOWLEDGE', actor },
      actor,
      (_record, now) => ({ acknowledged_at: now, acknowledged_by: actor }),
      options,
      () => {
        this.timers.cancel(crisisId);
      }
    );
  }

  beginProgress(crisisId: string, actor: string, options: TransitionOptions = {}): Promise<TransitionResult> {
    return this.transition(
      crisisId,
      { type: 'BEGIN_PROGRESS', actor },
      actor,
      (_record, now) => ({ in_progress_at: now }),
      options
    );
  }

  resolve(crisisId: string, actor: string, notes: string, options: TransitionOptions = {}): Promise<TransitionResult> {
    return this.transition(
      crisisId,
      { type: 'RESOLVE', actor, notes },
      actor,
      (_record, now) => ({ resolved_at: now, resolved_by: actor, resolution_notes: notes }),
      options,
      () => {
        this.timers.cancel(crisisId);
      }
    );
  }

  /**
   * Timer expiry. Acts only if `token` is still the live timer and the crisis
   * is still waiting in NOTIFYING; anything else is a stale fire.
   */
  handleAckTimeout(crisisId: string, token: number): Promise<TransitionResult> {
    return this.queue.run(`crisis:${crisisId}`, () => {
      const record = this.store.get(crisisId);
      if (!this.timers.isCurrent(crisisId, token) || !record || record.state !== 'NOTIFYING') {
        log.debug('Ignoring stale escalation timer', { crisis_id: crisisId, token });
        this.timers.release(crisisId, token);
        return this.reject('STALE_TIMER', crisisId, record?.state ?? null, 'ACK_TIMEOUT', 'Escalation timer is no longer current');
      }

      this.timers.release(crisisId, token);
      const result = this.apply(record, { type: 'ACK_TIMEOUT' }, SYSTEM_ACTOR, (current, now) => ({
        escalated_at: now,
        escalation_path: appendPath(current.escalation_path, 'admin_alert')
      }));
      if (result.ok) {
        log.warn('Crisis escalated after acknowledgment timeout', {
          crisis_id: crisisId,
          escalation_path: result.record.escalation_path
        });
      }
      return result;
    });
  }

  private transition(
    crisisId: string,
    event: CrisisEvent,
    actorRef: string,
    patch: RecordPatch,
    options: TransitionOptions = {},
    afterCommit?: () => void
  ): Promise<TransitionResult> {
    return this.queue.run(`crisis:${crisisId}`, () => {
      const record = this.store.get(crisisId);
      if (!record) {
        return this.reject('NOT_FOUND', crisisId, null, event.type, `Crisis ${crisisId} not found`);
      }
      if (options.expectedVersion !== undefined && options.expectedVersion !== record.version) {
        return this.reject(
          'VERSION_CONFLICT',
          crisisId,
          record.state,
          event.type,
          `Crisis ${crisisId} is at version ${record.version}, expected ${options.expectedVersion}`
        );
      }

      const result = this.apply(record, event, actorRef, patch);
      if (result.ok && afterCommit) {
        afterCommit();
      }
      return result;
    });
  }

  /**
   * Must run inside the crisis queue.
   */
  private apply(record: CrisisRecord, event: CrisisEvent, actorRef: string, patch: RecordPatch): TransitionResult {
    const next = evaluateTransition(record.state, event, record.crisis_id);
    if (next === null) {
      log.warn('Rejected crisis transition', { crisis_id: record.crisis_id, from_state: record.state, event: event.type });
      return this.reject(
        'INVALID_TRANSITION',
        record.crisis_id,
        record.state,
        event.type,
        `Cannot apply ${event.type} in state ${record.state}`
      );
    }

    const now = this.clock().toISOString();
    let saved: CrisisRecord;
    try {
      saved = this.store.save(
        { ...record, ...patch(record, now), state: next, updated_at: now, version: record.version + 1 },
        record.version
      );
    } catch (err: unknown) {
      if (err instanceof VersionConflictError) {
        return this.reject('VERSION_CONFLICT', record.crisis_id, record.state, event.type, err.message);
      }
      throw err;
    }

    const entry = this.ledger.append({
      action: STATE_ACTIONS[next],
      entity_type: 'crisis_event',
      entity_ref: saved.crisis_id,
      actor_ref: actorRef,
      details: {
        event: event.type,
        from_state: record.state,
        to_state: next,
        version: saved.version,
        escalation_path: [...saved.escalation_path],
        ...(event.type === 'RESOLVE' ? { resolution_notes_hash: hashTextForAudit(event.notes) } : {})
      }
    });

    log.info('Crisis transition', {
      crisis_id: saved.crisis_id,
      from_state: record.state,
      to_state: next,
      version: saved.version
    });
    this.emit(saved, record.state);

    return { ok: true, record: saved, audit_entry_id: entry.entry_id };
  }

  private reject(
    code: TransitionRejectionCode,
    crisisId: string | null,
    fromState: CrisisState | null,
    event: TransitionRejection['event'],
    message: string
  ): TransitionRejection {
    return { ok: false, code, crisis_id: crisisId, from_state: fromState, event, message };
  }

  // ===========================================================================
  // Reads & Lifecycle
  // ===========================================================================

  get(crisisId: string): CrisisRecord | undefined {
    return this.store.get(crisisId);
  }

  findOpenBySession(sessionId: string): CrisisRecord | undefined {
    return this.store.findOpenBySession(sessionId);
  }

  /**
   * Open crises, oldest first.
   */
  listActive(filter: { school_id?: string } = {}): CrisisRecord[] {
    return this.store
      .list()
      .filter((record) => isOpen(record.state))
      .filter((record) => filter.school_id === undefined || record.school_id === filter.school_id)
      .sort((a, b) => a.created_at.localeCompare(b.created_at) || a.crisis_id.localeCompare(b.crisis_id));
  }

  onTransition(listener: CrisisTransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Number of crises waiting on an acknowledgment timer */
  get pendingTimers(): number {
    return this.timers.size;
  }

  /**
   * Resolves once every timer-driven transition already started has finished.
   */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingExpiries]);
  }

  async shutdown(): Promise<void> {
    this.timers.cancelAll();
    await this.flush();
    this.listeners.clear();
  }

  private trackExpiry(crisisId: string, token: number): void {
    const pending = this.handleAckTimeout(crisisId, token).catch((err: unknown): TransitionResult => {
      log.error('Escalation timer handling failed', { crisis_id: crisisId, error: errorMessage(err) });
      return this.reject('STALE_TIMER', crisisId, null, 'ACK_TIMEOUT', errorMessage(err));
    });
    this.pendingExpiries.add(pending);
    void pending.then(() => {
      this.pendingExpiries.delete(pending);
    });
  }

  private emit(record: CrisisRecord, previousState: CrisisState | null): void {
    const notice: CrisisTransitionNotice = {
      crisis_id: record.crisis_id,
      state: record.state,
      previous_state: previousState,
      escalation_path: record.escalation_path,
      session_id: record.session_id,
      school_id: record.school_id,
      occurred_at: record.updated_at
    };

    for (const listener of this.listeners) {
      try {
        listener(notice);
      } catch (err: unknown) {
        log.error('Transition listener failed', { crisis_id: record.crisis_id, error: errorMessage(err) });
      }
    }
  }
}

function appendPath(path: readonly EscalationPath[], next: EscalationPath): EscalationPath[] {
  return path.includes(next) ? [...path] : [...path, next];
}
