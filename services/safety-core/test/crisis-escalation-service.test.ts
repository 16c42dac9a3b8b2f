/**
 * Tests for the Crisis Escalation Service: detection, transitions,
 * acknowledgment timeouts and concurrent requests.
 */

import { createPiiHasher } from '../src/lib/pii';
import { AuditLedger } from '../src/services/audit-ledger';
import { CrisisEscalationService } from '../src/services/crisis-escalation-service';
import type { CrisisTransitionNotice } from '../src/types/crisis';
import type { Message, RiskLevel, ScanResult } from '../src/types/risk';

const TEST_SALT = 'test-salt-test-salt-test-salt-0000';
const ACK_TIMEOUT_MS = 1000;

const message = (overrides: Partial<Message> = {}): Message => ({
  message_id: 'msg-1',
  text: 'i want to kill myself',
  student_ref: 'student-1',
  session_id: 'session-1',
  school_id: 'school-a',
  ...overrides
});

const scanFor = (msg: Message, riskLevel: RiskLevel = 'CRISIS', terms: string[] = ['kill myself']): ScanResult => ({
  message_id: msg.message_id,
  risk_level: riskLevel,
  risk_score: riskLevel === 'CRISIS' ? 1 : 0.4,
  matched_terms: terms,
  bypass_generation: riskLevel === 'CRISIS',
  decision_source: riskLevel === 'CRISIS' ? 'keyword_crisis' : 'combined_score',
  latency_ms: 1,
  term_table_version: 'test',
  pattern_library_version: 'test',
  scanned_at: '2026-03-01T09:00:00.000Z',
  errors: []
});

describe('Crisis Escalation Service', () => {
  let ledger: AuditLedger;
  let service: CrisisEscalationService;
  const hashStudentRef = createPiiHasher(TEST_SALT);

  beforeEach(() => {
    jest.useFakeTimers();
    let ids = 0;
    ledger = new AuditLedger();
    service = new CrisisEscalationService({
      ledger,
      hashStudentRef,
      ackTimeoutMs: ACK_TIMEOUT_MS,
      idGenerator: () => `crisis-${++ids}`
    });
  });

  afterEach(async () => {
    await service.shutdown();
    jest.useRealTimers();
  });

  async function openAndNotify(msg: Message = message()): Promise<string> {
    const detected = await service.detect(scanFor(msg), msg);
    if (!detected.ok) {
      throw new Error(`detection rejected: ${detected.code}`);
    }
    await service.notify(detected.record.crisis_id);
    return detected.record.crisis_id;
  }

  const auditActions = () => ledger.entries().map((entry) => entry.action);

  describe('detect', () => {
    it('should open a crisis for a CRISIS scan', async () => {
      const msg = message();
      const result = await service.detect(scanFor(msg), msg);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.created).toBe(true);
      expect(result.record).toMatchObject({
        crisis_id: 'crisis-1',
        state: 'DETECTED',
        session_id: 'session-1',
        school_id: 'school-a',
        trigger_source: 'keyword_scanner',
        trigger_terms: ['kill myself'],
        trigger_message_ids: ['msg-1'],
        escalation_path: ['counselor_alert'],
        version: 1
      });
      expect(result.record.student_ref_hash).toBe(hashStudentRef('student-1'));
      expect(result.record.student_ref_hash).not.toBe('student-1');
      expect(auditActions()).toEqual(['crisis.detected']);
      expect(ledger.get(1)?.entry_id).toBe(result.audit_entry_id);
    });

    it('should refuse a scan that is not CRISIS', async () => {
      const msg = message();
      const result = await service.detect(scanFor(msg, 'CAUTION', ['hopeless']), msg);

      expect(result).toMatchObject({ ok: false, code: 'NOT_CRISIS', event: 'DETECT' });
      expect(ledger.size()).toBe(0);
    });

    it('should merge a second detection into the open crisis for the session', async () => {
      const first = message();
      const second = message({ message_id: 'msg-2', text: 'i want to die' });
      await service.detect(scanFor(first), first);
      const result = await service.detect(scanFor(second, 'CRISIS', ['want to die']), second);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.created).toBe(false);
      expect(result.record.crisis_id).toBe('crisis-1');
      expect(result.record.trigger_terms).toEqual(['kill myself', 'want to die']);
      expect(result.record.trigger_message_ids).toEqual(['msg-1', 'msg-2']);
      expect(result.record.version).toBe(2);
      expect(auditActions()).toEqual(['crisis.detected', 'crisis.evidence_updated']);
    });

    it('should ignore a repeat of a message already on the record', async () => {
      const msg = message();
      await service.detect(scanFor(msg), msg);
      const repeat = await service.detect(scanFor(msg), msg);

      expect(repeat).toMatchObject({ ok: true, created: false, audit_entry_id: null });
      expect(ledger.size()).toBe(1);
    });

    it('should open one crisis for concurrent detections in a session', async () => {
      const a = message({ message_id: 'msg-a' });
      const b = message({ message_id: 'msg-b' });
      const [first, second] = await Promise.all([service.detect(scanFor(a), a), service.detect(scanFor(b), b)]);

      expect(first).toMatchObject({ ok: true, created: true });
      expect(second).toMatchObject({ ok: true, created: false });
      expect(service.listActive()).toHaveLength(1);
      expect(service.get('crisis-1')?.trigger_message_ids).toEqual(['msg-a', 'msg-b']);
    });

    it('should keep separate sessions separate', async () => {
      await openAndNotify(message());
      await openAndNotify(message({ message_id: 'msg-9', session_id: 'session-2', school_id: 'school-b' }));

      expect(service.listActive().map((record) => record.crisis_id)).toEqual(['crisis-1', 'crisis-2']);
      expect(service.listActive({ school_id: 'school-b' }).map((record) => record.crisis_id)).toEqual(['crisis-2']);
    });

    it('should open a new crisis once the previous one is resolved', async () => {
      const id = await openAndNotify();
      await service.acknowledge(id, 'counselor-1');
      await service.resolve(id, 'counselor-1', 'Parent contacted');

      const next = message({ message_id: 'msg-3' });
      const result = await service.detect(scanFor(next), next);

      expect(result).toMatchObject({ ok: true, created: true });
      expect(service.findOpenBySession('session-1')?.crisis_id).toBe('crisis-2');
    });
  });

  describe('transitions', () => {
    it('should walk the full lifecycle with one audit entry per step', async () => {
      const id = await openAndNotify();
      expect(service.get(id)?.state).toBe('NOTIFYING');

      const acked = await service.acknowledge(id, 'counselor-1');
      const started = await service.beginProgress(id, 'counselor-1');
      const resolved = await service.resolve(id, 'counselor-1', 'Safety plan agreed');

      expect(acked).toMatchObject({ ok: true, record: { state: 'ACKNOWLEDGED', acknowledged_by: 'counselor-1' } });
      expect(started).toMatchObject({ ok: true, record: { state: 'IN_PROGRESS' } });
      expect(resolved).toMatchObject({
        ok: true,
        record: { state: 'RESOLVED', resolved_by: 'counselor-1', resolution_notes: 'Safety plan agreed', version: 5 }
      });
      expect(auditActions()).toEqual([
        'crisis.detected',
        'crisis.notifying',
        'crisis.acknowledged',
        'crisis.in_progress',
        'crisis.resolved'
      ]);
      expect(ledger.get(5)?.details).toMatchObject({ from_state: 'IN_PROGRESS', to_state: 'RESOLVED', event: 'RESOLVE' });
      expect(ledger.get(5)?.actor_ref).toBe('counselor-1');
      expect(service.listActive()).toEqual([]);
      expect(ledger.verify().valid).toBe(true);
    });

    it('should reject a transition the table does not allow', async () => {
      const msg = message();
      await service.detect(scanFor(msg), msg);

      const result = await service.resolve('crisis-1', 'counselor-1', 'too early');

      expect(result).toEqual({
        ok: false,
        code: 'INVALID_TRANSITION',
        crisis_id: 'crisis-1',
        from_state: 'DETECTED',
        event: 'RESOLVE',
        message: 'Cannot apply RESOLVE in state DETECTED'
      });
      expect(service.get('crisis-1')?.state).toBe('DETECTED');
      expect(ledger.size()).toBe(1);
    });

    it('should reject everything after resolution', async () => {
      const id = await openAndNotify();
      await service.acknowledge(id, 'counselor-1');
      await service.resolve(id, 'counselor-1', 'Closed');

      expect(await service.acknowledge(id, 'counselor-2')).toMatchObject({ ok: false, code: 'INVALID_TRANSITION' });
    });

    it('should report an unknown crisis', async () => {
      expect(await service.acknowledge('crisis-404', 'counselor-1')).toMatchObject({
        ok: false,
        code: 'NOT_FOUND',
        crisis_id: 'crisis-404',
        from_state: null
      });
    });

    it('should reject a stale expected version', async () => {
      const id = await openAndNotify();

      const result = await service.acknowledge(id, 'counselor-1', { expectedVersion: 1 });

      expect(result).toMatchObject({
        ok: false,
        code: 'VERSION_CONFLICT',
        message: 'Crisis crisis-1 is at version 2, expected 1'
      });
      expect(service.get(id)?.state).toBe('NOTIFYING');
    });

    it('should let exactly one of two concurrent acknowledgments win', async () => {
      const id = await openAndNotify();

      const results = await Promise.all([
        service.acknowledge(id, 'counselor-1'),
        service.acknowledge(id, 'counselor-2')
      ]);

      expect(results.map((r) => r.ok)).toEqual([true, false]);
      expect(results[1]).toMatchObject({ code: 'INVALID_TRANSITION', from_state: 'ACKNOWLEDGED' });
      expect(service.get(id)?.acknowledged_by).toBe('counselor-1');
      expect(auditActions().filter((action) => action === 'crisis.acknowledged')).toHaveLength(1);
    });

    it('should notify listeners of every change', async () => {
      const notices: CrisisTransitionNotice[] = [];
      service.onTransition((notice) => notices.push(notice));
      service.onTransition(() => {
        throw new Error('pager offline');
      });

      const id = await openAndNotify();
      await service.acknowledge(id, 'counselor-1');

      expect(notices.map((n) => [n.previous_state, n.state])).toEqual([
        [null, 'DETECTED'],
        ['DETECTED', 'NOTIFYING'],
        ['NOTIFYING', 'ACKNOWLEDGED']
      ]);
      expect(notices[0].escalation_path).toEqual(['counselor_alert']);
    });
  });

  describe('acknowledgment timeout', () => {
    it('should escalate a crisis nobody acknowledges', async () => {
      const id = await openAndNotify();
      expect(service.pendingTimers).toBe(1);

      jest.advanceTimersByTime(ACK_TIMEOUT_MS);
      await service.flush();

      const record = service.get(id);
      expect(record?.state).toBe('ESCALATED');
      expect(record?.escalation_path).toEqual(['counselor_alert', 'admin_alert']);
      expect(service.pendingTimers).toBe(0);

      const escalation = ledger.get(3);
      expect(escalation?.action).toBe('crisis.escalated');
      expect(escalation?.actor_ref).toBe('system');
    });

    it('should let a backup responder acknowledge an escalated crisis', async () => {
      const id = await openAndNotify();
      jest.advanceTimersByTime(ACK_TIMEOUT_MS);
      await service.flush();

      expect(await service.acknowledge(id, 'principal-1')).toMatchObject({
        ok: true,
        record: { state: 'ACKNOWLEDGED', acknowledged_by: 'principal-1' }
      });
    });

    it('should not escalate once acknowledged', async () => {
      const id = await openAndNotify();
      jest.advanceTimersByTime(ACK_TIMEOUT_MS - 1);
      await service.acknowledge(id, 'counselor-1');

      jest.advanceTimersByTime(ACK_TIMEOUT_MS);
      await service.flush();

      expect(service.get(id)?.state).toBe('ACKNOWLEDGED');
      expect(service.pendingTimers).toBe(0);
      expect(auditActions()).not.toContain('crisis.escalated');
    });

    it('should let an acknowledgment queued before the timeout win the race', async () => {
      const id = await openAndNotify();

      const ack = service.acknowledge(id, 'counselor-1');
      jest.advanceTimersByTime(ACK_TIMEOUT_MS);
      await ack;
      await service.flush();

      expect(service.get(id)?.state).toBe('ACKNOWLEDGED');
      expect(auditActions()).toEqual(['crisis.detected', 'crisis.notifying', 'crisis.acknowledged']);
    });

    it('should ignore a timer token that is no longer current', async () => {
      const id = await openAndNotify();

      expect(await service.handleAckTimeout(id, 999)).toMatchObject({
        ok: false,
        code: 'STALE_TIMER',
        from_state: 'NOTIFYING'
      });
      expect(service.get(id)?.state).toBe('NOTIFYING');
      expect(service.pendingTimers).toBe(1);
    });

    it('should cancel pending timers on shutdown', async () => {
      await openAndNotify();
      await service.shutdown();

      expect(service.pendingTimers).toBe(0);
      jest.advanceTimersByTime(ACK_TIMEOUT_MS);
      await service.flush();
      expect(service.get('crisis-1')?.state).toBe('NOTIFYING');
    });
  });
});
