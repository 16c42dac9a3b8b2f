/**
 * Crisis escalation types.
 *
 * State flow:
 *   DETECTED → NOTIFYING → ACKNOWLEDGED → IN_PROGRESS → RESOLVED
 *   NOTIFYING → ESCALATED (no acknowledgment before the timeout)
 *   ESCALATED → ACKNOWLEDGED (backup responder acts)
 *
 * RESOLVED is terminal. Records are never deleted.
 */

import { z } from 'zod';

// =============================================================================
// States & Events
// =============================================================================

export const CrisisState = z.enum([
  'DETECTED',
  'NOTIFYING',
  'ACKNOWLEDGED',
  'IN_PROGRESS',
  'RESOLVED',
  'ESCALATED'
]);
export type CrisisState = z.infer<typeof CrisisState>;

export type CrisisEvent =
  | { type: 'NOTIFY' }
  | { type: 'ACKNOWLEDGE'; actor: string }
  | { type: 'BEGIN_PROGRESS'; actor: string }
  | { type: 'RESOLVE'; actor: string; notes: string }
  | { type: 'ACK_TIMEOUT' };

export type CrisisEventType = CrisisEvent['type'];

export interface CrisisMachineContext {
  crisisId: string;
}

/**
 * Who gets told, in order. Escalation appends the next responder.
 */
export const EscalationPath = z.enum([
  'counselor_alert',
  'admin_alert',
  'emergency_services',
  'parent_notification'
]);
export type EscalationPath = z.infer<typeof EscalationPath>;

export type CrisisTriggerSource = 'keyword_scanner' | 'semantic_analyzer';

// =============================================================================
// Crisis Record
// =============================================================================

export interface CrisisRecord {
  readonly crisis_id: string;
  readonly student_ref_hash: string;
  readonly session_id: string;
  readonly school_id?: string;
  readonly state: CrisisState;
  readonly trigger_source: CrisisTriggerSource;
  readonly trigger_terms: readonly string[];
  readonly trigger_message_ids: readonly string[];
  readonly created_at: string;
  readonly updated_at: string;
  readonly acknowledged_at?: string;
  readonly acknowledged_by?: string;
  readonly in_progress_at?: string;
  readonly escalated_at?: string;
  readonly resolved_at?: string;
  readonly resolved_by?: string;
  readonly resolution_notes?: string;
  readonly escalation_path: readonly EscalationPath[];
  readonly version: number;
}

// =============================================================================
// Transition Outcomes
// =============================================================================

export type TransitionRejectionCode =
  | 'INVALID_TRANSITION'
  | 'NOT_FOUND'
  | 'NOT_CRISIS'
  | 'STALE_TIMER'
  | 'VERSION_CONFLICT';

export interface TransitionRejection {
  ok: false;
  code: TransitionRejectionCode;
  crisis_id: string | null;
  from_state: CrisisState | null;
  event: CrisisEventType | 'DETECT';
  message: string;
}

export interface TransitionSuccess {
  ok: true;
  record: CrisisRecord;
  audit_entry_id: string;
}

export type TransitionResult = TransitionSuccess | TransitionRejection;

/**
 * A repeat detection for a message already on the record changes nothing,
 * so it carries no audit entry.
 */
export interface DetectionSuccess {
  ok: true;
  record: CrisisRecord;
  created: boolean;
  audit_entry_id: string | null;
}

export type DetectionResult = DetectionSuccess | TransitionRejection;

/**
 * Payload handed to the notification-dispatch collaborator on every change.
 */
export interface CrisisTransitionNotice {
  crisis_id: string;
  state: CrisisState;
  previous_state: CrisisState | null;
  escalation_path: readonly EscalationPath[];
  session_id: string;
  school_id?: string;
  occurred_at: string;
}

export type CrisisTransitionListener = (notice: CrisisTransitionNotice) => void;

// =============================================================================
// Request Schemas
// =============================================================================

export const AcknowledgeRequestSchema = z.object({
  actor: z.string().min(1),
  expected_version: z.number().int().min(1).optional()
});

export const BeginProgressRequestSchema = z.object({
  actor: z.string().min(1),
  expected_version: z.number().int().min(1).optional()
});

export const ResolveRequestSchema = z.object({
  actor: z.string().min(1),
  notes: z.string().min(1).max(4000),
  expected_version: z.number().int().min(1).optional()
});

export const ListActiveRequestSchema = z.object({
  school_id: z.string().min(1).optional()
});
