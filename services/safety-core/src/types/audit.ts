/**
 * Audit ledger types.
 *
 * The ledger is an append-only, index-addressable sequence. Each entry embeds
 * the hash of its predecessor, so any retroactive edit breaks the chain.
 */

import { z } from 'zod';

export const GENESIS_HASH = 'genesis';

export const AuditAction = z.enum([
  'scan.decided',
  'crisis.detected',
  'crisis.evidence_updated',
  'crisis.notifying',
  'crisis.acknowledged',
  'crisis.in_progress',
  'crisis.escalated',
  'crisis.resolved',
  'data.viewed',
  'data.exported'
]);
export type AuditAction = z.infer<typeof AuditAction>;

export const AuditEntityType = z.enum(['message', 'crisis_event', 'report', 'system']);
export type AuditEntityType = z.infer<typeof AuditEntityType>;

export type AuditDetailValue =
  | string
  | number
  | boolean
  | null
  | AuditDetailValue[]
  | { [key: string]: AuditDetailValue };

export type AuditDetails = { [key: string]: AuditDetailValue };

export interface AuditEntry {
  readonly sequence: number;
  readonly entry_id: string;
  readonly timestamp: string;
  readonly action: AuditAction;
  readonly entity_type: AuditEntityType;
  readonly entity_ref: string;
  readonly actor_ref: string;
  readonly details: Readonly<AuditDetails>;
  readonly previous_hash: string;
  readonly entry_hash: string;
}

/**
 * What a caller hands to append(). previous_hash is optional: when given it
 * must equal the current head, which lets a writer detect a stale view.
 */
export interface AuditEntryDraft {
  action: AuditAction;
  entity_type: AuditEntityType;
  entity_ref: string;
  actor_ref: string;
  details?: AuditDetails;
  previous_hash?: string;
}

export interface ChainInspection {
  valid: boolean;
  checked: number;
  failed_at_sequence?: number;
  reason?: 'sequence_gap' | 'previous_hash_mismatch' | 'entry_hash_mismatch' | 'anchor_hash_mismatch';
}

export type AuditAppendListener = (entry: AuditEntry) => void;

// =============================================================================
// Query Filters
// =============================================================================

export const AuditQuerySchema = z.object({
  action: AuditAction.optional(),
  entity_type: AuditEntityType.optional(),
  entity_ref: z.string().min(1).optional(),
  actor_ref: z.string().min(1).optional(),
  since: z.string().datetime().optional(),
  until: z.string().datetime().optional(),
  from_sequence: z.coerce.number().int().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional()
});
export type AuditQuery = z.infer<typeof AuditQuerySchema>;

// =============================================================================
// Data Access
// =============================================================================

/**
 * Who is reading student or clinical data, and why. Required on every read
 * route; the read is recorded as a `data.viewed` or `data.exported` entry.
 */
export const AccessContextSchema = z.object({
  actor: z.string().min(1),
  justification: z.string().min(1).max(500).optional()
});
export type AccessContext = z.infer<typeof AccessContextSchema>;
