/**
 * Reporting over recorded scan decisions.
 */

import { z } from 'zod';
import type { RiskLevel } from './risk';

export const ScanGroupBy = z.enum(['school_id', 'risk_level', 'session_id']);
export type ScanGroupBy = z.infer<typeof ScanGroupBy>;

export const ScanMetric = z.enum(['risk_score', 'combined_score', 'phq9_score', 'gad7_score', 'crisis']);
export type ScanMetric = z.infer<typeof ScanMetric>;

export const AggregationKind = z.enum(['avg', 'sum', 'count', 'min', 'max']);

export const AggregateRequestSchema = z.object({
  group_by: ScanGroupBy,
  field: ScanMetric.optional(),
  agg: AggregationKind,
  k: z.number().int().min(1).optional(),
  since: z.string().datetime().optional(),
  until: z.string().datetime().optional()
});
export type AggregateRequest = z.infer<typeof AggregateRequestSchema>;

/**
 * One scan decision, flattened from its `scan.decided` ledger entry.
 */
export interface ScanDecisionRecord {
  message_id: string;
  school_id: string | null;
  session_id: string;
  student_ref_hash: string;
  risk_level: RiskLevel;
  risk_score: number;
  combined_score: number;
  phq9_score: number;
  gad7_score: number;
  /** 1 when the decision was CRISIS, else 0 */
  crisis: number;
  scanned_at: string;
}

export interface AggregateGroup {
  group: string;
  data: number | null;
  group_size: number;
  suppressed: boolean;
  suppression_reason?: string;
}
