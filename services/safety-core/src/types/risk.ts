/**
 * Message risk classification types.
 *
 * Every inbound message is classified SAFE, CAUTION or CRISIS before any
 * generative response is produced. CRISIS always bypasses generation.
 *
 * Determinism Rules:
 *   - Same normalized text + same configuration versions → same decision
 *   - A crisis-grade signal from either layer wins; scores are never averaged down
 *   - An unscanned message is never treated as SAFE
 */

import { z } from 'zod';

// =============================================================================
// Risk Levels
// =============================================================================

export const RiskLevel = z.enum(['SAFE', 'CAUTION', 'CRISIS']);
export type RiskLevel = z.infer<typeof RiskLevel>;

/**
 * Ordering used when a result has to be floored (fail-closed) or compared.
 */
export const RISK_LEVEL_RANK: Record<RiskLevel, number> = {
  SAFE: 0,
  CAUTION: 1,
  CRISIS: 2
};

// =============================================================================
// Inbound Message
// =============================================================================

export const MessageSchema = z.object({
  message_id: z.string().min(1),
  text: z.string(),
  student_ref: z.string().min(1),
  session_id: z.string().min(1),
  school_id: z.string().min(1).optional()
});
export type Message = z.infer<typeof MessageSchema>;

// =============================================================================
// Layer 1: Keyword Scanner
// =============================================================================

export const TermKind = z.enum(['crisis', 'caution']);
export type TermKind = z.infer<typeof TermKind>;

export interface KeywordScanResult {
  /** Every matched term (crisis and caution), de-duplicated and sorted */
  matched: string[];
  crisis_matches: string[];
  caution_matches: string[];
  layer_score: number; // 0.0 - 1.0
  term_table_version: string;
}

// =============================================================================
// Layer 2: Semantic Analyzer
// =============================================================================

export const ClinicalFramework = z.enum(['PHQ9', 'GAD7']);
export type ClinicalFramework = z.infer<typeof ClinicalFramework>;

export type MarkerSeverity = 1 | 2 | 3;

export interface ClinicalMarker {
  framework: ClinicalFramework;
  item: number;
  item_name: string;
  severity: MarkerSeverity;
  matched_text: string;
  is_critical: boolean;
}

export interface SemanticAnalysis {
  markers: ClinicalMarker[];
  phq9_score: number; // 0 - 27
  gad7_score: number; // 0 - 21
  risk_factors: string[];
  protective_factors: string[];
  semantic_risk_score: number; // 0.0 - 1.0
  confidence: number; // 0.0 - 1.0
  explanation: string;
  pattern_library_version: string;
}

// =============================================================================
// Decision
// =============================================================================

export const DecisionThresholdsSchema = z
  .object({
    layer1_weight: z.number().min(0).max(1),
    layer2_weight: z.number().min(0).max(1),
    caution_threshold: z.number().gt(0).max(1)
  })
  .refine((t) => t.layer1_weight + t.layer2_weight > 0, {
    message: 'At least one layer weight must be positive'
  });
export type DecisionThresholds = z.infer<typeof DecisionThresholdsSchema>;

export const DEFAULT_DECISION_THRESHOLDS: DecisionThresholds = {
  layer1_weight: 0.6,
  layer2_weight: 0.4,
  caution_threshold: 0.3
};

export type DecisionSource =
  | 'keyword_crisis'   // Layer 1 matched a crisis term
  | 'critical_marker'  // Layer 2 matched a critical clinical item
  | 'combined_score'   // Weighted score against the caution threshold
  | 'fail_closed';     // A layer failed; floored at CAUTION

export interface RiskDecision {
  risk_level: RiskLevel;
  risk_score: number;
  combined_score: number;
  bypass_generation: boolean;
  matched_terms: string[];
  decision_source: DecisionSource;
}

// =============================================================================
// Scan Result
// =============================================================================

export interface ScanError {
  stage: 'normalization' | 'keyword_scan' | 'semantic_analysis';
  message: string;
}

/**
 * Produced exactly once per message and frozen on creation.
 */
export interface ScanResult {
  readonly message_id: string;
  readonly risk_level: RiskLevel;
  readonly risk_score: number;
  /** Layer 1 terms; a critical-marker CRISIS adds `PHQ9#9:<matched text>` */
  readonly matched_terms: readonly string[];
  readonly bypass_generation: boolean;
  readonly decision_source: DecisionSource;
  readonly latency_ms: number;
  readonly term_table_version: string;
  readonly pattern_library_version: string;
  readonly scanned_at: string;
  readonly errors: readonly ScanError[];
}
