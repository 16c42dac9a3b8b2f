/**
 * Risk Decision Engine
 *
 * Combines Layer 1 and Layer 2 into one classification. Pure: no I/O, no
 * clock, no state. A crisis-grade signal from either layer always wins.
 */

import { roundScore } from '../lib/scores';
import {
  DEFAULT_DECISION_THRESHOLDS,
  type ClinicalMarker,
  type DecisionThresholds,
  type KeywordScanResult,
  type RiskDecision,
  type SemanticAnalysis
} from '../types/risk';

/**
 * Evidence label for a critical marker, e.g. `PHQ9#9:wish i was dead`.
 */
export function markerEvidence(marker: ClinicalMarker): string {
  return `${marker.framework}#${marker.item}:${marker.matched_text}`;
}

export function decide(
  layer1: KeywordScanResult,
  layer2: SemanticAnalysis,
  thresholds: DecisionThresholds = DEFAULT_DECISION_THRESHOLDS
): RiskDecision {
  const matchedTerms = [...layer1.matched];

  const combined = roundScore(
    thresholds.layer1_weight * layer1.layer_score + thresholds.layer2_weight * layer2.semantic_risk_score
  );

  // Rule 1: crisis keyword
  if (layer1.crisis_matches.length > 0) {
    return {
      risk_level: 'CRISIS',
      risk_score: 1.0,
      combined_score: combined,
      bypass_generation: true,
      matched_terms: matchedTerms,
      decision_source: 'keyword_crisis'
    };
  }

  // Rule 2: critical clinical marker
  const critical = layer2.markers.filter((marker) => marker.is_critical);
  if (critical.length > 0) {
    return {
      risk_level: 'CRISIS',
      risk_score: 1.0,
      combined_score: combined,
      bypass_generation: true,
      matched_terms: [...new Set([...matchedTerms, ...critical.map(markerEvidence)])].sort(),
      decision_source: 'critical_marker'
    };
  }

  // Rule 3: weighted score
  return {
    risk_level: combined >= thresholds.caution_threshold ? 'CAUTION' : 'SAFE',
    risk_score: combined,
    combined_score: combined,
    bypass_generation: false,
    matched_terms: matchedTerms,
    decision_source: 'combined_score'
  };
}
