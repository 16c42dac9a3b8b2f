/**
 * Tests for the Risk Decision Engine
 */

import { decide } from '../src/services/risk-decision-engine';
import type { ClinicalMarker, KeywordScanResult, SemanticAnalysis } from '../src/types/risk';

const layer1 = (score: number, crisis: string[] = [], caution: string[] = []): KeywordScanResult => ({
  matched: [...crisis, ...caution].sort(),
  crisis_matches: crisis,
  caution_matches: caution,
  layer_score: score,
  term_table_version: 'test'
});

const criticalMarker: ClinicalMarker = {
  framework: 'PHQ9',
  item: 9,
  item_name: 'suicidal_ideation',
  severity: 3,
  matched_text: 'wish i was dead',
  is_critical: true
};

const layer2 = (score: number, markers: ClinicalMarker[] = []): SemanticAnalysis => ({
  markers,
  phq9_score: 0,
  gad7_score: 0,
  risk_factors: [],
  protective_factors: [],
  semantic_risk_score: score,
  confidence: 0.5,
  explanation: '',
  pattern_library_version: 'test'
});

describe('Risk Decision Engine', () => {
  it('should classify any crisis term as CRISIS and bypass generation', () => {
    const decision = decide(layer1(1, ['kill myself']), layer2(0));

    expect(decision).toEqual({
      risk_level: 'CRISIS',
      risk_score: 1,
      combined_score: 0.6,
      bypass_generation: true,
      matched_terms: ['kill myself'],
      decision_source: 'keyword_crisis'
    });
  });

  it('should classify a critical marker as CRISIS without any keyword', () => {
    const decision = decide(layer1(0), layer2(1, [criticalMarker]));

    expect(decision.risk_level).toBe('CRISIS');
    expect(decision.decision_source).toBe('critical_marker');
    expect(decision.bypass_generation).toBe(true);
    expect(decision.risk_score).toBe(1);
    expect(decision.matched_terms).toEqual(['PHQ9#9:wish i was dead']);
  });

  it('should merge critical-marker evidence into the sorted matched terms', () => {
    const decision = decide(layer1(0.35, [], ['alone']), layer2(1, [criticalMarker]));
    expect(decision.matched_terms).toEqual(['PHQ9#9:wish i was dead', 'alone']);
  });

  it('should prefer the keyword source when both layers signal crisis', () => {
    expect(decide(layer1(1, ['suicide']), layer2(1, [criticalMarker])).decision_source).toBe('keyword_crisis');
  });

  it('should weight the layers into a combined score', () => {
    const decision = decide(layer1(0.5, [], ['hopeless']), layer2(0.22));

    expect(decision.risk_level).toBe('CAUTION');
    expect(decision.risk_score).toBe(0.388);
    expect(decision.decision_source).toBe('combined_score');
    expect(decision.bypass_generation).toBe(false);
  });

  it('should classify a score exactly at the threshold as CAUTION', () => {
    expect(decide(layer1(0.5), layer2(0)).risk_level).toBe('CAUTION');
  });

  it('should classify nothing matched as SAFE with score 0', () => {
    const decision = decide(layer1(0), layer2(0));
    expect(decision.risk_level).toBe('SAFE');
    expect(decision.risk_score).toBe(0);
    expect(decision.matched_terms).toEqual([]);
  });

  it('should honour configured thresholds', () => {
    const thresholds = { layer1_weight: 1, layer2_weight: 0, caution_threshold: 0.5 };
    expect(decide(layer1(0.45), layer2(0.9), thresholds).risk_level).toBe('SAFE');
    expect(decide(layer1(0.5), layer2(0), thresholds).risk_level).toBe('CAUTION');
  });

  it('should copy matched terms rather than share the layer array', () => {
    const scan = layer1(0.35, [], ['alone']);
    const decision = decide(scan, layer2(0));
    expect(decision.matched_terms).toEqual(['alone']);
    expect(decision.matched_terms).not.toBe(scan.matched);
  });
});
