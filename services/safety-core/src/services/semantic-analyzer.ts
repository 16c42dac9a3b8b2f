/**
 * Semantic Analyzer (Layer 2)
 *
 * Maps normalized text onto PHQ-9 and GAD-7 items using the clinical pattern
 * library, then derives estimated scale scores, a semantic risk score, a
 * confidence and a readable explanation. Every step is rule-based, so the
 * same text and library version always give the same analysis.
 */

import { roundScore } from '../lib/scores';
import type { PatternLibrary } from './pattern-library';
import type { ClinicalFramework, ClinicalMarker, MarkerSeverity, SemanticAnalysis } from '../types/risk';

export const PHQ9_MAX_SCORE = 27;
export const GAD7_MAX_SCORE = 21;

/** Confidence reported when nothing matched: low, not zero risk. */
export const NO_EVIDENCE_CONFIDENCE = 0.25;

interface CompiledItem {
  framework: ClinicalFramework;
  item: number;
  name: string;
  critical: boolean;
  patterns: Array<{ regex: RegExp; severity: MarkerSeverity }>;
}

interface CompiledFactor {
  name: string;
  patterns: RegExp[];
}

// =============================================================================
// Severity Labels
// =============================================================================

export function phq9SeverityLabel(score: number): string {
  if (score >= 20) return 'severe';
  if (score >= 15) return 'moderately severe';
  if (score >= 10) return 'moderate';
  if (score >= 5) return 'mild';
  return 'minimal';
}

export function gad7SeverityLabel(score: number): string {
  if (score >= 15) return 'severe';
  if (score >= 10) return 'moderate';
  if (score >= 5) return 'mild';
  return 'minimal';
}

// =============================================================================
// Analyzer
// =============================================================================

export class SemanticAnalyzer {
  private readonly items: CompiledItem[] = [];
  private readonly factors: CompiledFactor[];

  constructor(private readonly library: PatternLibrary) {
    const frameworks: ClinicalFramework[] = ['PHQ9', 'GAD7'];
    for (const framework of frameworks) {
      const sorted = [...library.frameworks[framework].items].sort((a, b) => a.item - b.item);
      for (const entry of sorted) {
        this.items.push({
          framework,
          item: entry.item,
          name: entry.name,
          critical: entry.critical,
          patterns: entry.patterns.map((p) => ({ regex: new RegExp(p.pattern), severity: p.severity }))
        });
      }
    }

    this.factors = library.protective_factors.map((factor) => ({
      name: factor.name,
      patterns: factor.patterns.map((pattern) => new RegExp(pattern))
    }));
  }

  get patternLibraryVersion(): string {
    return this.library.version;
  }

  analyze(normalizedText: string): SemanticAnalysis {
    const markers = this.detectMarkers(normalizedText);
    const protectiveFactors = this.factors
      .filter((factor) => factor.patterns.some((regex) => regex.test(normalizedText)))
      .map((factor) => factor.name);

    const phq9Score = Math.min(PHQ9_MAX_SCORE, sumSeverity(markers, 'PHQ9'));
    const gad7Score = Math.min(GAD7_MAX_SCORE, sumSeverity(markers, 'GAD7'));

    const analysis: SemanticAnalysis = {
      markers,
      phq9_score: phq9Score,
      gad7_score: gad7Score,
      risk_factors: buildRiskFactors(markers),
      protective_factors: protectiveFactors,
      semantic_risk_score: semanticRisk(markers, phq9Score, gad7Score, protectiveFactors.length),
      confidence: confidence(markers),
      explanation: '',
      pattern_library_version: this.library.version
    };
    analysis.explanation = explain(analysis);
    return analysis;
  }

  /**
   * One marker per matched item, carrying the highest matching severity.
   */
  private detectMarkers(text: string): ClinicalMarker[] {
    const markers: ClinicalMarker[] = [];

    for (const item of this.items) {
      let best: { severity: MarkerSeverity; matched: string } | null = null;
      for (const { regex, severity } of item.patterns) {
        const match = regex.exec(text);
        if (match && (best === null || severity > best.severity)) {
          best = { severity, matched: match[0] };
        }
      }

      if (best) {
        markers.push({
          framework: item.framework,
          item: item.item,
          item_name: item.name,
          severity: best.severity,
          matched_text: best.matched,
          is_critical: item.critical
        });
      }
    }

    return markers;
  }
}

// =============================================================================
// Scoring
// =============================================================================

function sumSeverity(markers: ClinicalMarker[], framework: ClinicalFramework): number {
  return markers.filter((m) => m.framework === framework).reduce((total, m) => total + m.severity, 0);
}

/**
 * Banded on PHQ-9 thresholds (minimal / mild / moderate / moderately severe /
 * severe), raised for GAD-7 comorbidity, lowered slightly per protective
 * factor. Critical markers override to 1.0; no markers means no evidence.
 */
function semanticRisk(markers: ClinicalMarker[], phq9: number, gad7: number, protectiveCount: number): number {
  if (markers.some((m) => m.is_critical)) {
    return 1.0;
  }
  if (markers.length === 0) {
    return 0;
  }

  let score: number;
  if (phq9 >= 20) {
    score = 0.9 + Math.min(0.1, (phq9 - 20) * 0.01);
  } else if (phq9 >= 15) {
    score = 0.7 + (phq9 - 15) * 0.04;
  } else if (phq9 >= 10) {
    score = 0.5 + (phq9 - 10) * 0.04;
  } else if (phq9 >= 5) {
    score = 0.3 + (phq9 - 5) * 0.04;
  } else {
    score = 0.1 + phq9 * 0.04;
  }

  if (gad7 >= 10) {
    score += 0.1;
  } else if (gad7 >= 5) {
    score += 0.05;
  }

  score = Math.max(0.1, score - protectiveCount * 0.02);
  return roundScore(Math.min(1.0, score));
}

function confidence(markers: ClinicalMarker[]): number {
  if (markers.length === 0) {
    return NO_EVIDENCE_CONFIDENCE;
  }

  const frameworks = new Set(markers.map((m) => m.framework));
  let value = 0.4 + 0.15 * markers.length;
  if (frameworks.size > 1) value += 0.1;
  if (markers.some((m) => m.severity === 3)) value += 0.1;
  return roundScore(Math.min(1, value));
}

function buildRiskFactors(markers: ClinicalMarker[]): string[] {
  const factors: string[] = [];

  if (markers.some((m) => m.is_critical)) {
    factors.push('suicidal_ideation_detected');
  }

  const phq9Count = markers.filter((m) => m.framework === 'PHQ9').length;
  if (phq9Count >= 5) {
    factors.push('multiple_depression_symptoms');
  } else if (phq9Count >= 3) {
    factors.push('several_depression_symptoms');
  }

  if (markers.filter((m) => m.framework === 'GAD7').length >= 4) {
    factors.push('significant_anxiety_symptoms');
  }

  if (markers.some((m) => m.framework === 'PHQ9' && m.item === 2)) {
    factors.push('hopelessness_present');
  }
  if (markers.some((m) => m.framework === 'PHQ9' && m.item === 6)) {
    factors.push('worthlessness_present');
  }

  return factors;
}

function explain(analysis: SemanticAnalysis): string {
  const parts: string[] = [];

  if (analysis.markers.some((m) => m.is_critical)) {
    parts.push('CRITICAL: suicidal ideation indicators detected');
  }
  if (analysis.phq9_score > 0) {
    parts.push(`Depression indicators: ${phq9SeverityLabel(analysis.phq9_score)} (estimated PHQ-9: ${analysis.phq9_score})`);
  }
  if (analysis.gad7_score > 0) {
    parts.push(`Anxiety indicators: ${gad7SeverityLabel(analysis.gad7_score)} (estimated GAD-7: ${analysis.gad7_score})`);
  }
  if (analysis.markers.length > 0) {
    parts.push(`Detected: ${analysis.markers.map((m) => `${m.framework}#${m.item} ${m.item_name}`).join(', ')}`);
  }
  if (analysis.protective_factors.length > 0) {
    parts.push(`Protective factors: ${analysis.protective_factors.join(', ')}`);
  }

  return parts.length > 0 ? parts.join(' | ') : 'No significant clinical indicators detected';
}
