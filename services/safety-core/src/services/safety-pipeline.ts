/**
 * Safety Pipeline
 *
 * message → normalize → {Layer 1, Layer 2} → decide → audit → (CRISIS) escalate
 *
 * Fail-closed: a failure in normalization or either layer floors the result
 * at CAUTION and is listed in ScanResult.errors. A crisis signal from a layer
 * that did succeed still yields CRISIS.
 */

import { performance } from 'perf_hooks';
import { createLogger, errorMessage } from '../lib/logger';
import { hashTextForAudit, type PiiHasher } from '../lib/pii';
import { AuditLedger } from './audit-ledger';
import { CrisisEscalationService } from './crisis-escalation-service';
import { KeywordScanner } from './keyword-scanner';
import { SemanticAnalyzer } from './semantic-analyzer';
import { decide } from './risk-decision-engine';
import { normalizeText, safeNormalize, type Normalizer } from './text-normalizer';
import type { DetectionResult, TransitionResult } from '../types/crisis';
import {
  DEFAULT_DECISION_THRESHOLDS,
  RISK_LEVEL_RANK,
  type DecisionThresholds,
  type KeywordScanResult,
  type Message,
  type RiskDecision,
  type ScanError,
  type ScanResult,
  type SemanticAnalysis
} from '../types/risk';

const log = createLogger('SafetyPipeline');

export const PIPELINE_ACTOR = 'safety-pipeline';
const RECENT_SCAN_LIMIT = 10_000;

export interface SafetyPipelineOptions {
  scanner: KeywordScanner;
  analyzer: SemanticAnalyzer;
  ledger: AuditLedger;
  crisis: CrisisEscalationService;
  hashStudentRef: PiiHasher;
  thresholds?: DecisionThresholds;
  normalizer?: Normalizer;
  clock?: () => Date;
}

export interface PipelineOutcome {
  scan: ScanResult;
  crisis: DetectionResult | null;
  notification: TransitionResult | null;
}

interface RecentScan {
  text_hash: string;
  result: ScanResult;
}

export class SafetyPipeline {
  private readonly thresholds: DecisionThresholds;
  private readonly normalizer: Normalizer;
  private readonly clock: () => Date;
  private readonly recent = new Map<string, RecentScan>();

  constructor(private readonly options: SafetyPipelineOptions) {
    this.thresholds = options.thresholds ?? DEFAULT_DECISION_THRESHOLDS;
    this.normalizer = options.normalizer ?? normalizeText;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Classify one message. Produces the ScanResult once; a repeat of the same
   * message_id returns the stored result without re-auditing.
   */
  scan(message: Message): ScanResult {
    const textHash = hashTextForAudit(message.text);
    const previous = this.recent.get(message.message_id);
    if (previous) {
      if (previous.text_hash !== textHash) {
        log.warn('Message re-submitted with different text; keeping the original decision', {
          message_id: message.message_id
        });
      }
      return previous.result;
    }

    const started = performance.now();
    const errors: ScanError[] = [];

    const normalized = safeNormalize(message.text, this.normalizer);
    if (normalized.error) {
      errors.push({ stage: 'normalization', message: normalized.error });
    }

    const layer1 = this.runLayer1(normalized.text, normalized.merged_runs, errors);
    const layer2 = this.runLayer2(normalized.text, errors);
    const decision = this.applyFailClosed(decide(layer1, layer2, this.thresholds), errors);

    const result: ScanResult = Object.freeze({
      message_id: message.message_id,
      risk_level: decision.risk_level,
      risk_score: decision.risk_score,
      matched_terms: Object.freeze([...decision.matched_terms]),
      bypass_generation: decision.bypass_generation,
      decision_source: decision.decision_source,
      latency_ms: Math.round((performance.now() - started) * 1000) / 1000,
      term_table_version: this.options.scanner.termTableVersion,
      pattern_library_version: this.options.analyzer.patternLibraryVersion,
      scanned_at: this.clock().toISOString(),
      errors: Object.freeze(errors.map((error) => Object.freeze({ ...error })))
    });

    this.options.ledger.append({
      action: 'scan.decided',
      entity_type: 'message',
      entity_ref: message.message_id,
      actor_ref: PIPELINE_ACTOR,
      details: {
        risk_level: result.risk_level,
        risk_score: result.risk_score,
        combined_score: decision.combined_score,
        decision_source: result.decision_source,
        bypass_generation: result.bypass_generation,
        matched_terms: [...result.matched_terms],
        clinical_markers: layer2.markers.map((marker) => ({
          framework: marker.framework,
          item: marker.item,
          severity: marker.severity,
          matched_text: marker.matched_text,
          is_critical: marker.is_critical
        })),
        phq9_score: layer2.phq9_score,
        gad7_score: layer2.gad7_score,
        term_table_version: result.term_table_version,
        pattern_library_version: result.pattern_library_version,
        text_hash: textHash,
        student_ref_hash: this.options.hashStudentRef(message.student_ref),
        session_id: message.session_id,
        school_id: message.school_id ?? null,
        error_stages: errors.map((error) => error.stage)
      }
    });

    this.remember(message.message_id, { text_hash: textHash, result });

    log.info('Scan completed', {
      message_id: result.message_id,
      risk_level: result.risk_level,
      decision_source: result.decision_source,
      latency_ms: result.latency_ms
    });

    return result;
  }

  /**
   * Scan, then open (or extend) a crisis and start notification on CRISIS.
   */
  async process(message: Message): Promise<PipelineOutcome> {
    const scan = this.scan(message);
    if (scan.risk_level !== 'CRISIS') {
      return { scan, crisis: null, notification: null };
    }

    const crisis = await this.options.crisis.detect(scan, message);
    let notification: TransitionResult | null = null;
    if (crisis.ok && crisis.created) {
      notification = await this.options.crisis.notify(crisis.record.crisis_id);
    }

    return { scan, crisis, notification };
  }

  // ===========================================================================
  // Layers
  // ===========================================================================

  private runLayer1(text: string, mergedRuns: readonly string[], errors: ScanError[]): KeywordScanResult {
    try {
      return this.options.scanner.scan(text, mergedRuns);
    } catch (err: unknown) {
      const message = errorMessage(err);
      log.error('Keyword scan failed', { error: message });
      errors.push({ stage: 'keyword_scan', message });
      return {
        matched: [],
        crisis_matches: [],
        caution_matches: [],
        layer_score: 0,
        term_table_version: this.options.scanner.termTableVersion
      };
    }
  }

  private runLayer2(text: string, errors: ScanError[]): SemanticAnalysis {
    try {
      return this.options.analyzer.analyze(text);
    } catch (err: unknown) {
      const message = errorMessage(err);
      log.error('Semantic analysis failed', { error: message });
      errors.push({ stage: 'semantic_analysis', message });
      return {
        markers: [],
        phq9_score: 0,
        gad7_score: 0,
        risk_factors: [],
        protective_factors: [],
        semantic_risk_score: 0,
        confidence: 0,
        explanation: 'Semantic analysis unavailable',
        pattern_library_version: this.options.analyzer.patternLibraryVersion
      };
    }
  }

  private applyFailClosed(decision: RiskDecision, errors: ScanError[]): RiskDecision {
    if (errors.length === 0 || decision.risk_level === 'CRISIS') {
      return decision;
    }

    const floored = RISK_LEVEL_RANK[decision.risk_level] < RISK_LEVEL_RANK.CAUTION;
    return {
      ...decision,
      risk_level: 'CAUTION',
      risk_score: floored ? Math.max(decision.risk_score, this.thresholds.caution_threshold) : decision.risk_score,
      bypass_generation: false,
      decision_source: 'fail_closed'
    };
  }

  private remember(messageId: string, scan: RecentScan): void {
    this.recent.set(messageId, scan);
    if (this.recent.size > RECENT_SCAN_LIMIT) {
      const oldest = this.recent.keys().next();
      if (!oldest.done) {
        this.recent.delete(oldest.value);
      }
    }
  }
}
