/**
 * Wires the safety components into one instance with shared configuration.
 */

import { createPiiHasher, type PiiHasher } from '../lib/pii';
import { createLogger } from '../lib/logger';
import { AuditLedger } from './audit-ledger';
import { CrisisEscalationService, DEFAULT_ACK_TIMEOUT_MS } from './crisis-escalation-service';
import { DEFAULT_K_THRESHOLD } from './k-anonymity';
import { KeywordScanner } from './keyword-scanner';
import { loadPatternLibrary, type PatternLibrary } from './pattern-library';
import { SafetyPipeline } from './safety-pipeline';
import { SemanticAnalyzer } from './semantic-analyzer';
import { loadTermTable, type TermTable } from './term-tables';
import { DEFAULT_DECISION_THRESHOLDS, type DecisionThresholds } from '../types/risk';

const log = createLogger('SafetyCore');

export interface SafetyCoreOptions {
  termTable?: TermTable;
  patternLibrary?: PatternLibrary;
  termTablePath?: string;
  patternLibraryPath?: string;
  thresholds?: DecisionThresholds;
  ackTimeoutMs?: number;
  kAnonymityThreshold?: number;
  piiSalt?: string | null;
  clock?: () => Date;
}

export interface SafetyCore {
  ledger: AuditLedger;
  scanner: KeywordScanner;
  analyzer: SemanticAnalyzer;
  crisis: CrisisEscalationService;
  pipeline: SafetyPipeline;
  hashStudentRef: PiiHasher;
  thresholds: DecisionThresholds;
  kAnonymityThreshold: number;
  shutdown(): Promise<void>;
}

export function createSafetyCore(options: SafetyCoreOptions = {}): SafetyCore {
  const termTable = options.termTable ?? loadTermTable(options.termTablePath);
  const patternLibrary = options.patternLibrary ?? loadPatternLibrary(options.patternLibraryPath);
  const thresholds = options.thresholds ?? DEFAULT_DECISION_THRESHOLDS;
  const hashStudentRef = createPiiHasher(options.piiSalt ?? null);

  const ledger = new AuditLedger({ clock: options.clock });
  const scanner = new KeywordScanner(termTable);
  const analyzer = new SemanticAnalyzer(patternLibrary);
  const crisis = new CrisisEscalationService({
    ledger,
    hashStudentRef,
    ackTimeoutMs: options.ackTimeoutMs ?? DEFAULT_ACK_TIMEOUT_MS,
    clock: options.clock
  });
  const pipeline = new SafetyPipeline({
    scanner,
    analyzer,
    ledger,
    crisis,
    hashStudentRef,
    thresholds,
    clock: options.clock
  });

  log.info('Safety core ready', {
    term_table_version: termTable.version,
    pattern_library_version: patternLibrary.version,
    layer1_weight: thresholds.layer1_weight,
    layer2_weight: thresholds.layer2_weight,
    caution_threshold: thresholds.caution_threshold
  });

  return {
    ledger,
    scanner,
    analyzer,
    crisis,
    pipeline,
    hashStudentRef,
    thresholds,
    kAnonymityThreshold: options.kAnonymityThreshold ?? DEFAULT_K_THRESHOLD,
    shutdown: () => crisis.shutdown()
  };
}
