// Library entry point for embedding the safety core in another service.

export { createApp } from './app';
export { loadConfig, type SafetyCoreConfig } from './lib/config';
export {
  SafetyCoreError,
  ConfigurationError,
  AuditSequenceError,
  AggregationError,
  VersionConflictError
} from './lib/errors';
export { createLogger, setLogLevel, type Logger, type LogLevel } from './lib/logger';
export { hashPii, hashTextForAudit, createPiiHasher } from './lib/pii';
export { KeyedSerialQueue } from './lib/keyed-queue';

export {
  normalize,
  normalizeText,
  safeNormalize,
  type NormalizedText,
  type Normalizer
} from './services/text-normalizer';
export { loadTermTable, parseTermTable, buildTermTable, tokenize, type TermTable } from './services/term-tables';
export { KeywordScanner, DEFAULT_CAUTION_SCORING } from './services/keyword-scanner';
export { loadPatternLibrary, parsePatternLibrary, buildPatternLibrary, type PatternLibrary } from './services/pattern-library';
export { SemanticAnalyzer } from './services/semantic-analyzer';
export { decide } from './services/risk-decision-engine';
export { crisisMachine, evaluateTransition, canTransition } from './services/crisis-state-machine';
export { CrisisEscalationService } from './services/crisis-escalation-service';
export { InMemoryCrisisRecordStore, type CrisisRecordStore } from './services/crisis-record-store';
export { AuditLedger, verifyChain, inspectChain, computeEntryHash } from './services/audit-ledger';
export { aggregate, enforceKAnonymity, type AggregateResult } from './services/k-anonymity';
export { aggregateScanDecisions, collectScanRecords } from './services/scan-analytics';
export { SafetyPipeline, type PipelineOutcome } from './services/safety-pipeline';
export { createSafetyCore, type SafetyCore, type SafetyCoreOptions } from './services/safety-core';
export { SupabaseAuditSink, SupabaseCrisisNotifier } from './services/supabase-sinks';

export * from './types/risk';
export * from './types/crisis';
export * from './types/audit';
export * from './types/analytics';
