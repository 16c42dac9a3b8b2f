/**
 * Scan Analytics
 *
 * Reads `scan.decided` entries back out of the ledger and aggregates them
 * with k-anonymity, counting distinct students as group members.
 */

import { aggregate } from './k-anonymity';
import type { AuditLedger } from './audit-ledger';
import type { AuditDetailValue, AuditEntry } from '../types/audit';
import type { AggregateGroup, AggregateRequest, ScanDecisionRecord } from '../types/analytics';
import { RiskLevel } from '../types/risk';

function asString(value: AuditDetailValue | undefined): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function asNumber(value: AuditDetailValue | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

export function toScanDecisionRecord(entry: AuditEntry): ScanDecisionRecord | null {
  if (entry.action !== 'scan.decided') {
    return null;
  }

  const details = entry.details;
  const riskLevel = RiskLevel.safeParse(details.risk_level);
  const sessionId = asString(details.session_id);
  const studentRefHash = asString(details.student_ref_hash);
  if (!riskLevel.success || !sessionId || !studentRefHash) {
    return null;
  }

  return {
    message_id: entry.entity_ref,
    school_id: asString(details.school_id),
    session_id: sessionId,
    student_ref_hash: studentRefHash,
    risk_level: riskLevel.data,
    risk_score: asNumber(details.risk_score),
    combined_score: asNumber(details.combined_score),
    phq9_score: asNumber(details.phq9_score),
    gad7_score: asNumber(details.gad7_score),
    crisis: riskLevel.data === 'CRISIS' ? 1 : 0,
    scanned_at: entry.timestamp
  };
}

export function collectScanRecords(
  ledger: AuditLedger,
  window: { since?: string; until?: string } = {}
): ScanDecisionRecord[] {
  const records: ScanDecisionRecord[] = [];
  for (const entry of ledger.query({ action: 'scan.decided', since: window.since, until: window.until })) {
    const record = toScanDecisionRecord(entry);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

/**
 * Aggregate recorded decisions. The requested k can raise the configured
 * minimum but never lower it.
 */
export function aggregateScanDecisions(
  ledger: AuditLedger,
  request: AggregateRequest,
  minimumK: number
): AggregateGroup[] {
  const records = collectScanRecords(ledger, { since: request.since, until: request.until });
  const results = aggregate(records, {
    group_by: request.group_by,
    field: request.field,
    agg: request.agg,
    k: Math.max(request.k ?? minimumK, minimumK),
    member_key: 'student_ref_hash'
  });

  return [...results.entries()].map(([group, result]) => ({ group, ...result }));
}
