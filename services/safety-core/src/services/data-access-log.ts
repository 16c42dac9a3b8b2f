/**
 * Data Access Log
 *
 * Reads of crisis records, ledger exports and clinical aggregates leave an
 * entry in the audit ledger naming the accessor and their justification.
 */

import { createLogger } from '../lib/logger';
import type { AuditLedger } from './audit-ledger';
import type { AccessContext, AuditDetails, AuditEntityType, AuditEntry } from '../types/audit';

const log = createLogger('DataAccess');

export type DataResource = 'crisis_record' | 'active_crises' | 'audit_entries' | 'scan_aggregates';

export interface DataAccess {
  action: 'data.viewed' | 'data.exported';
  resource: DataResource;
  entity_type: AuditEntityType;
  entity_ref: string;
  details?: AuditDetails;
}

export function recordDataAccess(ledger: AuditLedger, context: AccessContext, access: DataAccess): AuditEntry {
  const entry = ledger.append({
    action: access.action,
    entity_type: access.entity_type,
    entity_ref: access.entity_ref,
    actor_ref: context.actor,
    details: {
      ...access.details,
      resource: access.resource,
      justification: context.justification ?? null
    }
  });

  log.info('Data access recorded', {
    action: access.action,
    resource: access.resource,
    actor: context.actor,
    sequence: entry.sequence
  });
  return entry;
}
