/**
 * Audit ledger routes (compliance tooling).
 *
 * Endpoints:
 * - GET /api/v1/audit/entries  - Filtered entries in sequence order
 * - GET /api/v1/audit/verify   - Re-verify the whole hash chain
 *
 * An export takes `?actor=` (and `justification=`) and is itself recorded as a
 * `data.exported` entry after the page is read.
 */

import { Router, Request, Response } from 'express';
import { recordDataAccess } from '../services/data-access-log';
import { AccessContextSchema, AuditQuerySchema } from '../types/audit';
import type { SafetyCore } from '../services/safety-core';

const DEFAULT_PAGE_SIZE = 100;

export function createAuditRouter(core: SafetyCore): Router {
  const router = Router();

  router.get('/entries', (req: Request, res: Response) => {
    const parseResult = AuditQuerySchema.safeParse(req.query);
    const access = AccessContextSchema.safeParse(req.query);
    if (!parseResult.success || !access.success) {
      return res.status(400).json({
        ok: false,
        error: 'Invalid query parameters',
        details: [...(parseResult.error?.errors ?? []), ...(access.error?.errors ?? [])]
      });
    }

    const filters = { ...parseResult.data, limit: parseResult.data.limit ?? DEFAULT_PAGE_SIZE };
    const entries = [...core.ledger.query(filters)];
    const first = entries[0];
    const last = entries[entries.length - 1];

    recordDataAccess(core.ledger, access.data, {
      action: 'data.exported',
      resource: 'audit_entries',
      entity_type: 'report',
      entity_ref: 'audit_entries',
      details: {
        count: entries.length,
        first_sequence: first ? first.sequence : null,
        last_sequence: last ? last.sequence : null
      }
    });

    return res.json({
      ok: true,
      entries,
      count: entries.length,
      next_sequence: last && entries.length === filters.limit ? last.sequence + 1 : null
    });
  });

  router.get('/verify', (_req: Request, res: Response) => {
    const inspection = core.ledger.verify();
    return res.json({
      ok: true,
      valid: inspection.valid,
      checked: inspection.checked,
      failed_at_sequence: inspection.failed_at_sequence ?? null,
      reason: inspection.reason ?? null,
      head: core.ledger.head(),
      size: core.ledger.size()
    });
  });

  return router;
}
