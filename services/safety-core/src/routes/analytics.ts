/**
 * Aggregate reporting over recorded scan decisions.
 *
 * Endpoints:
 * - POST /api/v1/analytics/aggregate  - Grouped statistics with k-anonymity suppression
 *
 * Groups smaller than k distinct students come back suppressed with data null.
 * The body names the `actor` (and `justification`); each answered request is
 * recorded in the audit ledger.
 */

import { Router, Request, Response } from 'express';
import { AggregationError } from '../lib/errors';
import { createLogger, errorMessage } from '../lib/logger';
import { recordDataAccess } from '../services/data-access-log';
import { aggregateScanDecisions } from '../services/scan-analytics';
import { AggregateRequestSchema } from '../types/analytics';
import { AccessContextSchema } from '../types/audit';
import type { SafetyCore } from '../services/safety-core';

const log = createLogger('AnalyticsRoutes');

export function createAnalyticsRouter(core: SafetyCore): Router {
  const router = Router();

  router.post('/aggregate', (req: Request, res: Response) => {
    const parseResult = AggregateRequestSchema.safeParse(req.body);
    const access = AccessContextSchema.safeParse(req.body);
    if (!parseResult.success || !access.success) {
      return res.status(400).json({
        ok: false,
        error: 'Invalid request body',
        details: [...(parseResult.error?.errors ?? []), ...(access.error?.errors ?? [])]
      });
    }

    try {
      const request = parseResult.data;
      const groups = aggregateScanDecisions(core.ledger, request, core.kAnonymityThreshold);
      const k = Math.max(request.k ?? core.kAnonymityThreshold, core.kAnonymityThreshold);

      recordDataAccess(core.ledger, access.data, {
        action: 'data.viewed',
        resource: 'scan_aggregates',
        entity_type: 'report',
        entity_ref: 'scan_aggregates',
        details: {
          group_by: request.group_by,
          agg: request.agg,
          field: request.field ?? null,
          k,
          groups: groups.length
        }
      });
      return res.json({ ok: true, groups, k });
    } catch (err: unknown) {
      if (err instanceof AggregationError) {
        return res.status(400).json({ ok: false, error: err.code, message: err.message });
      }
      log.error('Error in /aggregate', { error: errorMessage(err) });
      return res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  return router;
}
