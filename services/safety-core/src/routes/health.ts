/**
 * Health endpoints.
 *
 * - GET /alive   - Liveness probe
 * - GET /health  - Component status and configuration versions
 */

import { Router, Request, Response } from 'express';
import type { SafetyCore } from '../services/safety-core';

export const SERVICE_NAME = 'safety-core';

export function createHealthRouter(core: SafetyCore): Router {
  const router = Router();

  router.get('/alive', (_req: Request, res: Response) => {
    res.json({ status: 'ok', service: SERVICE_NAME, timestamp: new Date().toISOString() });
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      ok: true,
      status: 'healthy',
      service: SERVICE_NAME,
      term_table_version: core.scanner.termTableVersion,
      pattern_library_version: core.analyzer.patternLibraryVersion,
      ledger_size: core.ledger.size(),
      active_crises: core.crisis.listActive().length,
      pending_escalation_timers: core.crisis.pendingTimers,
      timestamp: new Date().toISOString()
    });
  });

  return router;
}
