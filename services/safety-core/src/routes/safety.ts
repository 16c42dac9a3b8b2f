/**
 * Message scanning routes.
 *
 * Endpoints:
 * - POST /api/v1/safety/scan  - Classify a message before any response is generated
 *
 * A CRISIS result always carries bypass_generation = true and opens (or
 * extends) a crisis for the session.
 */

import { Router, Request, Response } from 'express';
import { createLogger, errorMessage } from '../lib/logger';
import { MessageSchema } from '../types/risk';
import type { SafetyCore } from '../services/safety-core';

const log = createLogger('SafetyRoutes');

export function createSafetyRouter(core: SafetyCore): Router {
  const router = Router();

  router.post('/scan', async (req: Request, res: Response) => {
    const parseResult = MessageSchema.safeParse(req.body);
    if (!parseResult.success) {
      return res.status(400).json({
        ok: false,
        error: 'Invalid request body',
        details: parseResult.error.errors
      });
    }

    try {
      const outcome = await core.pipeline.process(parseResult.data);
      const crisisId = outcome.crisis && outcome.crisis.ok ? outcome.crisis.record.crisis_id : null;
      return res.json({
        ok: true,
        scan: outcome.scan,
        crisis: crisisId ? core.crisis.get(crisisId) ?? null : null
      });
    } catch (err: unknown) {
      log.error('Error in /scan', { message_id: parseResult.data.message_id, error: errorMessage(err) });
      return res.status(500).json({ ok: false, error: errorMessage(err) });
    }
  });

  return router;
}
