/**
 * Crisis escalation routes.
 *
 * Endpoints:
 * - GET  /api/v1/crisis                  - Open crises, oldest first (?school_id=)
 * - GET  /api/v1/crisis/:id              - One crisis record
 * - POST /api/v1/crisis/:id/acknowledge  - NOTIFYING | ESCALATED → ACKNOWLEDGED
 * - POST /api/v1/crisis/:id/progress     - ACKNOWLEDGED → IN_PROGRESS
 * - POST /api/v1/crisis/:id/resolve      - ACKNOWLEDGED | IN_PROGRESS → RESOLVED
 *
 * A rejected transition answers 409 (404 for an unknown crisis) and leaves the
 * record unchanged. The GET routes take `?actor=` (and `justification=`) and
 * record the read in the audit ledger.
 */

import { Router, Request, Response } from 'express';
import { createLogger, errorMessage } from '../lib/logger';
import { recordDataAccess } from '../services/data-access-log';
import { AccessContextSchema } from '../types/audit';
import {
  AcknowledgeRequestSchema,
  BeginProgressRequestSchema,
  ListActiveRequestSchema,
  ResolveRequestSchema,
  type TransitionResult
} from '../types/crisis';
import type { SafetyCore } from '../services/safety-core';

const log = createLogger('CrisisRoutes');

function sendTransition(res: Response, result: TransitionResult): Response {
  if (!result.ok) {
    return res.status(result.code === 'NOT_FOUND' ? 404 : 409).json({
      ok: false,
      error: result.code,
      message: result.message,
      crisis_id: result.crisis_id,
      from_state: result.from_state
    });
  }
  return res.json({ ok: true, crisis: result.record, audit_entry_id: result.audit_entry_id });
}

function sendFailure(res: Response, route: string, err: unknown): Response {
  log.error(`Error in ${route}`, { error: errorMessage(err) });
  return res.status(500).json({ ok: false, error: errorMessage(err) });
}

export function createCrisisRouter(core: SafetyCore): Router {
  const router = Router();

  router.get('/', (req: Request, res: Response) => {
    const parseResult = ListActiveRequestSchema.safeParse(req.query);
    const access = AccessContextSchema.safeParse(req.query);
    if (!parseResult.success || !access.success) {
      return res.status(400).json({
        ok: false,
        error: 'Invalid query parameters',
        details: [...(parseResult.error?.errors ?? []), ...(access.error?.errors ?? [])]
      });
    }

    const crises = core.crisis.listActive(parseResult.data);
    recordDataAccess(core.ledger, access.data, {
      action: 'data.viewed',
      resource: 'active_crises',
      entity_type: 'report',
      entity_ref: 'active_crises',
      details: { school_id: parseResult.data.school_id ?? null, count: crises.length }
    });
    return res.json({ ok: true, crises, count: crises.length });
  });

  router.get('/:id', (req: Request, res: Response) => {
    const access = AccessContextSchema.safeParse(req.query);
    if (!access.success) {
      return res.status(400).json({
        ok: false,
        error: 'Invalid query parameters',
        details: access.error.errors
      });
    }

    const record = core.crisis.get(req.params.id);
    if (!record) {
      return res.status(404).json({ ok: false, error: 'NOT_FOUND', crisis_id: req.params.id });
    }

    recordDataAccess(core.ledger, access.data, {
      action: 'data.viewed',
      resource: 'crisis_record',
      entity_type: 'crisis_event',
      entity_ref: record.crisis_id,
      details: { state: record.state, version: record.version }
    });
    return res.json({ ok: true, crisis: record });
  });

  router.post('/:id/acknowledge', async (req: Request, res: Response) => {
    const parseResult = AcknowledgeRequestSchema.safeParse(req.body);
    if (!parseResult.success) {
      return res.status(400).json({
        ok: false,
        error: 'Invalid request body',
        details: parseResult.error.errors
      });
    }

    try {
      const { actor, expected_version } = parseResult.data;
      const result = await core.crisis.acknowledge(req.params.id, actor, { expectedVersion: expected_version });
      return sendTransition(res, result);
    } catch (err: unknown) {
      return sendFailure(res, '/acknowledge', err);
    }
  });

  router.post('/:id/progress', async (req: Request, res: Response) => {
    const parseResult = BeginProgressRequestSchema.safeParse(req.body);
    if (!parseResult.success) {
      return res.status(400).json({
        ok: false,
        error: 'Invalid request body',
        details: parseResult.error.errors
      });
    }

    try {
      const { actor, expected_version } = parseResult.data;
      const result = await core.crisis.beginProgress(req.params.id, actor, { expectedVersion: expected_version });
      return sendTransition(res, result);
    } catch (err: unknown) {
      return sendFailure(res, '/progress', err);
    }
  });

  router.post('/:id/resolve', async (req: Request, res: Response) => {
    const parseResult = ResolveRequestSchema.safeParse(req.body);
    if (!parseResult.success) {
      return res.status(400).json({
        ok: false,
        error: 'Invalid request body',
        details: parseResult.error.errors
      });
    }

    try {
      const { actor, notes, expected_version } = parseResult.data;
      const result = await core.crisis.resolve(req.params.id, actor, notes, { expectedVersion: expected_version });
      return sendTransition(res, result);
    } catch (err: unknown) {
      return sendFailure(res, '/resolve', err);
    }
  });

  return router;
}
