/**
 * Express application for the safety core. No listening here; server.ts
 * binds the port and tests drive the app through supertest.
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { createLogger, errorMessage } from './lib/logger';
import { createAnalyticsRouter } from './routes/analytics';
import { createAuditRouter } from './routes/audit';
import { createCrisisRouter } from './routes/crisis';
import { createHealthRouter } from './routes/health';
import { createSafetyRouter } from './routes/safety';
import type { SafetyCore } from './services/safety-core';

const log = createLogger('App');

export function createApp(core: SafetyCore): express.Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '256kb' }));

  app.use(createHealthRouter(core));
  app.use('/api/v1/safety', createSafetyRouter(core));
  app.use('/api/v1/crisis', createCrisisRouter(core));
  app.use('/api/v1/audit', createAuditRouter(core));
  app.use('/api/v1/analytics', createAnalyticsRouter(core));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ ok: false, error: 'Not found', path: req.path });
  });

  // Malformed JSON bodies surface here from express.json()
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ ok: false, error: 'Malformed JSON body' });
      return;
    }
    log.error('Unhandled request error', { error: errorMessage(err) });
    res.status(500).json({ ok: false, error: 'Internal error' });
  });

  return app;
}
