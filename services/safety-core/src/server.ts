/**
 * Safety core service entrypoint.
 *
 * Loads `.env`, validates configuration, builds the core, attaches the
 * Supabase sinks when configured, and serves the HTTP surface.
 */

import { config as dotenvConfig } from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './lib/config';
import { createLogger, errorMessage, setLogLevel } from './lib/logger';
import { getSupabase } from './lib/supabase';
import { createSafetyCore } from './services/safety-core';
import { SupabaseAuditSink, SupabaseCrisisNotifier } from './services/supabase-sinks';

dotenvConfig();

const log = createLogger('SafetyCore');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  log.info('Starting safety core', {
    port: config.port,
    node_env: config.nodeEnv,
    supabase: config.supabase ? 'configured' : 'not configured',
    ack_timeout_ms: config.ackTimeoutMs,
    k_anonymity_threshold: config.kAnonymityThreshold
  });

  const core = createSafetyCore({
    termTablePath: config.termTablePath,
    patternLibraryPath: config.patternLibraryPath,
    thresholds: config.thresholds,
    ackTimeoutMs: config.ackTimeoutMs,
    kAnonymityThreshold: config.kAnonymityThreshold,
    piiSalt: config.piiSalt
  });

  const sinks: Array<{ flush(): Promise<void> }> = [];
  const supabase = getSupabase(config.supabase);
  if (supabase) {
    const auditSink = new SupabaseAuditSink(supabase);
    auditSink.attach(core.ledger);
    const notifier = new SupabaseCrisisNotifier(supabase);
    notifier.attach(core.crisis);
    sinks.push(auditSink, notifier);
  }

  const app = createApp(core);
  const server = app.listen(config.port, () => {
    log.info(`Listening on port ${config.port}`);
  });

  const shutdown = async (signal: string): Promise<void> => {
    log.info(`Received ${signal}, shutting down...`);

    await core.shutdown();
    await Promise.all(sinks.map((sink) => sink.flush()));

    server.close(() => {
      log.info('Server closed');
      process.exit(0);
    });

    // Force exit after 30 seconds
    setTimeout(() => {
      log.error('Forced exit after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      log.error('Shutdown failed', { error: errorMessage(error) });
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((error: unknown) => {
  log.error('Fatal error', { error: errorMessage(error) });
  process.exit(1);
});
