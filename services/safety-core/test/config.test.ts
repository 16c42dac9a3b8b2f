/**
 * Tests for environment configuration
 */

import { loadConfig } from '../src/lib/config';
import { ConfigurationError } from '../src/lib/errors';

const SALT = 'test-salt-test-salt-test-salt-0000';

function configError(run: () => unknown): ConfigurationError {
  try {
    run();
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a ConfigurationError');
}

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 8080,
      nodeEnv: 'development',
      logLevel: 'info',
      supabase: null,
      piiSalt: null,
      termTablePath: undefined,
      patternLibraryPath: undefined,
      thresholds: { layer1_weight: 0.6, layer2_weight: 0.4, caution_threshold: 0.3 },
      ackTimeoutMs: 300000,
      kAnonymityThreshold: 5
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '3000',
      LOG_LEVEL: 'silent',
      PII_SALT: SALT,
      DECISION_LAYER1_WEIGHT: '0.7',
      DECISION_LAYER2_WEIGHT: '0.3',
      CAUTION_THRESHOLD: '0.25',
      ACK_TIMEOUT_MS: '60000',
      K_ANONYMITY_THRESHOLD: '10',
      TERM_TABLE_PATH: '/etc/safety/terms.yaml'
    });

    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe('silent');
    expect(config.piiSalt).toBe(SALT);
    expect(config.thresholds).toEqual({ layer1_weight: 0.7, layer2_weight: 0.3, caution_threshold: 0.25 });
    expect(config.ackTimeoutMs).toBe(60000);
    expect(config.kAnonymityThreshold).toBe(10);
    expect(config.termTablePath).toBe('/etc/safety/terms.yaml');
  });

  it('should build Supabase settings, preferring SUPABASE_SERVICE_ROLE_KEY', () => {
    expect(
      loadConfig({ SUPABASE_URL: 'https://example.supabase.co', SUPABASE_SERVICE_ROLE: 'test-secret' }).supabase
    ).toEqual({ url: 'https://example.supabase.co', serviceRoleKey: 'test-secret' });

    expect(
      loadConfig({
        SUPABASE_URL: 'https://example.supabase.co',
        SUPABASE_SERVICE_ROLE: 'test-secret',
        SUPABASE_SERVICE_ROLE_KEY: 'test-secret-key'
      }).supabase?.serviceRoleKey
    ).toBe('test-secret-key');
  });

  it('should leave Supabase unset without a key', () => {
    expect(loadConfig({ SUPABASE_URL: 'https://example.supabase.co' }).supabase).toBeNull();
  });

  it('should reject a short PII salt', () => {
    const error = configError(() => loadConfig({ PII_SALT: 'short' }));
    expect(error.issues).toEqual(['PII_SALT: PII_SALT must be at least 32 characters']);
  });

  it('should require a PII salt in production', () => {
    const error = configError(() => loadConfig({ NODE_ENV: 'production' }));
    expect(error.issues).toEqual(['PII_SALT: PII_SALT is required in production']);
  });

  it('should reject a non-numeric port', () => {
    const error = configError(() => loadConfig({ PORT: 'abc' }));
    expect(error.message.startsWith('Invalid environment configuration: PORT:')).toBe(true);
  });

  it('should reject a zero caution threshold', () => {
    const error = configError(() => loadConfig({ CAUTION_THRESHOLD: '0' }));
    expect(error.message.startsWith('Invalid decision thresholds: caution_threshold:')).toBe(true);
  });

  it('should reject weights that are both zero', () => {
    const error = configError(() => loadConfig({ DECISION_LAYER1_WEIGHT: '0', DECISION_LAYER2_WEIGHT: '0' }));
    expect(error.issues).toEqual(['At least one layer weight must be positive']);
  });
});
