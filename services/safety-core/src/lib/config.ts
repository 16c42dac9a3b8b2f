/**
 * Environment configuration for the safety core.
 *
 * server.ts loads `.env` through dotenv before calling loadConfig(); tests pass
 * a plain object instead of process.env.
 */

import { z } from 'zod';
import { ConfigurationError, formatIssues } from './errors';
import { parseLogLevel, type LogLevel } from './logger';
import { DecisionThresholdsSchema, type DecisionThresholds } from '../types/risk';

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value === undefined || value === '' ? fallback : Number(value)))
    .pipe(z.number().finite());

const EnvSchema = z
  .object({
    PORT: numberFromEnv(8080).pipe(z.number().int().min(1).max(65535)),
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE: z.string().min(1).optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
    PII_SALT: z.string().min(32, 'PII_SALT must be at least 32 characters').optional(),
    TERM_TABLE_PATH: z.string().min(1).optional(),
    PATTERN_LIBRARY_PATH: z.string().min(1).optional(),
    DECISION_LAYER1_WEIGHT: numberFromEnv(0.6),
    DECISION_LAYER2_WEIGHT: numberFromEnv(0.4),
    CAUTION_THRESHOLD: numberFromEnv(0.3),
    ACK_TIMEOUT_MS: numberFromEnv(300_000).pipe(z.number().int().positive()),
    K_ANONYMITY_THRESHOLD: numberFromEnv(5).pipe(z.number().int().min(1))
  })
  .refine((env) => env.NODE_ENV !== 'production' || env.PII_SALT !== undefined, {
    message: 'PII_SALT is required in production',
    path: ['PII_SALT']
  });

export interface SafetyCoreConfig {
  port: number;
  nodeEnv: string;
  logLevel: LogLevel;
  supabase: {
    url: string;
    serviceRoleKey: string;
  } | null;
  piiSalt: string | null;
  termTablePath?: string;
  patternLibraryPath?: string;
  thresholds: DecisionThresholds;
  ackTimeoutMs: number;
  kAnonymityThreshold: number;
}

/**
 * Validate the environment into a typed config.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SafetyCoreConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.errors);
    throw new ConfigurationError(`Invalid environment configuration: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;

  const thresholds = DecisionThresholdsSchema.safeParse({
    layer1_weight: values.DECISION_LAYER1_WEIGHT,
    layer2_weight: values.DECISION_LAYER2_WEIGHT,
    caution_threshold: values.CAUTION_THRESHOLD
  });
  if (!thresholds.success) {
    const issues = formatIssues(thresholds.error.errors);
    throw new ConfigurationError(`Invalid decision thresholds: ${issues.join('; ')}`, issues);
  }

  const serviceRoleKey = values.SUPABASE_SERVICE_ROLE_KEY || values.SUPABASE_SERVICE_ROLE;

  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL ?? parseLogLevel(undefined),
    supabase: values.SUPABASE_URL && serviceRoleKey ? { url: values.SUPABASE_URL, serviceRoleKey } : null,
    piiSalt: values.PII_SALT ?? null,
    termTablePath: values.TERM_TABLE_PATH,
    patternLibraryPath: values.PATTERN_LIBRARY_PATH,
    thresholds: thresholds.data,
    ackTimeoutMs: values.ACK_TIMEOUT_MS,
    kAnonymityThreshold: values.K_ANONYMITY_THRESHOLD
  };
}
