/**
 * Settings
 *
 * Environment-driven configuration, validated once at startup.
 */

import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const settingsSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: optionalString,
  DB_DEBUG: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  ANTHROPIC_API_KEY: optionalString,
  CLAUDE_MODEL: optionalString,
  FALLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  PERSIST_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  PERSIST_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(100),
  CHECKPOINT_MAX_WAIT_HOURS: z.coerce.number().positive().default(72),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60000),
  CORS_ORIGINS: z
    .string()
    .default('http://localhost:3000,http://localhost:5173')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    ),
});

export interface Settings {
  env: 'development' | 'test' | 'production';
  port: number;
  databaseUrl?: string;
  dbDebug: boolean;
  anthropicApiKey?: string;
  claudeModel?: string;
  fallbackTimeoutMs: number;
  persistMaxAttempts: number;
  persistRetryDelayMs: number;
  checkpointMaxWaitMs: number;
  sweepIntervalMs: number;
  corsOrigins: string[];
}

/**
 * Parse settings from an environment map. Throws with every invalid variable
 * listed when validation fails.
 */
export function loadSettings(env: Record<string, string | undefined> = process.env): Settings {
  const parsed = settingsSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    env: values.NODE_ENV,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    dbDebug: values.DB_DEBUG,
    anthropicApiKey: values.ANTHROPIC_API_KEY,
    claudeModel: values.CLAUDE_MODEL,
    fallbackTimeoutMs: values.FALLBACK_TIMEOUT_MS,
    persistMaxAttempts: values.PERSIST_MAX_ATTEMPTS,
    persistRetryDelayMs: values.PERSIST_RETRY_DELAY_MS,
    checkpointMaxWaitMs: Math.round(values.CHECKPOINT_MAX_WAIT_HOURS * 60 * 60 * 1000),
    sweepIntervalMs: values.SWEEP_INTERVAL_MS,
    corsOrigins: values.CORS_ORIGINS,
  };
}
