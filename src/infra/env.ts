import path from 'node:path';
import { z, ZodError } from 'zod';
import { isReservedArtifactName } from './storage/ArtifactStore.js';

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional()
);

/**
 * Environment variable schema with strict validation.
 * Every duration has a documented fallback; nothing else is defaulted in the services.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(8000),
  PUBLIC_BASE_URL: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string().url().optional()
  ),

  // Data storage
  STORAGE_PATH: z.string().default('./data/discoveries'),
  SQLITE_DB_PATH: z.string().default('./data/discoveries.db'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: optionalString,

  // Retention and sweeps
  RETENTION_SECONDS: z.coerce
    .number()
    .int()
    .min(1, { message: 'RETENTION_SECONDS must be at least 1' })
    .default(60 * 60 * 24 * 7),
  SWEEP_INTERVAL_SECONDS: z.coerce
    .number()
    .int()
    .min(1, { message: 'SWEEP_INTERVAL_SECONDS must be at least 1' })
    .default(60),
  RECONCILE_INTERVAL_SECONDS: z.coerce
    .number()
    .int()
    .min(1, { message: 'RECONCILE_INTERVAL_SECONDS must be at least 1' })
    .default(30),
  DISPATCH_GRACE_SECONDS: z.coerce.number().int().min(0).default(30),
  MAX_PROCESSING_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'MAX_PROCESSING_MINUTES must be at least 1' })
    .default(60 * 24),

  // Task queue
  TASK_LEASE_SECONDS: z.coerce
    .number()
    .int()
    .min(5, { message: 'TASK_LEASE_SECONDS must be at least 5' })
    .default(120),
  MAX_DELIVERY_ATTEMPTS: z.coerce
    .number()
    .int()
    .min(1, { message: 'MAX_DELIVERY_ATTEMPTS must be at least 1' })
    .default(3),
  RETRY_BACKOFF_SECONDS: z.coerce.number().int().min(0).default(30),

  // Worker pool
  WORKER_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1, { message: 'WORKER_CONCURRENCY must be at least 1' })
    .default(1),
  WORKER_POLL_INTERVAL_MS: z.coerce.number().int().min(50).default(1000),

  // Discovery engine
  DISCOVERY_ENGINE_COMMAND: z.string().min(1).default('/opt/discovery-engine/run.sh'),
  DISCOVERY_ENGINE_CWD: optionalString,
  DISCOVERY_RESULT_FILE: z
    .string()
    .min(1)
    .refine((value) => !isReservedArtifactName(path.basename(value)), {
      message: 'DISCOVERY_RESULT_FILE must not reuse an input artifact name',
    })
    .default('results.tar.gz'),

  // Callbacks
  CALLBACK_TIMEOUT_MS: z.coerce.number().int().min(100).default(10000),

  // Uploads and rate limiting (API)
  MAX_UPLOAD_MB: z.coerce.number().int().min(1).default(100),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().default(120),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment record without side effects.
 * Throws ZodError when validation fails.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails (fail-fast principle)
 */
export function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for required variables');
      process.exit(1);
    }
    throw error;
  }
}
