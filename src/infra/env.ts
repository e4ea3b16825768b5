import { homedir } from 'node:os';
import path from 'node:path';
import { z, ZodError } from 'zod';

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

function expandHome(value: string): string {
  if (value === '~') return homedir();
  if (value.startsWith('~/')) return path.join(homedir(), value.slice(2));
  return value;
}

/**
 * Environment variable schema with strict validation
 */
const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Gemini API
    GEMINI_API_KEY: z.preprocess(emptyAsUndefined, z.string().min(1).optional()),
    GEMINI_BASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),

    // Data storage
    BANANA_DATA_DIR: z.string().default('~/.banana').transform(expandHome),
    SQLITE_DB_PATH: z.preprocess(emptyAsUndefined, z.string().optional()),

    // Logging
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
    LOG_FILE: z.preprocess(emptyAsUndefined, z.string().optional()),

    // Job engine
    JOB_MAX_ATTEMPTS: z.coerce
      .number()
      .int()
      .min(1, { message: 'JOB_MAX_ATTEMPTS must be at least 1' })
      .default(3),
    JOB_CONCURRENCY: z.coerce
      .number()
      .int()
      .min(1, { message: 'JOB_CONCURRENCY must be at least 1' })
      .default(2),
    JOB_ATTEMPT_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .min(1000, { message: 'JOB_ATTEMPT_TIMEOUT_MS must be at least 1000' })
      .default(120_000),
    JOB_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    JOB_RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30_000),
    JOB_RETENTION_DAYS: z.coerce.number().int().min(0).default(0),
  })
  .transform((env) => ({
    ...env,
    SQLITE_DB_PATH:
      env.SQLITE_DB_PATH === undefined
        ? path.join(env.BANANA_DATA_DIR, 'jobs.db')
        : expandHome(env.SQLITE_DB_PATH),
  }));

export type Env = z.infer<typeof envSchema>;

/**
 * Parses an environment record without side effects
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return parseEnv(source);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((issue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      console.error('\nCheck .env.example for supported variables');
      process.exit(1);
    }
    throw error;
  }
}
