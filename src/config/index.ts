import { z } from 'zod';
import type { EnvConfig } from '../types';

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? fallback : Number(value)))
    .pipe(z.number().finite());

const optionalNumberFromEnv = () =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === '' ? undefined : Number(value)))
    .pipe(z.number().finite().optional());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: numberFromEnv(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
  RATE_LIMIT_WINDOW_MS: numberFromEnv(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: numberFromEnv(1000),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  // Redis is optional; leaving REDIS_HOST unset disables the cache and the sweep queue
  REDIS_HOST: z
    .string()
    .optional()
    .transform((value) => (value && value.trim() !== '' ? value.trim() : undefined)),
  REDIS_PORT: numberFromEnv(6379),
  MATCH_EDIT_DISTANCE_THRESHOLD: optionalNumberFromEnv(),
  MATCH_JACCARD_THRESHOLD: optionalNumberFromEnv(),
  MATCH_AMOUNT_TOLERANCE_CEILING: optionalNumberFromEnv(),
  MATCH_ENFORCE_AMOUNT_CEILING: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => (value === undefined ? undefined : value === 'true')),
  MATCH_DATE_WINDOW_DAYS: optionalNumberFromEnv(),
  MATCH_DUPLICATE_WINDOW_DAYS: optionalNumberFromEnv(),
  MATCH_ACCEPT_THRESHOLD: optionalNumberFromEnv(),
  MATCH_REJECT_THRESHOLD: optionalNumberFromEnv(),
  MATCH_AMBIGUITY_EPSILON: optionalNumberFromEnv(),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const problems = parsed.error.errors
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
  throw new Error(`Invalid environment configuration: ${problems}`);
}

export const env: EnvConfig = parsed.data;

export default env;
