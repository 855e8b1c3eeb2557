import dotenv from 'dotenv';
import { z } from 'zod';
import { resolveMatcherConfig } from '../matching/matcherConfig';
import type { MatcherConfig } from '../matching/types';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
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
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),

  // Uploads (per file) and JSON bodies (finalize posts the prepared rows back)
  UPLOAD_MAX_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  JSON_BODY_LIMIT: z.string().default('50mb'),

  // Matcher defaults
  MATCH_TOP_N: z.coerce.number().int().min(1).default(3),
  MATCH_MIN_SCORE: z.coerce.number().finite().min(0).max(1).default(0.8),
  MATCH_NGRAM_WEIGHT: z.coerce.number().finite().min(0).default(0.5),
  MATCH_PREFIX_WEIGHT: z.coerce.number().finite().min(0).default(0.3),
  MATCH_EDIT_WEIGHT: z.coerce.number().finite().min(0).default(0.2),
});

export type EnvConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const details = parsed.error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
  throw new Error(`Invalid environment configuration: ${details}`);
}

export const env: EnvConfig = parsed.data;

/**
 * Matcher configuration taken from the environment. Request-level
 * overrides are merged on top of it.
 */
export const matcherDefaults: Readonly<MatcherConfig> = Object.freeze(
  resolveMatcherConfig({
    ngramWeight: env.MATCH_NGRAM_WEIGHT,
    prefixWeight: env.MATCH_PREFIX_WEIGHT,
    editWeight: env.MATCH_EDIT_WEIGHT,
    topN: env.MATCH_TOP_N,
    minScoreThreshold: env.MATCH_MIN_SCORE,
  })
);

export default env;
