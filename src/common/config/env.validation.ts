import { z } from 'zod';
import { config } from 'dotenv';
import { DEFAULT_RECOMMENDATION_THRESHOLDS } from '@constants';
import type { RecommendationThresholds } from '@constants';

// Load variables from .env when the process manager has not done it already
config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform(val => val === 'true');

const threshold = (fallback: number) => z.coerce.number().nonnegative().default(fallback);

/**
 * Environment variable validation schema
 */
export const envSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test', 'staging']).default('development'),

  // Server Configuration
  PORT: z.string().regex(/^\d+$/).default('3030').transform(Number),
  CORS_ORIGINS: z.string().optional(),

  // Database
  DATABASE_URL: z.string().min(1, 'Database URL is required'),
  DATABASE_SSL: booleanFlag('false'),
  DATABASE_SYNCHRONIZE: booleanFlag('false'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug']).default('info'),
  LOG_DIR: z.string().default('./logs'),

  // Seeding
  SEED: z
    .string()
    .regex(/^\d+$/, 'SEED must be a non-negative integer')
    .transform(Number)
    .optional(),

  // Recommendation thresholds
  RECOMMENDATION_MAX_AVG_DELAY: threshold(DEFAULT_RECOMMENDATION_THRESHOLDS.maxAvgDelayMinutes),
  RECOMMENDATION_MAX_CANCELLATION_RATE: threshold(
    DEFAULT_RECOMMENDATION_THRESHOLDS.maxCancellationRate,
  ),
  RECOMMENDATION_MAX_STOCKOUT_RATE: threshold(DEFAULT_RECOMMENDATION_THRESHOLDS.maxStockoutRate),
  RECOMMENDATION_MAX_AVG_PICKING_TIME: threshold(
    DEFAULT_RECOMMENDATION_THRESHOLDS.maxAvgPickingTimeMinutes,
  ),
  RECOMMENDATION_RIDER_LOAD_FACTOR: threshold(
    DEFAULT_RECOMMENDATION_THRESHOLDS.riderLoadImbalanceFactor,
  ),
  RECOMMENDATION_MIN_ON_TIME_RATE: threshold(DEFAULT_RECOMMENDATION_THRESHOLDS.minOnTimeRate),
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Validates the raw environment. Used as the `validate` hook of ConfigModule,
 * so a failure aborts startup with every offending variable listed.
 */
export function validateEnv(raw: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.errors.map(err => `  - ${err.path.join('.')}: ${err.message}`);
    throw new Error(`Environment validation failed:\n${problems.join('\n')}`);
  }
  return result.data;
}

export function loadRecommendationThresholds(
  env: Pick<
    EnvConfig,
    | 'RECOMMENDATION_MAX_AVG_DELAY'
    | 'RECOMMENDATION_MAX_CANCELLATION_RATE'
    | 'RECOMMENDATION_MAX_STOCKOUT_RATE'
    | 'RECOMMENDATION_MAX_AVG_PICKING_TIME'
    | 'RECOMMENDATION_RIDER_LOAD_FACTOR'
    | 'RECOMMENDATION_MIN_ON_TIME_RATE'
  >,
): RecommendationThresholds {
  return {
    maxAvgDelayMinutes: env.RECOMMENDATION_MAX_AVG_DELAY,
    maxCancellationRate: env.RECOMMENDATION_MAX_CANCELLATION_RATE,
    maxStockoutRate: env.RECOMMENDATION_MAX_STOCKOUT_RATE,
    maxAvgPickingTimeMinutes: env.RECOMMENDATION_MAX_AVG_PICKING_TIME,
    riderLoadImbalanceFactor: env.RECOMMENDATION_RIDER_LOAD_FACTOR,
    minOnTimeRate: env.RECOMMENDATION_MIN_ON_TIME_RATE,
  };
}
