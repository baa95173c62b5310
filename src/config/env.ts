/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

const DEFAULT_RETRY_DELAYS =
  '600,900,1200,1800,2400,3600,4800,7200,10800,14400,21600,28800,43200,57600,86400';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

const secondsList = z
  .string()
  .default(DEFAULT_RETRY_DELAYS)
  .transform((value, ctx) => {
    const parts = value
      .split(',')
      .map((part) => part.trim())
      .filter((part) => part.length > 0);
    const delays = parts.map(Number);

    if (delays.some((delay) => !Number.isFinite(delay) || delay < 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'RETRY_DELAYS_SECONDS must be a comma-separated list of non-negative numbers',
      });
      return z.NEVER;
    }

    return delays;
  });

const envSchema = z
  .object({
    // Source site
    SOURCE_BASE_URL: z.string().url().default('https://www.techpowerup.com'),
    CATALOG_PATH: z.string().default('/gpu-specs/'),

    // Fetching
    FETCH_MIN_DELAY_SECONDS: z.coerce.number().nonnegative().default(30),
    FETCH_MAX_DELAY_SECONDS: z.coerce.number().nonnegative().default(60),
    FETCH_TIMEOUT_SECONDS: z.coerce.number().positive().default(200),
    RETRY_DELAYS_SECONDS: secondsList,

    // Worker pool
    PRODUCT_WORKERS: z.coerce.number().int().min(1).default(1),
    BOARD_WORKERS: z.coerce.number().int().min(1).default(3),

    // Database
    DB_PATH: z.string().default('./data/catalog.db'),
    SPEC_DOMAIN_TAG: z.string().min(1).default('GPU Specs'),

    // HTTP control surface
    PORT: z.coerce.number().int().positive().default(8104),
    HOST: z.string().default('0.0.0.0'),

    // Scheduling
    SCHEDULER_ENABLED: booleanFlag,
    CRON_SCHEDULE: z.string().default('0 2 * * *'),
    TZ: z.string().default('Asia/Taipei'),

    // Notifications
    RESEND_API_KEY: z.string().optional(),
    EMAIL_FROM: z.string().default('GPU Harvester <harvester@example.com>'),
    NOTIFY_EMAIL: z.string().default('operators@example.com'),

    // Logging
    LOG_LEVEL: z
      .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
      .default('info'),

    // Environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .refine((env) => env.FETCH_MIN_DELAY_SECONDS <= env.FETCH_MAX_DELAY_SECONDS, {
    message: 'FETCH_MIN_DELAY_SECONDS must not exceed FETCH_MAX_DELAY_SECONDS',
    path: ['FETCH_MIN_DELAY_SECONDS'],
  });

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = parseEnv(process.env);
