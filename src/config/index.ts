/**
 * Application configuration
 */

import { env } from './env.js';

const SECOND_MS = 1000;

export const config = {
  app: {
    name: 'gpu-catalog-harvester',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  source: {
    baseUrl: env.SOURCE_BASE_URL,
    catalogPath: env.CATALOG_PATH,
  },

  fetch: {
    minDelayMs: env.FETCH_MIN_DELAY_SECONDS * SECOND_MS,
    maxDelayMs: env.FETCH_MAX_DELAY_SECONDS * SECOND_MS,
    timeoutMs: env.FETCH_TIMEOUT_SECONDS * SECOND_MS,
    retryDelaysMs: env.RETRY_DELAYS_SECONDS.map((seconds) => seconds * SECOND_MS),
  },

  workers: {
    product: env.PRODUCT_WORKERS,
    board: env.BOARD_WORKERS,
  },

  database: {
    path: env.DB_PATH,
    specDomainTag: env.SPEC_DOMAIN_TAG,
  },

  server: {
    port: env.PORT,
    host: env.HOST,
  },

  scheduler: {
    enabled: env.SCHEDULER_ENABLED,
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },

  notifications: {
    apiKey: env.RESEND_API_KEY,
    from: env.EMAIL_FROM,
    to: env.NOTIFY_EMAIL,
  },

  logging: {
    level: env.LOG_LEVEL,
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
export { REVIEW_TYPE_RULES, REVIEW_OPTION_KEYWORDS } from './review-types.js';
