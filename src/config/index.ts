/**
 * Application configuration
 */

import { env } from './env.js';
import { MEDIA_SOURCES, VALID_CATEGORIES } from './sources.js';

export const config = {
  app: {
    name: 'newsroom-staging-pipeline',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  openai: {
    apiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
    promptVersion: env.AI_PROMPT_VERSION,
    batchSize: env.AI_BATCH_SIZE,
    claimTimeoutMinutes: env.AI_CLAIM_TIMEOUT_MINUTES,
  },

  database: {
    url: env.DATABASE_URL,
    poolMax: env.DB_POOL_MAX,
    statementTimeoutMs: env.DB_STATEMENT_TIMEOUT_MS,
    connectTimeoutMs: env.DB_CONNECT_TIMEOUT_MS,
  },

  pipeline: {
    maxRetries: env.PIPELINE_MAX_RETRIES,
    autoPrepare: env.AUTO_PREPARE,
    autoQueueHours: env.AUTO_QUEUE_HOURS,
    expireAiCompletedHours: env.EXPIRE_AI_COMPLETED_HOURS,
    titleSimilarityThreshold: env.TITLE_SIMILARITY_THRESHOLD,
    systemOperatorId: env.SYSTEM_OPERATOR_ID,
    listMaxLimit: 100,
    listDefaultLimit: 50,
    quality: {
      minTitleLength: 20,
      minSummaryLength: 50,
      minContentLength: 100,
    },
  },

  scraper: {
    userAgent: env.USER_AGENT,
    timeout: 30000,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
  },

  scheduler: {
    cronExpression: env.CRON_SCHEDULE,
    timezone: env.TZ,
  },

  sources: MEDIA_SOURCES,
  categories: VALID_CATEGORIES,

  retry: {
    maxAttempts: 3,
    initialDelayMs: 1000,
    maxDelayMs: 30000,
    factor: 2,
  },

  rateLimit: {
    openai: {
      requestsPerMinute: 60,
    },
  },
} as const;

export type Config = typeof config;
export { env } from './env.js';
export { MEDIA_SOURCES, VALID_CATEGORIES, getSource, getActiveSources } from './sources.js';
