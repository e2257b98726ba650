/**
 * Pipeline Configuration
 *
 * Environment variables parsed once into a typed config. Thresholds and
 * weights are defaults, not fixed law; each component also accepts a
 * `Partial<>` override in its constructor.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigError, DEFAULT_TEXT_GENERATOR_CONFIG, formatZodError, parseLogLevel } from '@leadforge/lib';
import type { LogLevel } from '@leadforge/lib';

// ===========================================
// Schema
// ===========================================

const booleanFlag = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((value) => (value === undefined ? defaultValue : value === 'true' || value === '1'));

const intWithDefault = (defaultValue: number, min = 0) =>
  z.coerce.number().int().min(min).default(defaultValue);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z
    .string()
    .optional()
    .transform((value) => value || undefined),
  AI_MODEL: z.string().min(1).default(DEFAULT_TEXT_GENERATOR_CONFIG.model),
  AI_SCORING_ENABLED: booleanFlag(true),
  AI_MAX_ATTEMPTS: intWithDefault(3, 1),
  AI_RETRY_DELAY_MS: intWithDefault(60_000),
  AI_MAX_TOTAL_WAIT_MS: intWithDefault(120_000),
  AI_TIMEOUT_MS: intWithDefault(30_000, 1),

  QUALIFICATION_THRESHOLD: intWithDefault(70),
  HIGH_RELEVANCE_THRESHOLD: intWithDefault(70),
  MEDIUM_RELEVANCE_THRESHOLD: intWithDefault(40),
  AUTO_ENRICH_ENABLED: booleanFlag(true),
  AUTO_ENRICH_MIN_SCORE: intWithDefault(70),
  RECALCULATION_CAP: intWithDefault(1000, 1),

  COMMENTS_PAGE_SIZE: intWithDefault(100, 1),
  REACTIONS_PAGE_SIZE: intWithDefault(100, 1),
  SCRAPER_TIMEOUT_MS: intWithDefault(120_000, 1),
  INGEST_CONCURRENCY: intWithDefault(4, 1),
  APIFY_API_TOKEN: z
    .string()
    .optional()
    .transform((value) => value || undefined),
  APIFY_WAIT_FOR_FINISH_SECS: intWithDefault(120, 1),

  LOG_LEVEL: z.string().optional(),
});

// ===========================================
// Typed Config
// ===========================================

export interface PipelineConfig {
  ai: {
    apiKey?: string;
    model: string;
    enabled: boolean;
    maxAttempts: number;
    retryDelayMs: number;
    maxTotalWaitMs: number;
    timeoutMs: number;
  };
  qualification: {
    qualificationThreshold: number;
    highThreshold: number;
    mediumThreshold: number;
    autoEnrichEnabled: boolean;
    autoEnrichMinScore: number;
    recalculationCap: number;
  };
  ingestion: {
    commentsPageSize: number;
    reactionsPageSize: number;
    scraperTimeoutMs: number;
    concurrency: number;
    apifyToken?: string;
    apifyWaitForFinishSecs: number;
  };
  logLevel: LogLevel;
}

/**
 * Parse configuration from environment variables
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('Invalid environment configuration', {
      fields: formatZodError(parsed.error),
    });
  }

  const e = parsed.data;
  if (e.MEDIUM_RELEVANCE_THRESHOLD > e.HIGH_RELEVANCE_THRESHOLD) {
    throw new ConfigError('MEDIUM_RELEVANCE_THRESHOLD must not exceed HIGH_RELEVANCE_THRESHOLD');
  }

  return {
    ai: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.AI_MODEL,
      enabled: e.AI_SCORING_ENABLED,
      maxAttempts: e.AI_MAX_ATTEMPTS,
      retryDelayMs: e.AI_RETRY_DELAY_MS,
      maxTotalWaitMs: e.AI_MAX_TOTAL_WAIT_MS,
      timeoutMs: e.AI_TIMEOUT_MS,
    },
    qualification: {
      qualificationThreshold: e.QUALIFICATION_THRESHOLD,
      highThreshold: e.HIGH_RELEVANCE_THRESHOLD,
      mediumThreshold: e.MEDIUM_RELEVANCE_THRESHOLD,
      autoEnrichEnabled: e.AUTO_ENRICH_ENABLED,
      autoEnrichMinScore: e.AUTO_ENRICH_MIN_SCORE,
      recalculationCap: e.RECALCULATION_CAP,
    },
    ingestion: {
      commentsPageSize: e.COMMENTS_PAGE_SIZE,
      reactionsPageSize: e.REACTIONS_PAGE_SIZE,
      scraperTimeoutMs: e.SCRAPER_TIMEOUT_MS,
      concurrency: e.INGEST_CONCURRENCY,
      apifyToken: e.APIFY_API_TOKEN,
      apifyWaitForFinishSecs: e.APIFY_WAIT_FOR_FINISH_SECS,
    },
    logLevel: parseLogLevel(e.LOG_LEVEL),
  };
}
