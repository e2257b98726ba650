/**
 * Pipeline Runtime
 *
 * Builds the scoring orchestrator and the ingestion pipeline from a
 * PipelineConfig. Collaborators can be overridden; anything not given is
 * created from the config (in-memory repositories, Redis-backed leads when
 * Upstash credentials are present, the Anthropic generator when a key is set).
 *
 * @module runtime
 */

import { createTextGenerator, getRedisStore, initLangfuse, initRedis, shutdownLangfuse } from '@leadforge/lib';
import type { RetryHooks, TextGenerator } from '@leadforge/lib';
import { loadConfig } from './config';
import type { PipelineConfig } from './config';
import { createApifyScraperProvider } from './interaction-ingest/apify';
import { InteractionClassifier } from './interaction-ingest/classifier';
import type { ScraperProvider } from './interaction-ingest/contracts/scraper';
import { EnrichmentScheduler, MockEnrichmentProvider } from './interaction-ingest/enrichment';
import type { EnrichmentProvider } from './interaction-ingest/enrichment';
import { IngestLogger } from './interaction-ingest/logger';
import { IngestionPipeline } from './interaction-ingest/pipeline';
import { TaskQueue } from './interaction-ingest/queue';
import { ScraperClient } from './interaction-ingest/scraper';
import { LeadQualifierLogger } from './lead-qualifier/logger';
import { ScoringOrchestrator } from './lead-qualifier/orchestrator';
import { createInMemoryRepositories, RedisLeadRepository } from './repository';
import type { Repositories } from './repository';

export interface PipelineRuntimeOverrides {
  repositories?: Repositories;
  /** null forces the rule-based paths */
  generator?: TextGenerator | null;
  scraper?: ScraperProvider;
  enrichment?: EnrichmentProvider;
  sleep?: RetryHooks['sleep'];
  now?: () => Date;
}

export interface PipelineRuntime {
  config: PipelineConfig;
  repositories: Repositories;
  orchestrator: ScoringOrchestrator;
  /** Null when no scraper provider is available */
  ingestion: IngestionPipeline | null;
  queue: TaskQueue;
  /** Waits for queued tasks, then flushes tracing */
  shutdown(): Promise<void>;
}

function defaultRepositories(now?: () => Date): Repositories {
  const repositories = createInMemoryRepositories({ now });
  initRedis();
  const redis = getRedisStore();
  return redis ? { ...repositories, leads: new RedisLeadRepository(redis, { now }) } : repositories;
}

export function createPipelineRuntime(
  config: PipelineConfig = loadConfig(),
  overrides: PipelineRuntimeOverrides = {}
): PipelineRuntime {
  initLangfuse();

  const repositories = overrides.repositories ?? defaultRepositories(overrides.now);
  const generator =
    overrides.generator !== undefined
      ? overrides.generator
      : config.ai.enabled
        ? createTextGenerator({ apiKey: config.ai.apiKey, model: config.ai.model, timeoutMs: config.ai.timeoutMs })
        : null;

  const retry = {
    maxAttempts: config.ai.maxAttempts,
    delayMs: config.ai.retryDelayMs,
    maxTotalWaitMs: config.ai.maxTotalWaitMs,
  };
  const loggerConfig = { level: config.logLevel };

  const orchestrator = new ScoringOrchestrator(
    { repositories, generator, logger: new LeadQualifierLogger(loggerConfig) },
    {
      recalculationCap: config.qualification.recalculationCap,
      ai: { retry, callTimeoutMs: config.ai.timeoutMs, sleep: overrides.sleep },
      ...(overrides.now ? { now: overrides.now } : {}),
    }
  );

  const ingestLogger = new IngestLogger(loggerConfig);
  const queue = new TaskQueue({ concurrency: config.ingestion.concurrency }, ingestLogger);

  const apifyToken = config.ingestion.apifyToken;
  const provider =
    overrides.scraper ??
    (apifyToken
      ? createApifyScraperProvider({
          token: apifyToken,
          waitForFinishSecs: config.ingestion.apifyWaitForFinishSecs,
        })
      : null);

  const ingestion = provider
    ? new IngestionPipeline(
        {
          repositories,
          scraper: new ScraperClient(provider, {
            timeoutMs: config.ingestion.scraperTimeoutMs,
            commentsPageSize: config.ingestion.commentsPageSize,
            reactionsPageSize: config.ingestion.reactionsPageSize,
          }),
          classifier: new InteractionClassifier(
            generator,
            { retry, callTimeoutMs: config.ai.timeoutMs, sleep: overrides.sleep },
            ingestLogger
          ),
          queue,
          enrichment: new EnrichmentScheduler({
            provider: overrides.enrichment ?? new MockEnrichmentProvider(),
            leads: repositories.leads,
            queue,
            logger: ingestLogger,
            now: overrides.now,
          }),
          logger: ingestLogger,
        },
        {
          qualificationThreshold: config.qualification.qualificationThreshold,
          relevance: {
            high: config.qualification.highThreshold,
            medium: config.qualification.mediumThreshold,
          },
          autoEnrichEnabled: config.qualification.autoEnrichEnabled,
          autoEnrichMinScore: config.qualification.autoEnrichMinScore,
          ...(overrides.now ? { now: overrides.now } : {}),
        }
      )
    : null;

  const shutdown = async (): Promise<void> => {
    await queue.onIdle();
    await shutdownLangfuse();
  };

  return { config, repositories, orchestrator, ingestion, queue, shutdown };
}
