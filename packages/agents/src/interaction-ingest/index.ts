/**
 * Interaction Ingest
 *
 * Scraped post interactions in, qualified and deduplicated leads out.
 *
 * @module interaction-ingest
 */

export { IngestionPipeline, createIngestionPipeline, DEFAULT_INGESTION_CONFIG } from './pipeline';
export type { IngestionPipelineConfig, IngestionPipelineDeps, IngestionResult, PostRef } from './pipeline';

export {
  InteractionClassifier,
  createInteractionClassifier,
  computeRelevance,
  fallbackProfileEvaluation,
  fallbackContentAnalysis,
  buildPostAnalysisPrompt,
  buildProfileEvaluationPrompt,
  DEFAULT_CLASSIFIER_CONFIG,
  DEFAULT_RELEVANCE_THRESHOLDS,
  INTERACTION_BASE_SCORE,
} from './classifier';
export type { ClassifierConfig, ProfileInput, Relevance, RelevanceThresholds } from './classifier';

export { ScraperClient, createScraperClient, DEFAULT_SCRAPER_CLIENT_CONFIG } from './scraper';
export type { ScraperClientConfig, FetchStep } from './scraper';

export { ApifyScraperProvider, createApifyScraperProvider, DEFAULT_APIFY_ACTORS } from './apify';
export type { ApifyProviderConfig } from './apify';

export { EnrichmentScheduler, MockEnrichmentProvider, createEnrichmentScheduler } from './enrichment';
export type { EnrichmentProvider, EnrichmentResult, EnrichmentSchedulerDeps } from './enrichment';

export { TaskQueue, createTaskQueue, DEFAULT_TASK_QUEUE_CONFIG } from './queue';
export type { TaskQueueConfig, TaskRecord, TaskStatus } from './queue';

export { normalizeRecord, normalizePostDetail, detectInteractionType, pickString, readPath } from './records';
export type { NormalizedRecord, NormalizeOutcome } from './records';

export * from './contracts';

export { IngestLogger, logger as ingestLogger, createLogger as createIngestLogger } from './logger';
export type { IngestLogEvent } from './logger';
