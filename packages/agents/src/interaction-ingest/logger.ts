/**
 * Structured JSON Logger for Interaction Ingestion
 *
 * Events:
 * - ingestion_started / ingestion_completed / ingestion_failed: post workflow lifecycle
 * - record_skipped: A malformed scraper record was dropped
 * - lead_created / lead_linked: An interaction resolved to a new or existing lead
 * - classification_fallback: AI classification failed, rule-based result used
 * - enrichment_scheduled / enrichment_completed / enrichment_failed
 * - task_failed: A background task rejected
 *
 * @module interaction-ingest/logger
 */

import { StructuredLogger } from '@leadforge/lib';
import type { LoggerConfig } from '@leadforge/lib';

export type IngestLogEvent =
  | 'ingestion_started'
  | 'ingestion_completed'
  | 'ingestion_failed'
  | 'record_skipped'
  | 'lead_created'
  | 'lead_linked'
  | 'classification_fallback'
  | 'enrichment_scheduled'
  | 'enrichment_completed'
  | 'enrichment_failed'
  | 'task_failed';

export class IngestLogger extends StructuredLogger<IngestLogEvent> {
  constructor(config: Partial<LoggerConfig> = {}) {
    super('interaction-ingest', config);
  }

  // ===========================================
  // Workflow Events
  // ===========================================

  ingestionStarted(data: {
    organization_id: string;
    post_id: string;
    post_url: string;
    campaign_id?: string | null;
  }): void {
    this.log('info', 'ingestion_started', data);
  }

  ingestionCompleted(data: {
    organization_id: string;
    post_id: string;
    leads_created: number;
    interactions_processed: number;
    records_skipped: number;
    processing_time_ms: number;
  }): void {
    this.log('info', 'ingestion_completed', data);
  }

  ingestionFailed(data: {
    organization_id: string;
    post_id: string;
    step: string;
    error_message: string;
  }): void {
    this.log('error', 'ingestion_failed', data);
  }

  recordSkipped(data: { post_id: string; reason: string }): void {
    this.log('debug', 'record_skipped', data);
  }

  // ===========================================
  // Lead Events
  // ===========================================

  leadCreated(data: {
    organization_id: string;
    lead_id: string;
    interaction_id: string;
    relevance_score: number;
  }): void {
    this.log('info', 'lead_created', data);
  }

  leadLinked(data: { organization_id: string; lead_id: string; interaction_id: string }): void {
    this.log('info', 'lead_linked', data);
  }

  classificationFallback(data: {
    kind: 'post_content' | 'profile';
    error_code: string;
    error_message: string;
  }): void {
    this.log('warn', 'classification_fallback', data);
  }

  // ===========================================
  // Background Events
  // ===========================================

  enrichmentScheduled(data: { organization_id: string; lead_id: string; task_id: string }): void {
    this.log('info', 'enrichment_scheduled', data);
  }

  enrichmentCompleted(data: { organization_id: string; lead_id: string; confidence: number }): void {
    this.log('info', 'enrichment_completed', data);
  }

  enrichmentFailed(data: { organization_id: string; lead_id: string; error_message: string }): void {
    this.log('warn', 'enrichment_failed', data);
  }

  taskFailed(data: { task_id: string; task_name: string; error_message: string }): void {
    this.log('error', 'task_failed', data);
  }
}

export const logger = new IngestLogger();

export function createLogger(config?: Partial<LoggerConfig>): IngestLogger {
  return new IngestLogger(config);
}
