/**
 * Structured JSON Logger for Lead Qualification
 *
 * Events:
 * - lead_scored: A score was computed and persisted
 * - ai_scoring_fallback: AI path failed, deterministic path used
 * - ai_rate_limited: Provider rate limit hit, waiting before retry
 * - rule_rejected: A scoring rule or persona failed validation
 * - recalculation_completed: Bulk recalculation finished
 *
 * @module lead-qualifier/logger
 */

import { StructuredLogger } from '@leadforge/lib';
import type { LoggerConfig } from '@leadforge/lib';

export type QualifierLogEvent =
  | 'lead_scored'
  | 'ai_scoring_fallback'
  | 'ai_rate_limited'
  | 'rule_rejected'
  | 'recalculation_completed';

export class LeadQualifierLogger extends StructuredLogger<QualifierLogEvent> {
  constructor(config: Partial<LoggerConfig> = {}) {
    super('lead-qualifier', config);
  }

  // ===========================================
  // Scoring Events
  // ===========================================

  leadScored(data: {
    organization_id: string;
    lead_id: string;
    score: number;
    previous_score: number;
    method: string;
    quality_tier?: string;
    processing_time_ms: number;
  }): void {
    this.log('info', 'lead_scored', data);
  }

  aiScoringFallback(data: {
    organization_id: string;
    lead_id: string;
    error_code: string;
    error_message: string;
  }): void {
    this.log('warn', 'ai_scoring_fallback', data);
  }

  aiRateLimited(data: { attempt: number; delay_ms: number; operation: string }): void {
    this.log('warn', 'ai_rate_limited', data);
  }

  ruleRejected(data: { organization_id: string; kind: 'scoring_rule' | 'persona'; error_message: string }): void {
    this.log('warn', 'rule_rejected', data);
  }

  // ===========================================
  // Batch Events
  // ===========================================

  recalculationCompleted(data: {
    organization_id: string;
    total_updated: number;
    avg_before: number;
    avg_after: number;
    capped: boolean;
    processing_time_ms: number;
  }): void {
    this.log('info', 'recalculation_completed', data);
  }
}

/**
 * Default logger instance for the lead qualifier module
 */
export const logger = new LeadQualifierLogger();

export function createLogger(config?: Partial<LoggerConfig>): LeadQualifierLogger {
  return new LeadQualifierLogger(config);
}
