/**
 * Scoring Orchestrator
 *
 * Chooses the scoring path per lead, persists the clamped result and keeps
 * the audit trail. When a text generator is configured the AI scorer runs
 * first behind a FallbackScorer; otherwise the deterministic scorer runs
 * alone. An AI failure is never surfaced to the caller.
 *
 * Observability: one Langfuse trace per scored lead when enabled.
 *
 * @module lead-qualifier/orchestrator
 */

import {
  TenantAccessError,
  ValidationError,
  createLeadScoringTrace,
  endLeadScoringTrace,
  endTraceWithError,
  errorCode,
  errorMessage,
} from '@leadforge/lib';
import type { Lead, OrganizationId, Persona, ScoringRule, TextGenerator } from '@leadforge/lib';
import type { Repositories } from '../repository';
import type { LeadPatch } from '../repository';
import { AIScorer } from './ai-scorer';
import type { AIScorerConfig } from './ai-scorer';
import { compilePersona, compileScoringRule, DEFAULT_SCORING_RULES } from './contracts';
import { DeterministicScorer } from './deterministic';
import type { DeterministicScorerConfig } from './deterministic';
import { logger as defaultLogger } from './logger';
import type { LeadQualifierLogger } from './logger';
import { personaBonus } from './persona';
import { evaluateAllRules, sumRuleDeltas } from './rules';
import { FallbackScorer, clampScore } from './scorer';
import type { Scorer, ScoreResult } from './scorer';

// ===========================================
// Types
// ===========================================

export interface ScoringOrchestratorConfig {
  /** Max leads per tenant-wide recalculation (explicit id lists are not capped) */
  recalculationCap: number;
  ai: Partial<AIScorerConfig>;
  deterministic: Partial<DeterministicScorerConfig>;
  now: () => Date;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: ScoringOrchestratorConfig = {
  recalculationCap: 1000,
  ai: {},
  deterministic: {},
  now: () => new Date(),
};

export interface ScoringOrchestratorDeps {
  repositories: Pick<Repositories, 'leads' | 'interactions' | 'personas' | 'scoringRules'>;
  /** Absent or null disables the AI path */
  generator?: TextGenerator | null;
  logger?: LeadQualifierLogger;
}

export interface RecalculationResult {
  total_updated: number;
  avg_before: number;
  avg_after: number;
}

// ===========================================
// Helpers
// ===========================================

function average(values: number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  return Math.round(mean * 10) / 10;
}

/**
 * Audit line appended to lead notes for an AI score
 */
export function formatScoreNote(at: Date, result: ScoreResult): string {
  return `[${at.toISOString()}] AI score ${result.score} (${result.quality_tier ?? 'Unknown'}): ${result.reasoning ?? ''}`;
}

// ===========================================
// Orchestrator
// ===========================================

export class ScoringOrchestrator {
  private config: ScoringOrchestratorConfig;
  private logger: LeadQualifierLogger;
  private repos: ScoringOrchestratorDeps['repositories'];
  private scorer: Scorer;
  readonly deterministic: DeterministicScorer;

  constructor(deps: ScoringOrchestratorDeps, config: Partial<ScoringOrchestratorConfig> = {}) {
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };
    this.logger = deps.logger ?? defaultLogger;
    this.repos = deps.repositories;
    this.deterministic = new DeterministicScorer(this.config.deterministic);

    const generator = deps.generator ?? null;
    this.scorer = generator
      ? new FallbackScorer(new AIScorer(generator, this.config.ai, this.logger), this.deterministic, (error, lead) =>
          this.logger.aiScoringFallback({
            organization_id: lead.organization_id,
            lead_id: lead.id,
            error_code: errorCode(error),
            error_message: errorMessage(error),
          })
        )
      : this.deterministic;
  }

  /**
   * Whether the AI path is attempted first
   */
  get aiEnabled(): boolean {
    return this.scorer !== this.deterministic;
  }

  // ===========================================
  // Single Lead
  // ===========================================

  /**
   * Score a lead and persist the result. Returns the stored score.
   *
   * @throws TenantAccessError when the lead belongs to another organization
   */
  async calculateScore(organizationId: OrganizationId, lead: Lead): Promise<number> {
    if (lead.organization_id !== organizationId) {
      throw new TenantAccessError('Lead', lead.id, organizationId);
    }

    const startTime = Date.now();
    const trace = createLeadScoringTrace({
      organizationId,
      leadId: lead.id,
      leadData: { title: lead.title, company: lead.company, status: lead.status, source: lead.source },
    });

    try {
      const interactions = await this.repos.interactions.listByLead(organizationId, lead.id);
      const result = await this.scorer.score(lead, { interactions, traceId: trace?.traceId });
      const score = clampScore(result.score);

      const patch: LeadPatch = { score };
      if (result.method === 'ai' && result.reasoning) {
        const note = formatScoreNote(this.config.now(), { ...result, score });
        patch.notes = lead.notes ? `${lead.notes}\n${note}` : note;
        if (result.quality_tier) {
          patch.custom_fields = { ...lead.custom_fields, ai_quality_tier: result.quality_tier };
        }
      }
      await this.repos.leads.update(organizationId, lead.id, patch);

      const processingTimeMs = Date.now() - startTime;
      this.logger.leadScored({
        organization_id: organizationId,
        lead_id: lead.id,
        score,
        previous_score: lead.score,
        method: result.method,
        quality_tier: result.quality_tier,
        processing_time_ms: processingTimeMs,
      });
      if (trace) {
        endLeadScoringTrace(trace.traceId, {
          score,
          method: result.method,
          qualityTier: result.quality_tier,
          fallbackReason: result.fallback_reason,
          processingTimeMs,
        });
      }
      return score;
    } catch (error) {
      if (trace) {
        endTraceWithError(trace.traceId, errorMessage(error));
      }
      throw error;
    }
  }

  /**
   * Sum of active rule deltas plus the first matching persona's bonus,
   * clamped to [0, 100]. Not persisted.
   */
  async calculateRuleScore(organizationId: OrganizationId, lead: Lead): Promise<number> {
    const [rules, personas] = await Promise.all([
      this.repos.scoringRules.listActive(organizationId),
      this.repos.personas.listActive(organizationId),
    ]);
    return clampScore(sumRuleDeltas(evaluateAllRules(lead, rules)) + personaBonus(lead, personas));
  }

  // ===========================================
  // Bulk Recalculation
  // ===========================================

  /**
   * Re-score the given leads, or every lead of the organization up to the
   * recalculation cap when no ids (or an empty list) are given. Each lead
   * is written independently.
   */
  async recalculateScores(organizationId: OrganizationId, leadIds?: string[]): Promise<RecalculationResult> {
    const startTime = Date.now();
    const explicit = leadIds !== undefined && leadIds.length > 0;
    const leads = explicit
      ? await this.repos.leads.list(organizationId, { ids: leadIds })
      : await this.repos.leads.list(organizationId, { limit: this.config.recalculationCap });

    const before = leads.map((lead) => lead.score);
    const after: number[] = [];
    for (const lead of leads) {
      after.push(await this.calculateScore(organizationId, lead));
    }

    const result: RecalculationResult = {
      total_updated: leads.length,
      avg_before: average(before),
      avg_after: average(after),
    };

    this.logger.recalculationCompleted({
      organization_id: organizationId,
      ...result,
      capped: !explicit && leads.length >= this.config.recalculationCap,
      processing_time_ms: Date.now() - startTime,
    });

    return result;
  }

  // ===========================================
  // Rule & Persona Definitions
  // ===========================================

  /**
   * Validate and store a scoring rule
   *
   * @throws ValidationError
   */
  async saveScoringRule(organizationId: OrganizationId, input: unknown): Promise<ScoringRule> {
    const rule = this.compileOrReject(organizationId, 'scoring_rule', () => compileScoringRule(organizationId, input));
    return this.repos.scoringRules.save(organizationId, rule);
  }

  /**
   * Validate and store a persona
   *
   * @throws ValidationError
   */
  async savePersona(organizationId: OrganizationId, input: unknown): Promise<Persona> {
    const persona = this.compileOrReject(organizationId, 'persona', () => compilePersona(organizationId, input));
    return this.repos.personas.save(organizationId, persona);
  }

  /**
   * Install the default scoring rules for an organization
   */
  async seedDefaultRules(organizationId: OrganizationId): Promise<ScoringRule[]> {
    const saved: ScoringRule[] = [];
    for (const input of DEFAULT_SCORING_RULES) {
      saved.push(await this.saveScoringRule(organizationId, input));
    }
    return saved;
  }

  private compileOrReject<T>(
    organizationId: OrganizationId,
    kind: 'scoring_rule' | 'persona',
    compile: () => T
  ): T {
    try {
      return compile();
    } catch (error) {
      if (error instanceof ValidationError) {
        this.logger.ruleRejected({ organization_id: organizationId, kind, error_message: error.message });
      }
      throw error;
    }
  }
}

export function createScoringOrchestrator(
  deps: ScoringOrchestratorDeps,
  config?: Partial<ScoringOrchestratorConfig>
): ScoringOrchestrator {
  return new ScoringOrchestrator(deps, config);
}
