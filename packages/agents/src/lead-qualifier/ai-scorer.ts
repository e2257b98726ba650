/**
 * AI Scorer
 *
 * Probabilistic scoring through a text-generation provider. Builds a prompt
 * from the lead profile and its interaction history, asks for strict JSON,
 * and validates the reply. Every failure (no provider, rate limit past the
 * retry budget, timeout, malformed output) is thrown; composing this with
 * a FallbackScorer turns those failures into deterministic results.
 *
 * @module lead-qualifier/ai-scorer
 */

import {
  DEFAULT_RATE_LIMIT_RETRY_CONFIG,
  ProviderUnavailableError,
  generateStructured,
  parseStructuredOutput,
  renderOutputSchema,
} from '@leadforge/lib';
import type { Interaction, Lead, RateLimitRetryConfig, TextGenerator } from '@leadforge/lib';
import { AIScoreOutputSchema } from './contracts/ai-score';
import type { AIScoreOutput } from './contracts/ai-score';
import { logger as defaultLogger } from './logger';
import type { LeadQualifierLogger } from './logger';
import { clampScore } from './scorer';
import type { Scorer, ScoreContext, ScoreResult } from './scorer';

// ===========================================
// Configuration
// ===========================================

export interface AIScorerConfig {
  retry: RateLimitRetryConfig;
  /** Timeout applied to each provider call */
  callTimeoutMs: number;
  /** Most recent interactions embedded in the prompt */
  maxInteractions: number;
  /** Characters of interaction content kept per interaction */
  maxContentLength: number;
  /** Injectable sleep for the retry backoff */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_AI_SCORER_CONFIG: AIScorerConfig = {
  retry: DEFAULT_RATE_LIMIT_RETRY_CONFIG,
  callTimeoutMs: 30_000,
  maxInteractions: 20,
  maxContentLength: 500,
};

// ===========================================
// Prompt
// ===========================================

function summarizeInteractions(
  interactions: Interaction[],
  config: Pick<AIScorerConfig, 'maxInteractions' | 'maxContentLength'>
): Array<Record<string, unknown>> {
  return interactions.slice(-config.maxInteractions).map((interaction) => ({
    type: interaction.type,
    content: interaction.content ? interaction.content.slice(0, config.maxContentLength) : null,
    classification: interaction.classification,
    relevance_score: interaction.relevance_score,
    at: interaction.created_at,
  }));
}

export function buildLeadScoringPrompt(
  lead: Lead,
  interactions: Interaction[],
  config: Pick<AIScorerConfig, 'maxInteractions' | 'maxContentLength'> = DEFAULT_AI_SCORER_CONFIG
): string {
  const profile = {
    name: lead.name,
    title: lead.title,
    company: lead.company,
    location: lead.location,
    company_size: lead.company_size,
    company_industry: lead.company_industry,
    has_email: Boolean(lead.email),
    has_profile_url: Boolean(lead.profile_url),
    status: lead.status,
    source: lead.source,
  };

  return `You are a B2B sales qualification expert. Score this lead from 0 to 100.

LEAD PROFILE:
${JSON.stringify(profile, null, 2)}

INTERACTIONS:
${JSON.stringify(summarizeInteractions(interactions, config), null, 2)}

SCORING CRITERIA:
1. ICP fit (40%): is this a decision maker (VP, C-level, Director) in a relevant industry?
2. Engagement (40%): did they comment or react? Comments are high intent.
3. Completeness (20%): do we have an email, a profile URL, a company?

Respond with a single JSON object and nothing else, matching this JSON Schema:
${renderOutputSchema(AIScoreOutputSchema)}`;
}

// ===========================================
// Response Parsing
// ===========================================

/**
 * Validate provider text as an AI score
 *
 * @throws MalformedOutputError
 */
export function parseAIScore(text: string): AIScoreOutput {
  return parseStructuredOutput(text, AIScoreOutputSchema, 'score_lead');
}

// ===========================================
// Scorer
// ===========================================

export class AIScorer implements Scorer {
  readonly name = 'ai';
  private config: AIScorerConfig;

  constructor(
    private readonly generator: TextGenerator | null,
    config: Partial<AIScorerConfig> = {},
    private readonly logger: LeadQualifierLogger = defaultLogger
  ) {
    this.config = { ...DEFAULT_AI_SCORER_CONFIG, ...config };
  }

  /**
   * Whether a provider is configured
   */
  isAvailable(): boolean {
    return this.generator !== null;
  }

  async score(lead: Lead, context: ScoreContext = {}): Promise<ScoreResult> {
    const generator = this.generator;
    if (!generator) {
      throw new ProviderUnavailableError();
    }

    const prompt = buildLeadScoringPrompt(lead, context.interactions ?? [], this.config);
    const output = await generateStructured(generator, prompt, AIScoreOutputSchema, {
      name: 'score_lead',
      traceId: context.traceId,
      metadata: { leadId: lead.id },
      timeoutMs: this.config.callTimeoutMs,
      retry: this.config.retry,
      hooks: {
        sleep: this.config.sleep,
        onRetry: (attempt, delayMs) =>
          this.logger.aiRateLimited({ attempt, delay_ms: delayMs, operation: 'score_lead' }),
      },
    });
    return {
      score: clampScore(output.score),
      method: 'ai',
      reasoning: output.reasoning,
      quality_tier: output.quality_tier,
    };
  }
}

export function createAIScorer(
  generator: TextGenerator | null,
  config?: Partial<AIScorerConfig>,
  logger?: LeadQualifierLogger
): AIScorer {
  return new AIScorer(generator, config, logger);
}
