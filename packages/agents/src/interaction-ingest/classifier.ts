/**
 * Interaction Classification
 *
 * AI-assisted analysis of post content and of interacting profiles, each
 * with a rule-based fallback. A provider failure of any kind degrades to
 * the fallback and is logged; it never aborts ingestion.
 *
 * Relevance of an interaction combines a per-type base, half of the
 * persona fit and an intent boost, then maps onto high/medium/low bands.
 * An irrelevant role forces the score to 0.
 *
 * @module interaction-ingest/classifier
 */

import type { z } from 'zod';
import {
  DEFAULT_RATE_LIMIT_RETRY_CONFIG,
  ProviderUnavailableError,
  errorCode,
  errorMessage,
  generateStructured,
  renderOutputSchema,
} from '@leadforge/lib';
import type {
  ContentAnalysis,
  InteractionClassification,
  InteractionType,
  RateLimitRetryConfig,
  TextGenerator,
} from '@leadforge/lib';
import { clampScore } from '../lead-qualifier/scorer';
import { inferSeniority } from '../lead-qualifier/seniority';
import { ContentAnalysisOutputSchema, FALLBACK_CONTENT_ANALYSIS } from './contracts/content-analysis';
import { ProfileEvaluationSchema } from './contracts/profile-evaluation';
import type { PersonaDefinition, ProfileEvaluation } from './contracts/profile-evaluation';
import { logger as defaultLogger } from './logger';
import type { IngestLogger } from './logger';

// ===========================================
// Configuration
// ===========================================

export interface ClassifierConfig {
  retry: RateLimitRetryConfig;
  callTimeoutMs: number;
  /** Product description given to post analysis */
  productContext: string;
  /** Roles that always make a profile irrelevant, matched against the headline */
  excludedRoles: string[];
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  retry: DEFAULT_RATE_LIMIT_RETRY_CONFIG,
  callTimeoutMs: 30_000,
  productContext: 'General B2B SaaS',
  excludedRoles: ['student', 'recruiter', 'intern'],
};

export interface RelevanceThresholds {
  high: number;
  medium: number;
}

export const DEFAULT_RELEVANCE_THRESHOLDS: RelevanceThresholds = { high: 70, medium: 40 };

/** Base relevance per interaction type; comments carry the most intent */
export const INTERACTION_BASE_SCORE: Record<InteractionType, number> = {
  comment: 10,
  reaction: 3,
  post_author: 3,
  profile_visit: 3,
};

export interface ProfileInput {
  name: string;
  headline: string | null;
  comment: string | null;
}

export interface Relevance {
  relevance_score: number;
  classification: InteractionClassification;
}

// ===========================================
// Rule-Based Fallbacks
// ===========================================

function excludedRoleIn(headline: string, excluded: string[]): boolean {
  const lower = headline.toLowerCase();
  return excluded.some((role) => role.trim() !== '' && lower.includes(role.toLowerCase()));
}

function isCompanyProfile(profile: ProfileInput): boolean {
  return [profile.headline ?? '', profile.name].some((text) => text.includes('Company') || text.includes('Ltd'));
}

/**
 * Keyword evaluation used when the provider is unavailable or fails
 */
export function fallbackProfileEvaluation(
  profile: ProfileInput,
  persona: PersonaDefinition,
  excludedRoles: string[] = DEFAULT_CLASSIFIER_CONFIG.excludedRoles
): ProfileEvaluation {
  const headline = profile.headline ?? '';
  const excluded = excludedRoleIn(headline, [...excludedRoles, ...persona.excluded]);

  return {
    profile_type: isCompanyProfile(profile) ? 'company' : 'person',
    role_category: excluded ? 'irrelevant' : 'influencer',
    seniority_level: inferSeniority(headline),
    industry_match: false,
    intent_from_comment: 'medium',
    persona_fit_score: excluded ? 0 : 50,
    reasoning: 'Fallback evaluation (AI unavailable)',
  };
}

export function fallbackContentAnalysis(): ContentAnalysis {
  return { ...FALLBACK_CONTENT_ANALYSIS, topics: [] };
}

// ===========================================
// Relevance
// ===========================================

export function computeRelevance(
  type: InteractionType,
  evaluation: ProfileEvaluation,
  thresholds: RelevanceThresholds = DEFAULT_RELEVANCE_THRESHOLDS
): Relevance {
  if (evaluation.role_category === 'irrelevant') {
    return { relevance_score: 0, classification: 'irrelevant' };
  }

  const fit = clampScore(evaluation.persona_fit_score);
  const score =
    INTERACTION_BASE_SCORE[type] + Math.floor(fit / 2) + (evaluation.intent_from_comment === 'high' ? 20 : 0);

  if (score >= thresholds.high) return { relevance_score: score, classification: 'high' };
  if (score >= thresholds.medium) return { relevance_score: score, classification: 'medium' };
  return { relevance_score: score, classification: 'low' };
}

// ===========================================
// Prompts
// ===========================================

export function buildPostAnalysisPrompt(postText: string, productContext: string): string {
  return `Analyze this LinkedIn post.

Post: ${JSON.stringify(postText)}
Customer product or service: ${JSON.stringify(productContext)}

Respond with a single JSON object and nothing else, matching this JSON Schema:
${renderOutputSchema(ContentAnalysisOutputSchema)}`;
}

export function buildProfileEvaluationPrompt(profile: ProfileInput, persona: PersonaDefinition): string {
  return `Evaluate this LinkedIn profile interaction against the target persona.

Name: ${profile.name}
Headline: ${profile.headline ?? ''}
Their comment: ${JSON.stringify(profile.comment ?? '')}

Target persona:
- Industries: ${JSON.stringify(persona.industries)}
- Job titles: ${JSON.stringify(persona.job_titles)}
- Seniority: ${JSON.stringify(persona.seniority)}
- Excluded roles: ${JSON.stringify(persona.excluded)}

Respond with a single JSON object and nothing else, matching this JSON Schema:
${renderOutputSchema(ProfileEvaluationSchema)}`;
}

// ===========================================
// Classifier
// ===========================================

export class InteractionClassifier {
  private config: ClassifierConfig;

  constructor(
    private readonly generator: TextGenerator | null,
    config: Partial<ClassifierConfig> = {},
    private readonly logger: IngestLogger = defaultLogger
  ) {
    this.config = { ...DEFAULT_CLASSIFIER_CONFIG, ...config };
  }

  /**
   * Classify the intent of a post; never throws
   */
  async analyzePost(postText: string | null, traceId?: string): Promise<ContentAnalysis> {
    if (!postText) {
      return fallbackContentAnalysis();
    }

    try {
      const output = await this.generate(
        'analyze_post',
        buildPostAnalysisPrompt(postText, this.config.productContext),
        ContentAnalysisOutputSchema,
        traceId
      );
      return { ...output, relevance_score: clampScore(output.relevance_score) };
    } catch (error) {
      this.logger.classificationFallback({
        kind: 'post_content',
        error_code: errorCode(error),
        error_message: errorMessage(error),
      });
      return fallbackContentAnalysis();
    }
  }

  /**
   * Evaluate an interacting profile against a persona; never throws.
   * Excluded roles in the headline force `irrelevant` whatever the provider says.
   */
  async evaluateProfile(
    profile: ProfileInput,
    persona: PersonaDefinition,
    traceId?: string
  ): Promise<ProfileEvaluation> {
    const fallback = fallbackProfileEvaluation(profile, persona, this.config.excludedRoles);
    if (fallback.role_category === 'irrelevant') {
      return fallback;
    }

    try {
      const output = await this.generate(
        'evaluate_profile',
        buildProfileEvaluationPrompt(profile, persona),
        ProfileEvaluationSchema,
        traceId
      );
      return { ...output, persona_fit_score: clampScore(output.persona_fit_score) };
    } catch (error) {
      this.logger.classificationFallback({
        kind: 'profile',
        error_code: errorCode(error),
        error_message: errorMessage(error),
      });
      return fallback;
    }
  }

  private generate<T>(
    name: string,
    prompt: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    traceId: string | undefined
  ): Promise<T> {
    const generator = this.generator;
    if (!generator) {
      return Promise.reject(new ProviderUnavailableError());
    }
    return generateStructured(generator, prompt, schema, {
      name,
      traceId,
      timeoutMs: this.config.callTimeoutMs,
      retry: this.config.retry,
      hooks: { sleep: this.config.sleep },
    });
  }
}

export function createInteractionClassifier(
  generator: TextGenerator | null,
  config?: Partial<ClassifierConfig>,
  logger?: IngestLogger
): InteractionClassifier {
  return new InteractionClassifier(generator, config, logger);
}
