/**
 * Scorer Strategy
 *
 * Every scoring path implements the same capability. FallbackScorer
 * composes a primary and a secondary scorer: when the primary throws, the
 * secondary's result is returned with the failure recorded on it, and the
 * caller never sees the error.
 *
 * @module lead-qualifier/scorer
 */

import { errorMessage } from '@leadforge/lib';
import type { Interaction, Lead } from '@leadforge/lib';
import type { QualityTier } from './contracts/ai-score';

// ===========================================
// Types
// ===========================================

export type ScoringMethod = 'ai' | 'deterministic' | 'rules';

export interface ScoreContext {
  /** Interaction history of the lead, oldest first */
  interactions?: Interaction[];
  /** Langfuse trace to attach provider calls to */
  traceId?: string;
}

export interface ScoreResult {
  /** Integer in [0, 100] */
  score: number;
  method: ScoringMethod;
  reasoning?: string;
  quality_tier?: QualityTier;
  /** Set when a fallback scorer produced this result */
  fallback_reason?: string;
}

export interface Scorer {
  readonly name: string;
  score(lead: Lead, context?: ScoreContext): Promise<ScoreResult>;
}

export type FallbackListener = (error: unknown, lead: Lead) => void;

// ===========================================
// Helpers
// ===========================================

/**
 * Round and clamp into the lead score range
 */
export function clampScore(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(100, Math.round(value)));
}

// ===========================================
// Fallback Composition
// ===========================================

export class FallbackScorer implements Scorer {
  readonly name: string;

  constructor(
    private readonly primary: Scorer,
    private readonly secondary: Scorer,
    private readonly onFallback?: FallbackListener
  ) {
    this.name = `${primary.name}>${secondary.name}`;
  }

  async score(lead: Lead, context: ScoreContext = {}): Promise<ScoreResult> {
    try {
      return await this.primary.score(lead, context);
    } catch (error) {
      this.onFallback?.(error, lead);
      const result = await this.secondary.score(lead, context);
      return { ...result, fallback_reason: errorMessage(error) };
    }
  }
}
