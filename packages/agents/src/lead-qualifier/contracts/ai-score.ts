/**
 * AI Score Contract
 *
 * Shape the text-generation provider must return when scoring a lead.
 * Only `score` is required; a tier is matched case-insensitively and an
 * unrecognised one is dropped.
 *
 * @module lead-qualifier/contracts/ai-score
 */

import { z } from 'zod';

export const QualityTierSchema = z.enum(['High', 'Medium', 'Low']);
export type QualityTier = z.infer<typeof QualityTierSchema>;

const TIER_BY_NAME: Record<string, QualityTier> = {
  high: 'High',
  medium: 'Medium',
  low: 'Low',
};

export const AIScoreOutputSchema = z.object({
  score: z.number().describe('Integer 0-100'),
  reasoning: z
    .preprocess(
      (value) => (typeof value === 'string' && value.trim() !== '' ? value : undefined),
      z.string().optional()
    )
    .describe('Concise explanation of the score'),
  quality_tier: z
    .preprocess(
      (value) => (typeof value === 'string' ? TIER_BY_NAME[value.trim().toLowerCase()] : undefined),
      QualityTierSchema.optional()
    )
    .describe('High, Medium or Low'),
});

export type AIScoreOutput = z.infer<typeof AIScoreOutputSchema>;
