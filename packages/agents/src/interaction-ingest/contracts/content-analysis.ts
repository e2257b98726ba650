/**
 * Post Content Analysis Contract
 *
 * @module interaction-ingest/contracts/content-analysis
 */

import { z } from 'zod';
import { PostIntentSchema } from '@leadforge/lib';
import type { ContentAnalysis } from '@leadforge/lib';

export const ContentAnalysisOutputSchema = z.object({
  intent: PostIntentSchema.exclude(['unknown']),
  topics: z.array(z.string()).describe('3-5 main topics or keywords'),
  relevance_score: z.number().describe('0-100, how relevant the post is to the product'),
  summary: z.string().describe('One-line summary'),
});

export type ContentAnalysisOutput = z.infer<typeof ContentAnalysisOutputSchema>;

/** Result used when the post cannot be analyzed */
export const FALLBACK_CONTENT_ANALYSIS: ContentAnalysis = {
  intent: 'unknown',
  topics: [],
  relevance_score: 50,
  summary: '',
};
