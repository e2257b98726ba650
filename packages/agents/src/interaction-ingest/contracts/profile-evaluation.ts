/**
 * Profile Evaluation Contract
 *
 * Shape the text-generation provider returns when judging an interacting
 * profile against a persona, plus the persona view sent in the prompt.
 *
 * @module interaction-ingest/contracts/profile-evaluation
 */

import { z } from 'zod';
import type { Persona } from '@leadforge/lib';
import { DEFAULT_PERSONA_SENIORITY_LEVELS } from '../../lead-qualifier/seniority';

export const ProfileTypeSchema = z.enum(['person', 'company']);
export const RoleCategorySchema = z.enum(['decision_maker', 'influencer', 'end_user', 'irrelevant']);
export const CommentIntentSchema = z.enum(['high', 'medium', 'low']);

export type RoleCategory = z.infer<typeof RoleCategorySchema>;
export type CommentIntent = z.infer<typeof CommentIntentSchema>;

export const ProfileEvaluationSchema = z.object({
  profile_type: ProfileTypeSchema,
  role_category: RoleCategorySchema,
  seniority_level: z.string().min(1).describe('One of C-level, VP, Director, Manager, IC, Student'),
  industry_match: z.boolean(),
  intent_from_comment: CommentIntentSchema.describe(
    'high: asking or seeking a solution; medium: sharing an opinion; low: general engagement'
  ),
  persona_fit_score: z.number().describe('Integer 0-100'),
  reasoning: z.string().describe('Brief explanation'),
});

export type ProfileEvaluation = z.infer<typeof ProfileEvaluationSchema>;

// ===========================================
// Persona Definition
// ===========================================

export interface PersonaDefinition {
  industries: string[];
  job_titles: string[];
  seniority: string[];
  /** Title keywords that disqualify a profile */
  excluded: string[];
}

export const EMPTY_PERSONA_DEFINITION: PersonaDefinition = {
  industries: [],
  job_titles: [],
  seniority: [],
  excluded: [],
};

export function personaDefinitionFrom(persona: Persona | null): PersonaDefinition {
  if (!persona) return EMPTY_PERSONA_DEFINITION;
  const { rules } = persona;
  return {
    industries: rules.industries ?? [],
    job_titles: rules.title_keywords ?? [],
    seniority: rules.seniority_levels ?? [...DEFAULT_PERSONA_SENIORITY_LEVELS],
    excluded: rules.title_exclude ?? [],
  };
}
