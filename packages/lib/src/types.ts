/**
 * Shared Types
 *
 * Entity schemas for the lead qualification pipeline. Every entity carries
 * the owning organization id; repositories reject reads and writes that
 * name another organization.
 */

import { z } from 'zod';

// ===========================================
// Identifiers
// ===========================================

export type OrganizationId = string;
export type LeadId = string;
export type InteractionId = string;
export type PersonaId = string;
export type ScoringRuleId = string;
export type SourcePostId = string;
export type CampaignId = string;

// ===========================================
// Lead
// ===========================================

export const LeadStatusSchema = z.enum([
  'new',
  'contacted',
  'replied',
  'qualified',
  'closed',
  'lost',
]);
export type LeadStatus = z.infer<typeof LeadStatusSchema>;

export const EnrichmentStatusSchema = z.enum(['pending', 'enriched', 'failed']);
export type EnrichmentStatus = z.infer<typeof EnrichmentStatusSchema>;

/** Known provenance tags; other strings are accepted */
export const LEAD_SOURCES = {
  manual: 'manual',
  csv: 'csv',
  postAnalysis: 'linkedin_post_analysis',
  campaign: 'campaign',
} as const;

export const LeadSchema = z.object({
  id: z.string().min(1),
  organization_id: z.string().min(1),
  name: z.string(),
  profile_url: z.string().nullable().describe('Canonical profile URL, the dedup key'),
  title: z.string().nullable(),
  company: z.string().nullable(),
  location: z.string().nullable(),
  email: z.string().nullable(),
  phone: z.string().nullable(),
  company_size: z.string().nullable().describe('Range string such as "51-200"'),
  company_industry: z.string().nullable(),
  company_website: z.string().nullable(),
  score: z.number().int().min(0).max(100),
  status: LeadStatusSchema,
  source: z.string(),
  is_email_verified: z.boolean(),
  enrichment_status: EnrichmentStatusSchema,
  enriched_at: z.string().nullable(),
  custom_fields: z.record(z.unknown()),
  tags: z.array(z.string()),
  notes: z.string().nullable(),
  campaign_id: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type Lead = z.infer<typeof LeadSchema>;

// ===========================================
// Interaction
// ===========================================

export const InteractionTypeSchema = z.enum([
  'comment',
  'reaction',
  'post_author',
  'profile_visit',
]);
export type InteractionType = z.infer<typeof InteractionTypeSchema>;

export const InteractionClassificationSchema = z.enum([
  'high',
  'medium',
  'low',
  'irrelevant',
]);
export type InteractionClassification = z.infer<typeof InteractionClassificationSchema>;

export const InteractionSchema = z.object({
  id: z.string().min(1),
  organization_id: z.string().min(1),
  post_id: z.string().min(1),
  lead_id: z.string().nullable(),
  type: InteractionTypeSchema,
  content: z.string().nullable(),
  actor_name: z.string(),
  actor_headline: z.string().nullable(),
  actor_profile_url: z.string(),
  profile_type: z.string().nullable(),
  seniority_level: z.string().nullable(),
  role_category: z.string().nullable(),
  classification: InteractionClassificationSchema,
  relevance_score: z.number().int(),
  ai_analysis: z.record(z.unknown()).nullable(),
  raw_data: z.record(z.unknown()),
  created_at: z.string(),
});
export type Interaction = z.infer<typeof InteractionSchema>;

// ===========================================
// Persona
// ===========================================

export const PersonaRulesSchema = z
  .object({
    title_keywords: z.array(z.string().min(1)).optional(),
    title_exclude: z.array(z.string().min(1)).optional(),
    company_size_min: z.number().int().nonnegative().optional(),
    company_size_max: z.number().int().nonnegative().optional(),
    industries: z.array(z.string().min(1)).optional(),
    locations: z.array(z.string().min(1)).optional(),
    seniority_levels: z.array(z.string().min(1)).optional(),
  })
  .strict();
export type PersonaRules = z.infer<typeof PersonaRulesSchema>;

export const PersonaSchema = z.object({
  id: z.string().min(1),
  organization_id: z.string().min(1),
  name: z.string().min(1),
  priority: z.number().int().min(1).max(10),
  score_bonus: z.number().int(),
  is_active: z.boolean(),
  rules: PersonaRulesSchema,
});
export type Persona = z.infer<typeof PersonaSchema>;

// ===========================================
// Scoring Rule
// ===========================================

export const RuleOperatorSchema = z.enum([
  'contains',
  'equals',
  'greater_than',
  'less_than',
  'in',
  'not_in',
  'exists',
  'not_exists',
]);
export type RuleOperator = z.infer<typeof RuleOperatorSchema>;

/** Compiled rule condition, produced once at write time */
export const RuleExpressionSchema = z.discriminatedUnion('operator', [
  z.object({ operator: z.literal('exists'), field: z.string().min(1) }),
  z.object({ operator: z.literal('not_exists'), field: z.string().min(1) }),
  z.object({ operator: z.literal('equals'), field: z.string().min(1), value: z.string() }),
  z.object({ operator: z.literal('contains'), field: z.string().min(1), value: z.string().min(1) }),
  z.object({ operator: z.literal('greater_than'), field: z.string().min(1), value: z.number() }),
  z.object({ operator: z.literal('less_than'), field: z.string().min(1), value: z.number() }),
  z.object({ operator: z.literal('in'), field: z.string().min(1), values: z.array(z.string()) }),
  z.object({ operator: z.literal('not_in'), field: z.string().min(1), values: z.array(z.string()) }),
]);
export type RuleExpression = z.infer<typeof RuleExpressionSchema>;

export const ScoringRuleSchema = z.object({
  id: z.string().min(1),
  organization_id: z.string().min(1),
  name: z.string().min(1),
  expression: RuleExpressionSchema,
  score_delta: z.number().int(),
  priority: z.number().int(),
  is_active: z.boolean(),
});
export type ScoringRule = z.infer<typeof ScoringRuleSchema>;

// ===========================================
// Source Post & Campaign
// ===========================================

export const SourcePostStatusSchema = z.enum(['pending', 'processing', 'completed', 'failed']);
export type SourcePostStatus = z.infer<typeof SourcePostStatusSchema>;

export const PostIntentSchema = z.enum([
  'problem',
  'solution_seeking',
  'discussion',
  'success_story',
  'promotion',
  'question',
  'unknown',
]);
export type PostIntent = z.infer<typeof PostIntentSchema>;

export const ContentAnalysisSchema = z.object({
  intent: PostIntentSchema,
  topics: z.array(z.string()),
  relevance_score: z.number().min(0).max(100),
  summary: z.string(),
});
export type ContentAnalysis = z.infer<typeof ContentAnalysisSchema>;

export const SourcePostSchema = z.object({
  id: z.string().min(1),
  organization_id: z.string().min(1),
  post_url: z.string().min(1),
  status: SourcePostStatusSchema,
  campaign_id: z.string().nullable(),
  persona_id: z.string().nullable(),
  author_name: z.string().nullable(),
  author_profile_url: z.string().nullable(),
  post_text: z.string().nullable(),
  content_analysis: ContentAnalysisSchema.nullable(),
  total_comments: z.number().int().nonnegative(),
  total_likes: z.number().int().nonnegative(),
  leads_created: z.number().int().nonnegative(),
  error_message: z.string().nullable(),
  processed_at: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});
export type SourcePost = z.infer<typeof SourcePostSchema>;

export const CampaignStatusSchema = z.enum(['draft', 'processing', 'active', 'completed', 'failed']);
export type CampaignStatus = z.infer<typeof CampaignStatusSchema>;

export const CampaignSchema = z.object({
  id: z.string().min(1),
  organization_id: z.string().min(1),
  name: z.string().min(1),
  status: CampaignStatusSchema,
  leads_count: z.number().int().nonnegative(),
  updated_at: z.string(),
});
export type Campaign = z.infer<typeof CampaignSchema>;
