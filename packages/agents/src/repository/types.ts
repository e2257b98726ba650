/**
 * Persistence Contracts
 *
 * Every operation takes the organization id explicitly. Implementations
 * throw TenantAccessError when an id resolves to another organization's
 * entity; they never return it.
 *
 * @module repository/types
 */

import type {
  Campaign,
  CampaignId,
  CampaignStatus,
  Interaction,
  InteractionId,
  Lead,
  LeadId,
  OrganizationId,
  Persona,
  ScoringRule,
  SourcePost,
  SourcePostId,
} from '@leadforge/lib';

// ===========================================
// Drafts & Patches
// ===========================================

type LeadSystemFields = 'id' | 'organization_id' | 'created_at' | 'updated_at';

/** Fields accepted when creating a lead; everything but the name defaults */
export type LeadDraft = Partial<Omit<Lead, LeadSystemFields>> & { name: string };

/** The profile URL is the dedup key and cannot be patched */
export type LeadPatch = Partial<Omit<Lead, LeadSystemFields | 'profile_url'>>;

export type InteractionDraft = Omit<Interaction, 'id' | 'organization_id' | 'created_at'>;

export type SourcePostDraft = Pick<SourcePost, 'post_url'> &
  Partial<Pick<SourcePost, 'campaign_id' | 'persona_id'>>;

export type SourcePostPatch = Partial<Omit<SourcePost, 'id' | 'organization_id' | 'created_at' | 'updated_at'>>;

export interface LeadListOptions {
  /** Restrict to these ids (ids from other tenants are rejected) */
  ids?: LeadId[];
  /** Upper bound on the number of leads returned */
  limit?: number;
}

export interface GetOrCreateResult {
  lead: Lead;
  created: boolean;
}

// ===========================================
// Repositories
// ===========================================

export interface LeadRepository {
  get(organizationId: OrganizationId, leadId: LeadId): Promise<Lead | null>;
  findByProfileUrl(organizationId: OrganizationId, profileUrl: string): Promise<Lead | null>;
  list(organizationId: OrganizationId, options?: LeadListOptions): Promise<Lead[]>;
  /**
   * Atomic get-or-create keyed by (organization, canonical profile URL).
   * Concurrent calls for the same key resolve to one lead.
   */
  getOrCreateByProfileUrl(organizationId: OrganizationId, draft: LeadDraft): Promise<GetOrCreateResult>;
  /**
   * Insert a lead. A draft whose profile URL already exists updates that
   * lead instead of inserting a duplicate.
   */
  create(organizationId: OrganizationId, draft: LeadDraft): Promise<Lead>;
  update(organizationId: OrganizationId, leadId: LeadId, patch: LeadPatch): Promise<Lead>;
}

export interface InteractionRepository {
  create(organizationId: OrganizationId, draft: InteractionDraft): Promise<Interaction>;
  get(organizationId: OrganizationId, interactionId: InteractionId): Promise<Interaction | null>;
  listByPost(organizationId: OrganizationId, postId: SourcePostId): Promise<Interaction[]>;
  listByLead(organizationId: OrganizationId, leadId: LeadId): Promise<Interaction[]>;
}

export interface PersonaRepository {
  get(organizationId: OrganizationId, personaId: string): Promise<Persona | null>;
  /** Active personas, highest priority first */
  listActive(organizationId: OrganizationId): Promise<Persona[]>;
  save(organizationId: OrganizationId, persona: Persona): Promise<Persona>;
}

export interface ScoringRuleRepository {
  /** Active rules in descending priority order */
  listActive(organizationId: OrganizationId): Promise<ScoringRule[]>;
  save(organizationId: OrganizationId, rule: ScoringRule): Promise<ScoringRule>;
}

export interface SourcePostRepository {
  create(organizationId: OrganizationId, draft: SourcePostDraft): Promise<SourcePost>;
  get(organizationId: OrganizationId, postId: SourcePostId): Promise<SourcePost | null>;
  update(organizationId: OrganizationId, postId: SourcePostId, patch: SourcePostPatch): Promise<SourcePost>;
}

export interface CampaignRepository {
  get(organizationId: OrganizationId, campaignId: CampaignId): Promise<Campaign | null>;
  save(organizationId: OrganizationId, campaign: Campaign): Promise<Campaign>;
  setStatus(organizationId: OrganizationId, campaignId: CampaignId, status: CampaignStatus): Promise<Campaign>;
  /**
   * Add to leads_count and move the campaign to `active` unless it is
   * already `completed`. Applied as one write.
   */
  recordLeads(organizationId: OrganizationId, campaignId: CampaignId, created: number): Promise<Campaign>;
}

/** The persistence collaborators the pipeline consumes */
export interface Repositories {
  leads: LeadRepository;
  interactions: InteractionRepository;
  personas: PersonaRepository;
  scoringRules: ScoringRuleRepository;
  posts: SourcePostRepository;
  campaigns: CampaignRepository;
}
