/**
 * In-Memory Repositories
 *
 * Process-local implementations of the persistence contracts. Every
 * check-and-set runs without an intervening await, so get-or-create by
 * profile URL is atomic within the process. Records are cloned on the way
 * in and out so callers never hold live references.
 *
 * @module repository/memory
 */

import { NotFoundError, TenantAccessError, ValidationError } from '@leadforge/lib';
import type {
  Campaign,
  CampaignStatus,
  Interaction,
  Lead,
  OrganizationId,
  Persona,
  ScoringRule,
  SourcePost,
} from '@leadforge/lib';
import {
  applyLeadPatch,
  buildLead,
  draftProfileUrl,
  generateId,
  mergeDraftIntoPatch,
} from './lead-records';
import type {
  CampaignRepository,
  GetOrCreateResult,
  InteractionDraft,
  InteractionRepository,
  LeadDraft,
  LeadListOptions,
  LeadPatch,
  LeadRepository,
  PersonaRepository,
  Repositories,
  ScoringRuleRepository,
  SourcePostDraft,
  SourcePostPatch,
  SourcePostRepository,
} from './types';

export interface InMemoryRepositoryOptions {
  now?: () => Date;
}

// ===========================================
// Tenant-Scoped Store
// ===========================================

interface TenantOwned {
  id: string;
  organization_id: OrganizationId;
}

class TenantScopedStore<T extends TenantOwned> {
  private records = new Map<string, T>();

  constructor(private readonly resource: string) {}

  get(organizationId: OrganizationId, id: string): T | null {
    const record = this.records.get(id);
    if (!record) return null;
    if (record.organization_id !== organizationId) {
      throw new TenantAccessError(this.resource, id, organizationId);
    }
    return structuredClone(record);
  }

  require(organizationId: OrganizationId, id: string): T {
    const record = this.get(organizationId, id);
    if (!record) {
      throw new NotFoundError(this.resource, id);
    }
    return record;
  }

  put(organizationId: OrganizationId, record: T): T {
    if (record.organization_id !== organizationId) {
      throw new TenantAccessError(this.resource, record.id, organizationId);
    }
    const existing = this.records.get(record.id);
    if (existing && existing.organization_id !== organizationId) {
      throw new TenantAccessError(this.resource, record.id, organizationId);
    }
    this.records.set(record.id, structuredClone(record));
    return structuredClone(record);
  }

  list(organizationId: OrganizationId): T[] {
    return [...this.records.values()]
      .filter((record) => record.organization_id === organizationId)
      .map((record) => structuredClone(record));
  }
}

// ===========================================
// Leads
// ===========================================

export class InMemoryLeadRepository implements LeadRepository {
  private store = new TenantScopedStore<Lead>('Lead');
  private byProfileUrl = new Map<string, string>();
  private now: () => Date;

  constructor(options: InMemoryRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  private dedupKey(organizationId: OrganizationId, profileUrl: string): string {
    return `${organizationId}\u0000${profileUrl}`;
  }

  async get(organizationId: OrganizationId, leadId: string): Promise<Lead | null> {
    return this.store.get(organizationId, leadId);
  }

  async findByProfileUrl(organizationId: OrganizationId, profileUrl: string): Promise<Lead | null> {
    const canonical = draftProfileUrl({ name: '', profile_url: profileUrl });
    if (!canonical) return null;
    const id = this.byProfileUrl.get(this.dedupKey(organizationId, canonical));
    return id ? this.store.get(organizationId, id) : null;
  }

  async list(organizationId: OrganizationId, options: LeadListOptions = {}): Promise<Lead[]> {
    const leads = options.ids
      ? options.ids
          .map((id) => this.store.get(organizationId, id))
          .filter((lead): lead is Lead => lead !== null)
      : this.store.list(organizationId);
    return options.limit !== undefined ? leads.slice(0, options.limit) : leads;
  }

  async getOrCreateByProfileUrl(organizationId: OrganizationId, draft: LeadDraft): Promise<GetOrCreateResult> {
    const canonical = draftProfileUrl(draft);
    if (!canonical) {
      throw new ValidationError('A valid profile URL is required', { profile_url: draft.profile_url });
    }

    const key = this.dedupKey(organizationId, canonical);
    const existingId = this.byProfileUrl.get(key);
    if (existingId) {
      return { lead: this.store.require(organizationId, existingId), created: false };
    }

    const lead = buildLead(organizationId, generateId('lead'), draft, this.now().toISOString());
    this.byProfileUrl.set(key, lead.id);
    return { lead: this.store.put(organizationId, lead), created: true };
  }

  async create(organizationId: OrganizationId, draft: LeadDraft): Promise<Lead> {
    if (draftProfileUrl(draft)) {
      const { lead, created } = await this.getOrCreateByProfileUrl(organizationId, draft);
      return created ? lead : this.update(organizationId, lead.id, mergeDraftIntoPatch(lead, draft));
    }
    const lead = buildLead(organizationId, generateId('lead'), draft, this.now().toISOString());
    return this.store.put(organizationId, lead);
  }

  async update(organizationId: OrganizationId, leadId: string, patch: LeadPatch): Promise<Lead> {
    const existing = this.store.require(organizationId, leadId);
    const updated = applyLeadPatch(existing, patch, this.now().toISOString());
    return this.store.put(organizationId, updated);
  }
}

// ===========================================
// Interactions
// ===========================================

export class InMemoryInteractionRepository implements InteractionRepository {
  private store = new TenantScopedStore<Interaction>('Interaction');
  private now: () => Date;

  constructor(options: InMemoryRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async create(organizationId: OrganizationId, draft: InteractionDraft): Promise<Interaction> {
    return this.store.put(organizationId, {
      ...draft,
      id: generateId('int'),
      organization_id: organizationId,
      created_at: this.now().toISOString(),
    });
  }

  async get(organizationId: OrganizationId, interactionId: string): Promise<Interaction | null> {
    return this.store.get(organizationId, interactionId);
  }

  async listByPost(organizationId: OrganizationId, postId: string): Promise<Interaction[]> {
    return this.store.list(organizationId).filter((i) => i.post_id === postId);
  }

  async listByLead(organizationId: OrganizationId, leadId: string): Promise<Interaction[]> {
    return this.store.list(organizationId).filter((i) => i.lead_id === leadId);
  }
}

// ===========================================
// Personas & Scoring Rules
// ===========================================

export class InMemoryPersonaRepository implements PersonaRepository {
  private store = new TenantScopedStore<Persona>('Persona');

  async get(organizationId: OrganizationId, personaId: string): Promise<Persona | null> {
    return this.store.get(organizationId, personaId);
  }

  async listActive(organizationId: OrganizationId): Promise<Persona[]> {
    return this.store
      .list(organizationId)
      .filter((p) => p.is_active)
      .sort((a, b) => b.priority - a.priority);
  }

  async save(organizationId: OrganizationId, persona: Persona): Promise<Persona> {
    return this.store.put(organizationId, persona);
  }
}

export class InMemoryScoringRuleRepository implements ScoringRuleRepository {
  private store = new TenantScopedStore<ScoringRule>('ScoringRule');

  async listActive(organizationId: OrganizationId): Promise<ScoringRule[]> {
    return this.store
      .list(organizationId)
      .filter((r) => r.is_active)
      .sort((a, b) => b.priority - a.priority);
  }

  async save(organizationId: OrganizationId, rule: ScoringRule): Promise<ScoringRule> {
    return this.store.put(organizationId, rule);
  }
}

// ===========================================
// Source Posts & Campaigns
// ===========================================

export class InMemorySourcePostRepository implements SourcePostRepository {
  private store = new TenantScopedStore<SourcePost>('SourcePost');
  private now: () => Date;

  constructor(options: InMemoryRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async create(organizationId: OrganizationId, draft: SourcePostDraft): Promise<SourcePost> {
    const now = this.now().toISOString();
    return this.store.put(organizationId, {
      id: generateId('post'),
      organization_id: organizationId,
      post_url: draft.post_url,
      status: 'pending',
      campaign_id: draft.campaign_id ?? null,
      persona_id: draft.persona_id ?? null,
      author_name: null,
      author_profile_url: null,
      post_text: null,
      content_analysis: null,
      total_comments: 0,
      total_likes: 0,
      leads_created: 0,
      error_message: null,
      processed_at: null,
      created_at: now,
      updated_at: now,
    });
  }

  async get(organizationId: OrganizationId, postId: string): Promise<SourcePost | null> {
    return this.store.get(organizationId, postId);
  }

  async update(organizationId: OrganizationId, postId: string, patch: SourcePostPatch): Promise<SourcePost> {
    const existing = this.store.require(organizationId, postId);
    return this.store.put(organizationId, {
      ...existing,
      ...patch,
      updated_at: this.now().toISOString(),
    });
  }
}

export class InMemoryCampaignRepository implements CampaignRepository {
  private store = new TenantScopedStore<Campaign>('Campaign');
  private now: () => Date;

  constructor(options: InMemoryRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async get(organizationId: OrganizationId, campaignId: string): Promise<Campaign | null> {
    return this.store.get(organizationId, campaignId);
  }

  async save(organizationId: OrganizationId, campaign: Campaign): Promise<Campaign> {
    return this.store.put(organizationId, campaign);
  }

  async setStatus(organizationId: OrganizationId, campaignId: string, status: CampaignStatus): Promise<Campaign> {
    const campaign = this.store.require(organizationId, campaignId);
    return this.store.put(organizationId, {
      ...campaign,
      status,
      updated_at: this.now().toISOString(),
    });
  }

  async recordLeads(organizationId: OrganizationId, campaignId: string, created: number): Promise<Campaign> {
    const campaign = this.store.require(organizationId, campaignId);
    return this.store.put(organizationId, {
      ...campaign,
      leads_count: campaign.leads_count + created,
      status: campaign.status === 'completed' ? 'completed' : 'active',
      updated_at: this.now().toISOString(),
    });
  }
}

// ===========================================
// Factory
// ===========================================

export function createInMemoryRepositories(options: InMemoryRepositoryOptions = {}): Repositories {
  return {
    leads: new InMemoryLeadRepository(options),
    interactions: new InMemoryInteractionRepository(options),
    personas: new InMemoryPersonaRepository(),
    scoringRules: new InMemoryScoringRuleRepository(),
    posts: new InMemorySourcePostRepository(options),
    campaigns: new InMemoryCampaignRepository(options),
  };
}
