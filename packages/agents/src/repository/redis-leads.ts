/**
 * Redis Lead Repository
 *
 * Leads stored as JSON under `leadforge:{org}:lead:{id}`, indexed by a set
 * per organization. Get-or-create claims the dedup key
 * `leadforge:{org}:lead-url:{sha256(url)}` with SET NX: the lead body is
 * written first, the claim second, and a writer that loses the claim
 * deletes its body and returns the winner's lead.
 *
 * @module repository/redis-leads
 */

import {
  NotFoundError,
  TenantAccessError,
  ValidationError,
  hashProfileUrl,
  leadDedupKey,
  leadIndexKey,
  leadKey,
} from '@leadforge/lib';
import type { Lead, OrganizationId, RedisStore } from '@leadforge/lib';
import {
  applyLeadPatch,
  buildLead,
  draftProfileUrl,
  generateId,
  mergeDraftIntoPatch,
  validateLead,
} from './lead-records';
import type {
  GetOrCreateResult,
  LeadDraft,
  LeadListOptions,
  LeadPatch,
  LeadRepository,
} from './types';

export interface RedisLeadRepositoryOptions {
  now?: () => Date;
}

export class RedisLeadRepository implements LeadRepository {
  private now: () => Date;

  constructor(
    private readonly redis: RedisStore,
    options: RedisLeadRepositoryOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
  }

  // ===========================================
  // Reads
  // ===========================================

  async get(organizationId: OrganizationId, leadId: string): Promise<Lead | null> {
    const raw = await this.redis.get(leadKey(organizationId, leadId));
    if (raw === null || raw === undefined) return null;

    const lead = validateLead(raw);
    if (lead.organization_id !== organizationId) {
      throw new TenantAccessError('Lead', leadId, organizationId);
    }
    return lead;
  }

  async findByProfileUrl(organizationId: OrganizationId, profileUrl: string): Promise<Lead | null> {
    const canonical = draftProfileUrl({ name: '', profile_url: profileUrl });
    if (!canonical) return null;

    const id = await this.redis.get(leadDedupKey(organizationId, hashProfileUrl(canonical)));
    return typeof id === 'string' ? this.get(organizationId, id) : null;
  }

  async list(organizationId: OrganizationId, options: LeadListOptions = {}): Promise<Lead[]> {
    const ids = options.ids ?? (await this.redis.smembers(leadIndexKey(organizationId)));
    const bounded = options.limit !== undefined ? ids.slice(0, options.limit) : ids;
    const leads = await Promise.all(bounded.map((id) => this.get(organizationId, id)));
    return leads.filter((lead): lead is Lead => lead !== null);
  }

  // ===========================================
  // Writes
  // ===========================================

  async getOrCreateByProfileUrl(organizationId: OrganizationId, draft: LeadDraft): Promise<GetOrCreateResult> {
    const canonical = draftProfileUrl(draft);
    if (!canonical) {
      throw new ValidationError('A valid profile URL is required', { profile_url: draft.profile_url });
    }
    const dedupKey = leadDedupKey(organizationId, hashProfileUrl(canonical));

    const existing = await this.resolveClaim(organizationId, dedupKey);
    if (existing) {
      return { lead: existing, created: false };
    }

    const lead = buildLead(organizationId, generateId('lead'), draft, this.now().toISOString());
    await this.redis.set(leadKey(organizationId, lead.id), lead);

    const claimed = await this.redis.set(dedupKey, lead.id, { nx: true });
    if (claimed !== null) {
      await this.redis.sadd(leadIndexKey(organizationId), lead.id);
      return { lead, created: true };
    }

    // Another writer claimed the URL between our read and our claim
    await this.redis.del(leadKey(organizationId, lead.id));
    const winner = await this.resolveClaim(organizationId, dedupKey);
    if (!winner) {
      throw new NotFoundError('Lead', dedupKey);
    }
    return { lead: winner, created: false };
  }

  async create(organizationId: OrganizationId, draft: LeadDraft): Promise<Lead> {
    if (draftProfileUrl(draft)) {
      const { lead, created } = await this.getOrCreateByProfileUrl(organizationId, draft);
      return created ? lead : this.update(organizationId, lead.id, mergeDraftIntoPatch(lead, draft));
    }

    const lead = buildLead(organizationId, generateId('lead'), draft, this.now().toISOString());
    await this.redis.set(leadKey(organizationId, lead.id), lead);
    await this.redis.sadd(leadIndexKey(organizationId), lead.id);
    return lead;
  }

  async update(organizationId: OrganizationId, leadId: string, patch: LeadPatch): Promise<Lead> {
    const existing = await this.get(organizationId, leadId);
    if (!existing) {
      throw new NotFoundError('Lead', leadId);
    }
    const updated = applyLeadPatch(existing, patch, this.now().toISOString());
    await this.redis.set(leadKey(organizationId, leadId), updated);
    return updated;
  }

  private async resolveClaim(organizationId: OrganizationId, dedupKey: string): Promise<Lead | null> {
    const id = await this.redis.get(dedupKey);
    return typeof id === 'string' ? this.get(organizationId, id) : null;
  }
}
