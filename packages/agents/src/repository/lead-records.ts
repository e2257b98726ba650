/**
 * Lead record construction and validation shared by the repository
 * implementations.
 *
 * @module repository/lead-records
 */

import { randomUUID } from 'node:crypto';
import {
  LeadSchema,
  ValidationError,
  canonicalizeProfileUrl,
  formatZodError,
} from '@leadforge/lib';
import type { Lead, OrganizationId } from '@leadforge/lib';
import type { LeadDraft, LeadPatch } from './types';

export function generateId(prefix: string): string {
  return `${prefix}_${randomUUID()}`;
}

/**
 * Validate a lead against the entity schema (score bounds included)
 *
 * @throws ValidationError
 */
export function validateLead(candidate: unknown): Lead {
  const parsed = LeadSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ValidationError('Invalid lead record', { fields: formatZodError(parsed.error) });
  }
  return parsed.data;
}

/**
 * Build a complete lead from a draft, filling defaults
 */
export function buildLead(
  organizationId: OrganizationId,
  id: string,
  draft: LeadDraft,
  now: string
): Lead {
  return validateLead({
    title: null,
    company: null,
    location: null,
    email: null,
    phone: null,
    company_size: null,
    company_industry: null,
    company_website: null,
    score: 0,
    status: 'new',
    source: 'manual',
    is_email_verified: false,
    enrichment_status: 'pending',
    enriched_at: null,
    custom_fields: {},
    tags: [],
    notes: null,
    campaign_id: null,
    ...draft,
    profile_url: canonicalizeProfileUrl(draft.profile_url),
    id,
    organization_id: organizationId,
    created_at: now,
    updated_at: now,
  });
}

/**
 * Canonical dedup key of a draft, or null when it has no usable URL
 */
export function draftProfileUrl(draft: LeadDraft): string | null {
  return canonicalizeProfileUrl(draft.profile_url);
}

/**
 * Patch that folds a second observation of a lead into the stored one:
 * non-null draft fields win, tags and custom fields merge.
 */
export function mergeDraftIntoPatch(existing: Lead, draft: LeadDraft): LeadPatch {
  const patch: LeadPatch = {};
  const { profile_url: _dedupKey, tags, custom_fields, ...fields } = draft;

  for (const [key, value] of Object.entries(fields)) {
    if (value !== null && value !== undefined) {
      Object.assign(patch, { [key]: value });
    }
  }

  if (tags) {
    patch.tags = [...new Set([...existing.tags, ...tags])];
  }
  if (custom_fields) {
    patch.custom_fields = { ...existing.custom_fields, ...custom_fields };
  }

  return patch;
}

/**
 * Apply a patch and re-validate
 */
export function applyLeadPatch(existing: Lead, patch: LeadPatch, now: string): Lead {
  return validateLead({
    ...existing,
    ...patch,
    id: existing.id,
    organization_id: existing.organization_id,
    profile_url: existing.profile_url,
    updated_at: now,
  });
}
