/**
 * Lead Enrichment
 *
 * Contact enrichment runs as a background task after lead creation. Success
 * merges the returned fields into the lead and marks it `enriched`; failure
 * marks it `failed` and changes nothing else.
 *
 * @module interaction-ingest/enrichment
 */

import { errorMessage } from '@leadforge/lib';
import type { Lead, OrganizationId } from '@leadforge/lib';
import type { LeadPatch, LeadRepository } from '../repository';
import { logger as defaultLogger } from './logger';
import type { IngestLogger } from './logger';
import type { TaskQueue } from './queue';

// ===========================================
// Provider
// ===========================================

export interface EnrichmentResult {
  email?: string;
  phone?: string;
  company_size?: string;
  company_industry?: string;
  /** 0-1 */
  confidence: number;
}

export interface EnrichmentProvider {
  enrich(profileUrl: string): Promise<EnrichmentResult>;
}

/**
 * Placeholder provider: fails for URLs containing "error", otherwise
 * derives an address from the last URL segment
 */
export class MockEnrichmentProvider implements EnrichmentProvider {
  async enrich(profileUrl: string): Promise<EnrichmentResult> {
    if (profileUrl.includes('error')) {
      throw new Error('Enrichment failed');
    }
    const handle = profileUrl.split('/').pop() || 'company';
    return {
      email: `contact@${handle}.com`,
      company_size: '50-200',
      confidence: 0.8,
    };
  }
}

// ===========================================
// Scheduler
// ===========================================

export interface EnrichmentSchedulerDeps {
  provider: EnrichmentProvider;
  leads: LeadRepository;
  queue: TaskQueue;
  logger?: IngestLogger;
  now?: () => Date;
}

export class EnrichmentScheduler {
  private logger: IngestLogger;
  private now: () => Date;

  constructor(private readonly deps: EnrichmentSchedulerDeps) {
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Queue enrichment for a lead and return the task id
   */
  schedule(organizationId: OrganizationId, lead: Lead): string {
    const taskId = this.deps.queue.enqueue(`enrich:${lead.id}`, () => this.enrichLead(organizationId, lead));
    this.logger.enrichmentScheduled({ organization_id: organizationId, lead_id: lead.id, task_id: taskId });
    return taskId;
  }

  /**
   * Enrich one lead now. Provider failures are recorded on the lead, not thrown.
   */
  async enrichLead(organizationId: OrganizationId, lead: Lead): Promise<Lead> {
    if (!lead.profile_url) {
      return this.markFailed(organizationId, lead, 'lead has no profile URL');
    }

    let result: EnrichmentResult;
    try {
      result = await this.deps.provider.enrich(lead.profile_url);
    } catch (error) {
      return this.markFailed(organizationId, lead, errorMessage(error));
    }

    const patch: LeadPatch = {
      enrichment_status: 'enriched',
      enriched_at: this.now().toISOString(),
    };
    if (result.email) patch.email = result.email;
    if (result.phone) patch.phone = result.phone;
    if (result.company_size) patch.company_size = result.company_size;
    if (result.company_industry) patch.company_industry = result.company_industry;

    const updated = await this.deps.leads.update(organizationId, lead.id, patch);
    this.logger.enrichmentCompleted({
      organization_id: organizationId,
      lead_id: lead.id,
      confidence: result.confidence,
    });
    return updated;
  }

  private async markFailed(organizationId: OrganizationId, lead: Lead, message: string): Promise<Lead> {
    const updated = await this.deps.leads.update(organizationId, lead.id, { enrichment_status: 'failed' });
    this.logger.enrichmentFailed({ organization_id: organizationId, lead_id: lead.id, error_message: message });
    return updated;
  }
}

export function createEnrichmentScheduler(deps: EnrichmentSchedulerDeps): EnrichmentScheduler {
  return new EnrichmentScheduler(deps);
}
