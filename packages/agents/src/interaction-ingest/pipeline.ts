/**
 * Interaction Ingestion Pipeline
 *
 * Per source post: fetch detail, comments and reactions; classify the
 * post; evaluate every interacting profile; persist interactions; resolve
 * qualifying ones to leads by canonical profile URL; schedule enrichment;
 * close out the post and its campaign.
 *
 * Post state machine: processing -> completed | failed. A fetch failure
 * marks the post (and campaign) failed and is reported in the result.
 * Classification failures degrade to rule-based results. Any other error
 * marks the post failed and propagates.
 *
 * @module interaction-ingest/pipeline
 */

import {
  LEAD_SOURCES,
  NotFoundError,
  UpstreamFetchError,
  createIngestionTrace,
  endIngestionTrace,
  errorMessage,
  withSpan,
} from '@leadforge/lib';
import type {
  CampaignId,
  Interaction,
  Lead,
  LeadId,
  OrganizationId,
  PersonaId,
  SourcePost,
  SourcePostId,
} from '@leadforge/lib';
import type { LeadDraft, Repositories } from '../repository';
import { clampScore } from '../lead-qualifier/scorer';
import { computeRelevance, DEFAULT_RELEVANCE_THRESHOLDS } from './classifier';
import type { InteractionClassifier, Relevance, RelevanceThresholds } from './classifier';
import { personaDefinitionFrom } from './contracts/profile-evaluation';
import type { PersonaDefinition, ProfileEvaluation } from './contracts/profile-evaluation';
import type { ScraperRecord } from './contracts/scraper';
import type { EnrichmentScheduler } from './enrichment';
import { logger as defaultLogger } from './logger';
import type { IngestLogger } from './logger';
import type { TaskQueue } from './queue';
import { normalizeRecord } from './records';
import type { NormalizedRecord } from './records';
import type { ScraperClient } from './scraper';

// ===========================================
// Types
// ===========================================

/** An existing post, or a URL to register as a new one */
export type PostRef = { postId: SourcePostId } | { postUrl: string; personaId?: PersonaId | null };

export interface IngestionResult {
  post_id: SourcePostId;
  status: 'completed' | 'failed';
  leads_created: number;
  interactions_processed: number;
  records_skipped: number;
  error?: string;
}

export interface IngestionPipelineConfig {
  /** Minimum relevance for lead creation */
  qualificationThreshold: number;
  relevance: RelevanceThresholds;
  autoEnrichEnabled: boolean;
  autoEnrichMinScore: number;
  now: () => Date;
}

export const DEFAULT_INGESTION_CONFIG: IngestionPipelineConfig = {
  qualificationThreshold: 70,
  relevance: DEFAULT_RELEVANCE_THRESHOLDS,
  autoEnrichEnabled: true,
  autoEnrichMinScore: 70,
  now: () => new Date(),
};

export interface IngestionPipelineDeps {
  repositories: Pick<Repositories, 'leads' | 'interactions' | 'personas' | 'posts' | 'campaigns'>;
  scraper: ScraperClient;
  classifier: InteractionClassifier;
  queue: TaskQueue;
  /** Absent or null disables enrichment scheduling */
  enrichment?: EnrichmentScheduler | null;
  logger?: IngestLogger;
}

interface RunContext {
  organizationId: OrganizationId;
  post: SourcePost;
  campaignId: CampaignId | null;
  persona: PersonaDefinition;
  traceId?: string;
}

type RecordOutcome = 'skipped' | 'stored' | 'linked' | 'created';

type ScoredRecord = NormalizedRecord & Relevance & { evaluation: ProfileEvaluation };

// ===========================================
// Pipeline
// ===========================================

export class IngestionPipeline {
  private config: IngestionPipelineConfig;
  private logger: IngestLogger;
  private repos: IngestionPipelineDeps['repositories'];

  constructor(
    private readonly deps: IngestionPipelineDeps,
    config: Partial<IngestionPipelineConfig> = {}
  ) {
    this.config = { ...DEFAULT_INGESTION_CONFIG, ...config };
    this.logger = deps.logger ?? defaultLogger;
    this.repos = deps.repositories;
  }

  /**
   * Dispatch one post's workflow to the task queue; returns the task id
   * without waiting for it
   */
  scheduleIngestion(organizationId: OrganizationId, ref: PostRef, campaignId?: CampaignId | null): string {
    const name = 'postId' in ref ? `ingest:${ref.postId}` : `ingest:${ref.postUrl}`;
    return this.deps.queue.enqueue(name, () => this.ingestInteractions(organizationId, ref, campaignId));
  }

  /**
   * Run the full workflow for one post
   *
   * @throws NotFoundError when `ref.postId` does not exist
   */
  async ingestInteractions(
    organizationId: OrganizationId,
    ref: PostRef,
    campaignId?: CampaignId | null
  ): Promise<IngestionResult> {
    const startTime = Date.now();
    const registered = await this.resolvePost(organizationId, ref, campaignId ?? null);
    const activeCampaign = campaignId ?? registered.campaign_id;

    if (activeCampaign) {
      await this.repos.campaigns.setStatus(organizationId, activeCampaign, 'processing');
    }
    const post = await this.repos.posts.update(organizationId, registered.id, {
      status: 'processing',
      error_message: null,
    });

    this.logger.ingestionStarted({
      organization_id: organizationId,
      post_id: post.id,
      post_url: post.post_url,
      campaign_id: activeCampaign,
    });
    const trace = createIngestionTrace({
      organizationId,
      postId: post.id,
      postUrl: post.post_url,
      campaignId: activeCampaign,
    });

    const counters = { leads_created: 0, interactions_processed: 0, records_skipped: 0 };

    try {
      const traceId = trace?.traceId;
      const { scraper } = this.deps;
      const detail = await withSpan('fetch_post_detail', traceId, () => scraper.fetchPostDetail(post.post_url));
      const comments = await withSpan('fetch_comments', traceId, () => scraper.fetchComments(post.post_url));
      const reactions = await withSpan('fetch_reactions', traceId, () => scraper.fetchReactions(post.post_url));

      const analysis = await this.deps.classifier.analyzePost(detail.text, trace?.traceId);
      await this.repos.posts.update(organizationId, post.id, {
        author_name: detail.author_name,
        author_profile_url: detail.author_profile_url,
        post_text: detail.text,
        content_analysis: analysis,
      });

      const persona = post.persona_id ? await this.repos.personas.get(organizationId, post.persona_id) : null;
      const context: RunContext = {
        organizationId,
        post,
        campaignId: activeCampaign,
        persona: personaDefinitionFrom(persona),
        traceId: trace?.traceId,
      };

      for (const raw of [...comments, ...reactions]) {
        const outcome = await this.processRecord(context, raw);
        if (outcome === 'skipped') {
          counters.records_skipped++;
          continue;
        }
        counters.interactions_processed++;
        if (outcome === 'created') counters.leads_created++;
      }

      await this.repos.posts.update(organizationId, post.id, {
        status: 'completed',
        total_comments: comments.length,
        total_likes: reactions.length,
        leads_created: counters.leads_created,
        processed_at: this.config.now().toISOString(),
      });
      if (activeCampaign) {
        await this.repos.campaigns.recordLeads(organizationId, activeCampaign, counters.leads_created);
      }
    } catch (error) {
      const message = errorMessage(error);
      await this.markFailed(organizationId, post.id, activeCampaign, message);
      this.logger.ingestionFailed({
        organization_id: organizationId,
        post_id: post.id,
        step: error instanceof UpstreamFetchError ? error.step : 'process_interactions',
        error_message: message,
      });
      if (trace) {
        endIngestionTrace(trace.traceId, {
          status: 'failed',
          leadsCreated: counters.leads_created,
          interactionsProcessed: counters.interactions_processed,
          recordsSkipped: counters.records_skipped,
          error: message,
          processingTimeMs: Date.now() - startTime,
        });
      }

      if (error instanceof UpstreamFetchError) {
        return { post_id: post.id, status: 'failed', ...counters, error: message };
      }
      throw error;
    }

    const processingTimeMs = Date.now() - startTime;
    this.logger.ingestionCompleted({
      organization_id: organizationId,
      post_id: post.id,
      ...counters,
      processing_time_ms: processingTimeMs,
    });
    if (trace) {
      endIngestionTrace(trace.traceId, {
        status: 'completed',
        leadsCreated: counters.leads_created,
        interactionsProcessed: counters.interactions_processed,
        recordsSkipped: counters.records_skipped,
        processingTimeMs,
      });
    }

    return { post_id: post.id, status: 'completed', ...counters };
  }

  // ===========================================
  // Steps
  // ===========================================

  private async resolvePost(
    organizationId: OrganizationId,
    ref: PostRef,
    campaignId: CampaignId | null
  ): Promise<SourcePost> {
    if ('postId' in ref) {
      const post = await this.repos.posts.get(organizationId, ref.postId);
      if (!post) throw new NotFoundError('SourcePost', ref.postId);
      return post;
    }
    return this.repos.posts.create(organizationId, {
      post_url: ref.postUrl,
      persona_id: ref.personaId ?? null,
      campaign_id: campaignId,
    });
  }

  private async processRecord(context: RunContext, raw: ScraperRecord): Promise<RecordOutcome> {
    const normalized = normalizeRecord(raw);
    if (!normalized.ok) {
      this.logger.recordSkipped({ post_id: context.post.id, reason: normalized.reason });
      return 'skipped';
    }

    const { record } = normalized;
    const evaluation = await this.deps.classifier.evaluateProfile(
      { name: record.name, headline: record.headline, comment: record.content },
      context.persona,
      context.traceId
    );
    const relevance = computeRelevance(record.type, evaluation, this.config.relevance);
    const scored: ScoredRecord = { ...record, evaluation, ...relevance };

    if (relevance.classification === 'irrelevant' || relevance.relevance_score < this.config.qualificationThreshold) {
      await this.storeInteraction(context, scored, null);
      return 'stored';
    }

    return this.resolveLead(context, scored);
  }

  private storeInteraction(context: RunContext, scored: ScoredRecord, leadId: LeadId | null): Promise<Interaction> {
    return this.repos.interactions.create(context.organizationId, {
      post_id: context.post.id,
      lead_id: leadId,
      type: scored.type,
      content: scored.content,
      actor_name: scored.name,
      actor_headline: scored.headline,
      actor_profile_url: scored.profile_url,
      profile_type: scored.evaluation.profile_type,
      seniority_level: scored.evaluation.seniority_level,
      role_category: scored.evaluation.role_category,
      classification: scored.classification,
      relevance_score: scored.relevance_score,
      ai_analysis: { ...scored.evaluation },
      raw_data: scored.raw,
    });
  }

  /**
   * Get-or-create the lead for a qualifying record, then store the
   * interaction already linked to it. A lead this post discovered on an
   * earlier run that never got its interaction is completed as new.
   */
  private async resolveLead(context: RunContext, scored: ScoredRecord): Promise<RecordOutcome> {
    const { organizationId } = context;
    const draft: LeadDraft = {
      name: scored.name,
      profile_url: scored.profile_url,
      title: scored.headline,
      status: 'new',
      source: LEAD_SOURCES.postAnalysis,
      enrichment_status: 'pending',
      score: clampScore(scored.relevance_score),
      tags: ['ai_discovered', scored.classification, scored.type],
      custom_fields: {
        discovered_from_post: context.post.id,
        interaction_type: scored.type,
        ai_insights: { ...scored.evaluation },
      },
      campaign_id: context.campaignId,
    };

    const resolved = await this.repos.leads.getOrCreateByProfileUrl(organizationId, draft);
    const { lead } = resolved;
    const created = resolved.created || (await this.isUnlinkedDiscovery(context, lead));
    const interaction = await this.storeInteraction(context, scored, lead.id);

    if (!created) {
      this.logger.leadLinked({ organization_id: organizationId, lead_id: lead.id, interaction_id: interaction.id });
      return 'linked';
    }

    this.logger.leadCreated({
      organization_id: organizationId,
      lead_id: lead.id,
      interaction_id: interaction.id,
      relevance_score: scored.relevance_score,
    });

    const enrichment = this.deps.enrichment;
    if (enrichment && this.config.autoEnrichEnabled && lead.score >= this.config.autoEnrichMinScore) {
      enrichment.schedule(organizationId, lead);
    }
    return 'created';
  }

  private async isUnlinkedDiscovery(context: RunContext, lead: Lead): Promise<boolean> {
    if (lead.custom_fields.discovered_from_post !== context.post.id) return false;
    const linked = await this.repos.interactions.listByLead(context.organizationId, lead.id);
    return linked.length === 0;
  }

  private async markFailed(
    organizationId: OrganizationId,
    postId: SourcePostId,
    campaignId: CampaignId | null,
    message: string
  ): Promise<void> {
    await this.repos.posts.update(organizationId, postId, {
      status: 'failed',
      error_message: message,
      processed_at: this.config.now().toISOString(),
    });
    if (campaignId) {
      await this.repos.campaigns.setStatus(organizationId, campaignId, 'failed');
    }
  }
}

export function createIngestionPipeline(
  deps: IngestionPipelineDeps,
  config?: Partial<IngestionPipelineConfig>
): IngestionPipeline {
  return new IngestionPipeline(deps, config);
}
