/**
 * Persistence boundary: contracts plus in-memory and Redis implementations.
 *
 * @module repository
 */

export type {
  LeadRepository,
  InteractionRepository,
  PersonaRepository,
  ScoringRuleRepository,
  SourcePostRepository,
  CampaignRepository,
  Repositories,
  LeadDraft,
  LeadPatch,
  InteractionDraft,
  SourcePostDraft,
  SourcePostPatch,
  LeadListOptions,
  GetOrCreateResult,
} from './types';

export {
  InMemoryLeadRepository,
  InMemoryInteractionRepository,
  InMemoryPersonaRepository,
  InMemoryScoringRuleRepository,
  InMemorySourcePostRepository,
  InMemoryCampaignRepository,
  createInMemoryRepositories,
} from './memory';
export type { InMemoryRepositoryOptions } from './memory';

export { RedisLeadRepository } from './redis-leads';
export type { RedisLeadRepositoryOptions } from './redis-leads';

export { buildLead, validateLead, generateId } from './lead-records';
