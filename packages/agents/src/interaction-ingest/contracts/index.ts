/**
 * Interaction Ingest Contracts
 *
 * @module interaction-ingest/contracts
 */

export {
  ProfileEvaluationSchema,
  ProfileTypeSchema,
  RoleCategorySchema,
  CommentIntentSchema,
  EMPTY_PERSONA_DEFINITION,
  personaDefinitionFrom,
} from './profile-evaluation';
export type { ProfileEvaluation, PersonaDefinition, RoleCategory, CommentIntent } from './profile-evaluation';

export { ContentAnalysisOutputSchema, FALLBACK_CONTENT_ANALYSIS } from './content-analysis';
export type { ContentAnalysisOutput } from './content-analysis';

export {
  ScraperRecordSchema,
  PROFILE_URL_KEYS,
  NAME_KEYS,
  HEADLINE_KEYS,
  CONTENT_KEYS,
} from './scraper';
export type { ScraperRecord, ScraperJobKind, ScraperJobSpec, ScraperProvider, PostDetail } from './scraper';
