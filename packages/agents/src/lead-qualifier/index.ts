/**
 * Lead Qualifier
 *
 * Rule evaluation, persona matching, deterministic and AI scoring, and the
 * orchestrator that persists scores.
 *
 * @module lead-qualifier
 */

export { ScoringOrchestrator, createScoringOrchestrator, formatScoreNote, DEFAULT_ORCHESTRATOR_CONFIG } from './orchestrator';
export type { ScoringOrchestratorConfig, ScoringOrchestratorDeps, RecalculationResult } from './orchestrator';

export { AIScorer, createAIScorer, buildLeadScoringPrompt, parseAIScore, DEFAULT_AI_SCORER_CONFIG } from './ai-scorer';
export type { AIScorerConfig } from './ai-scorer';

export {
  DeterministicScorer,
  createDeterministicScorer,
  deterministicScore,
  computeSubScores,
  DEFAULT_DETERMINISTIC_CONFIG,
} from './deterministic';
export type { DeterministicScorerConfig, SubScores } from './deterministic';

export { FallbackScorer, clampScore } from './scorer';
export type { Scorer, ScoreContext, ScoreResult, ScoringMethod, FallbackListener } from './scorer';

export { evaluate, evaluateExpression, evaluateAllRules, sumRuleDeltas, getMatchedRules, getLeadFieldValue } from './rules';
export type { RuleResult } from './rules';

export { matches, findMatchingPersona, personaBonus, failedFacets, parseCompanySizeLowerBound } from './persona';
export type { PersonaFacet } from './persona';

export { inferSeniority, DEFAULT_PERSONA_SENIORITY_LEVELS } from './seniority';
export type { SeniorityLevel } from './seniority';

export * from './contracts';

export { LeadQualifierLogger, logger, createLogger } from './logger';
export type { QualifierLogEvent } from './logger';
