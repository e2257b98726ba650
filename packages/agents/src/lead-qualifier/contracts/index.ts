/**
 * Lead Qualifier Contracts
 *
 * @module lead-qualifier/contracts
 */

export {
  ScoringRuleInputSchema,
  RuleValueSchema,
  compileRuleExpression,
  compileScoringRule,
  DEFAULT_SCORING_RULES,
} from './scoring-rule';
export type { ScoringRuleInput } from './scoring-rule';

export { PersonaInputSchema, compilePersona } from './persona';
export type { PersonaInput } from './persona';

export { AIScoreOutputSchema, QualityTierSchema } from './ai-score';
export type { AIScoreOutput, QualityTier } from './ai-score';
