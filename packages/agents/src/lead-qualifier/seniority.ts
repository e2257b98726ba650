/**
 * Seniority Heuristic
 *
 * Keyword classification of a job title or headline. Used by persona
 * matching and as the rule-based fallback for AI profile evaluation.
 *
 * @module lead-qualifier/seniority
 */

export type SeniorityLevel = 'C-level' | 'VP' | 'Director' | 'Manager' | 'IC';

export const DEFAULT_PERSONA_SENIORITY_LEVELS: SeniorityLevel[] = ['Manager', 'Director', 'VP', 'C-level'];

// Tested in order, C-level first: any title naming a president reads as C-level.
const SENIORITY_PATTERNS: Array<[SeniorityLevel, RegExp]> = [
  ['C-level', /\b(ceo|cto|cfo|coo|cmo|chief|founder|co-founder|president)\b/i],
  ['VP', /\b(vp|svp|evp)\b/i],
  ['Director', /\bdirector\b/i],
  ['Manager', /\bmanager\b/i],
];

export function inferSeniority(title: string | null | undefined): SeniorityLevel {
  if (!title) return 'IC';
  for (const [level, pattern] of SENIORITY_PATTERNS) {
    if (pattern.test(title)) return level;
  }
  return 'IC';
}
