/**
 * Deterministic Scorer
 *
 * Weighted sum of four sub-scores, each in [0, 100]:
 * profile match, engagement intent, company fit and activity.
 * Pure: identical lead snapshots always produce identical scores.
 *
 * @module lead-qualifier/deterministic
 */

import type { Lead, LeadStatus } from '@leadforge/lib';
import { clampScore } from './scorer';
import type { Scorer, ScoreResult } from './scorer';

// ===========================================
// Configuration
// ===========================================

export interface DeterministicScorerConfig {
  weights: {
    profile: number;
    engagement: number;
    company: number;
    activity: number;
  };
  seniorKeywords: string[];
  midKeywords: string[];
  /** Engagement overrides by lead status; other statuses keep the base */
  statusEngagement: Partial<Record<LeadStatus, number>>;
  engagementBase: number;
  /** Sources that count as social-engagement channels */
  socialSources: string[];
  activityBaseline: number;
}

export const DEFAULT_DETERMINISTIC_CONFIG: DeterministicScorerConfig = {
  weights: {
    profile: 0.45,
    engagement: 0.35,
    company: 0.15,
    activity: 0.05,
  },
  seniorKeywords: ['vp', 'head', 'director', 'chief', 'founder'],
  midKeywords: ['manager', 'senior', 'lead'],
  statusEngagement: {
    replied: 90,
    qualified: 95,
    contacted: 60,
    new: 30,
  },
  engagementBase: 20,
  socialSources: ['linkedin', 'linkedin_post_analysis', 'linkedin_extension'],
  activityBaseline: 50,
};

export interface SubScores {
  profile: number;
  engagement: number;
  company: number;
  activity: number;
}

// ===========================================
// Sub-Scores (Pure)
// ===========================================

function cap(value: number): number {
  return Math.min(100, value);
}

function titleHas(title: string, keywords: string[]): boolean {
  const lower = title.toLowerCase();
  return keywords.some((keyword) => lower.includes(keyword));
}

export function profileMatchScore(lead: Lead, config: DeterministicScorerConfig): number {
  let score = 50;
  const title = lead.title ?? '';

  // Senior and mid tiers are exclusive; the senior bonus wins
  if (title && titleHas(title, config.seniorKeywords)) {
    score += 30;
  } else if (title && titleHas(title, config.midKeywords)) {
    score += 15;
  }
  if (lead.profile_url) score += 10;
  if (lead.email) score += 10;

  return cap(score);
}

export function engagementScore(lead: Lead, config: DeterministicScorerConfig): number {
  let score = config.statusEngagement[lead.status] ?? config.engagementBase;
  if (config.socialSources.includes(lead.source)) score += 10;
  return cap(score);
}

export function companyFitScore(lead: Lead): number {
  return cap(50 + (lead.company ? 20 : 0));
}

export function computeSubScores(lead: Lead, config: DeterministicScorerConfig): SubScores {
  return {
    profile: profileMatchScore(lead, config),
    engagement: engagementScore(lead, config),
    company: companyFitScore(lead),
    activity: cap(config.activityBaseline),
  };
}

/**
 * Final score: weighted sum rounded to an integer (halves round down),
 * clamped to [0, 100]. Weights are applied in basis points so the sum is
 * exact and the rounding does not depend on float error.
 */
export function deterministicScore(
  lead: Lead,
  config: DeterministicScorerConfig = DEFAULT_DETERMINISTIC_CONFIG
): number {
  const sub = computeSubScores(lead, config);
  const bp = (weight: number) => Math.round(weight * 10_000);
  const { weights } = config;
  const total =
    sub.profile * bp(weights.profile) +
    sub.engagement * bp(weights.engagement) +
    sub.company * bp(weights.company) +
    sub.activity * bp(weights.activity);

  const whole = Math.floor(total / 10_000);
  const remainder = total - whole * 10_000;
  return clampScore(remainder > 5_000 ? whole + 1 : whole);
}

// ===========================================
// Scorer
// ===========================================

export class DeterministicScorer implements Scorer {
  readonly name = 'deterministic';
  private config: DeterministicScorerConfig;

  constructor(config: Partial<DeterministicScorerConfig> = {}) {
    this.config = { ...DEFAULT_DETERMINISTIC_CONFIG, ...config };
  }

  async score(lead: Lead): Promise<ScoreResult> {
    return this.scoreSync(lead);
  }

  scoreSync(lead: Lead): ScoreResult {
    const sub = computeSubScores(lead, this.config);
    return {
      score: deterministicScore(lead, this.config),
      method: 'deterministic',
      reasoning: `profile=${sub.profile} engagement=${sub.engagement} company=${sub.company} activity=${sub.activity}`,
    };
  }
}

export function createDeterministicScorer(config?: Partial<DeterministicScorerConfig>): DeterministicScorer {
  return new DeterministicScorer(config);
}
