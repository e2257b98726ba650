/**
 * Persona Matching
 *
 * A persona is an ICP rule set. Every configured facet must pass; the
 * highest-priority matching persona contributes its score bonus and no
 * other persona is considered.
 *
 * @module lead-qualifier/persona
 */

import type { Lead, Persona, PersonaRules } from '@leadforge/lib';
import { inferSeniority } from './seniority';

// ===========================================
// Facet Helpers
// ===========================================

function containsAny(haystack: string, needles: string[]): boolean {
  const lower = haystack.toLowerCase();
  return needles.some((needle) => lower.includes(needle.toLowerCase()));
}

/**
 * Leading numeric token of a company-size range string
 * ("51-200" -> 51, "1,001-5,000" -> 1001, "10000+" -> 10000).
 * Returns null when there is no leading number.
 */
export function parseCompanySizeLowerBound(companySize: string | null | undefined): number | null {
  if (!companySize) return null;
  const match = companySize.trim().match(/^(\d[\d,]*)/);
  if (!match) return null;
  const value = Number.parseInt(match[1].replace(/,/g, ''), 10);
  return Number.isNaN(value) ? null : value;
}

export type PersonaFacet = keyof PersonaRules;

/**
 * Facets of the persona that the lead fails; empty when the lead matches
 */
export function failedFacets(lead: Lead, rules: PersonaRules): PersonaFacet[] {
  const failed: PersonaFacet[] = [];
  const title = lead.title ?? '';

  if (rules.title_keywords && rules.title_keywords.length > 0) {
    if (!title || !containsAny(title, rules.title_keywords)) failed.push('title_keywords');
  }

  if (rules.title_exclude && rules.title_exclude.length > 0 && title) {
    if (containsAny(title, rules.title_exclude)) failed.push('title_exclude');
  }

  // Unparsable sizes pass; missing enrichment must not block a match
  const size = parseCompanySizeLowerBound(lead.company_size);
  if (size !== null) {
    if (rules.company_size_min !== undefined && size < rules.company_size_min) failed.push('company_size_min');
    if (rules.company_size_max !== undefined && size > rules.company_size_max) failed.push('company_size_max');
  }

  if (rules.industries && rules.industries.length > 0 && lead.company_industry) {
    if (!containsAny(lead.company_industry, rules.industries)) failed.push('industries');
  }

  if (rules.locations && rules.locations.length > 0 && lead.location) {
    if (!containsAny(lead.location, rules.locations)) failed.push('locations');
  }

  if (rules.seniority_levels && rules.seniority_levels.length > 0 && title) {
    const seniority = inferSeniority(title).toLowerCase();
    if (!rules.seniority_levels.some((level) => level.toLowerCase() === seniority)) {
      failed.push('seniority_levels');
    }
  }

  return failed;
}

// ===========================================
// Matching
// ===========================================

export function matches(lead: Lead, persona: Persona): boolean {
  return failedFacets(lead, persona.rules).length === 0;
}

/**
 * First matching active persona in descending priority order
 */
export function findMatchingPersona(lead: Lead, personas: Persona[]): Persona | null {
  const ordered = personas
    .filter((persona) => persona.is_active)
    .sort((a, b) => b.priority - a.priority);

  for (const persona of ordered) {
    if (matches(lead, persona)) {
      return persona;
    }
  }
  return null;
}

export function personaBonus(lead: Lead, personas: Persona[]): number {
  return findMatchingPersona(lead, personas)?.score_bonus ?? 0;
}
