/**
 * Persona Matching Tests
 */

import { describe, it, expect } from 'vitest';
import {
  failedFacets,
  findMatchingPersona,
  matches,
  parseCompanySizeLowerBound,
  personaBonus,
} from '../../lead-qualifier/persona';
import { inferSeniority } from '../../lead-qualifier/seniority';
import { createLead, createPersona } from '../fixtures';

describe('parseCompanySizeLowerBound', () => {
  it('reads the leading numeric token', () => {
    expect(parseCompanySizeLowerBound('51-200')).toBe(51);
    expect(parseCompanySizeLowerBound('1,001-5,000')).toBe(1001);
    expect(parseCompanySizeLowerBound('10000+')).toBe(10000);
  });

  it('returns null when there is no leading number', () => {
    expect(parseCompanySizeLowerBound('self-employed')).toBeNull();
    expect(parseCompanySizeLowerBound('')).toBeNull();
    expect(parseCompanySizeLowerBound(null)).toBeNull();
  });
});

describe('inferSeniority', () => {
  it.each([
    ['CEO & Co-Founder', 'C-level'],
    ['President', 'C-level'],
    ['Vice President of Marketing', 'C-level'],
    ['Founder and VP Product', 'C-level'],
    ['VP of Sales', 'VP'],
    ['SVP Engineering', 'VP'],
    ['Director of Sales', 'Director'],
    ['Engineering Manager', 'Manager'],
    ['Software Engineer', 'IC'],
  ])('classifies %s as %s', (title, level) => {
    expect(inferSeniority(title)).toBe(level);
  });

  it('treats a missing title as IC', () => {
    expect(inferSeniority(null)).toBe('IC');
  });
});

describe('matches', () => {
  it('requires one title keyword', () => {
    const persona = createPersona({ rules: { title_keywords: ['sales', 'revenue'] } });
    expect(matches(createLead({ title: 'Head of Revenue' }), persona)).toBe(true);
    expect(matches(createLead({ title: 'Software Engineer' }), persona)).toBe(false);
    expect(matches(createLead({ title: null }), persona)).toBe(false);
  });

  it('never matches a title containing an excluded keyword', () => {
    const persona = createPersona({
      rules: {
        title_keywords: ['sales'],
        title_exclude: ['intern'],
        company_size_min: 10,
        industries: ['software'],
      },
    });
    const lead = createLead({
      title: 'Sales Intern',
      company_size: '51-200',
      company_industry: 'Computer Software',
    });

    expect(matches(lead, persona)).toBe(false);
    expect(failedFacets(lead, persona.rules)).toEqual(['title_exclude']);
  });

  it('compares company size bounds and lets unparsable sizes pass', () => {
    const persona = createPersona({ rules: { company_size_min: 50, company_size_max: 500 } });
    expect(matches(createLead({ company_size: '51-200' }), persona)).toBe(true);
    expect(matches(createLead({ company_size: '11-50' }), persona)).toBe(false);
    expect(matches(createLead({ company_size: '1001-5000' }), persona)).toBe(false);
    expect(matches(createLead({ company_size: 'unknown' }), persona)).toBe(true);
    expect(matches(createLead({ company_size: null }), persona)).toBe(true);
  });

  it('checks industries and locations when the lead has them', () => {
    const persona = createPersona({ rules: { industries: ['fintech'], locations: ['berlin', 'london'] } });
    expect(matches(createLead({ company_industry: 'Fintech', location: 'London, UK' }), persona)).toBe(true);
    expect(matches(createLead({ company_industry: 'Retail', location: 'London, UK' }), persona)).toBe(false);
    expect(matches(createLead({ company_industry: null, location: null }), persona)).toBe(true);
  });

  it('checks the inferred seniority level', () => {
    const persona = createPersona({ rules: { seniority_levels: ['VP', 'C-level'] } });
    expect(matches(createLead({ title: 'VP Marketing' }), persona)).toBe(true);
    expect(matches(createLead({ title: 'Marketing Manager' }), persona)).toBe(false);
  });

  it('matches everything when no facet is configured', () => {
    expect(matches(createLead(), createPersona({ rules: {} }))).toBe(true);
  });
});

describe('findMatchingPersona', () => {
  const lead = createLead({ title: 'VP of Sales' });

  it('returns the highest-priority match and ignores the rest', () => {
    const personas = [
      createPersona({ id: 'low', priority: 2, score_bonus: 10, rules: { title_keywords: ['sales'] } }),
      createPersona({ id: 'high', priority: 9, score_bonus: 40, rules: { title_keywords: ['vp'] } }),
      createPersona({ id: 'miss', priority: 10, score_bonus: 90, rules: { title_keywords: ['finance'] } }),
    ];

    expect(findMatchingPersona(lead, personas)?.id).toBe('high');
    expect(personaBonus(lead, personas)).toBe(40);
  });

  it('skips inactive personas', () => {
    const personas = [createPersona({ is_active: false, rules: { title_keywords: ['vp'] } })];
    expect(findMatchingPersona(lead, personas)).toBeNull();
    expect(personaBonus(lead, personas)).toBe(0);
  });
});
