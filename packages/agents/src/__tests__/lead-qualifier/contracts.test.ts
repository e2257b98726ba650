/**
 * Rule and Persona Contract Tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '@leadforge/lib';
import {
  DEFAULT_SCORING_RULES,
  compilePersona,
  compileRuleExpression,
  compileScoringRule,
} from '../../lead-qualifier/contracts';
import { ORG_ID } from '../fixtures';

describe('compileRuleExpression', () => {
  it('drops the value for exists checks', () => {
    expect(compileRuleExpression('email', 'exists', 'ignored')).toEqual({ operator: 'exists', field: 'email' });
  });

  it('stringifies equals values', () => {
    expect(compileRuleExpression('is_email_verified', 'equals', true)).toEqual({
      operator: 'equals',
      field: 'is_email_verified',
      value: 'true',
    });
  });

  it('parses numeric thresholds', () => {
    expect(compileRuleExpression('score', 'greater_than', '50')).toEqual({
      operator: 'greater_than',
      field: 'score',
      value: 50,
    });
    expect(() => compileRuleExpression('score', 'less_than', 'many')).toThrow(ValidationError);
  });

  it('parses lists from JSON or comma-separated strings', () => {
    expect(compileRuleExpression('status', 'in', '["new", "contacted"]')).toEqual({
      operator: 'in',
      field: 'status',
      values: ['new', 'contacted'],
    });
    expect(compileRuleExpression('location', 'not_in', 'Berlin, London ,')).toEqual({
      operator: 'not_in',
      field: 'location',
      values: ['Berlin', 'London'],
    });
  });

  it('rejects empty or malformed lists', () => {
    expect(() => compileRuleExpression('status', 'in', '[')).toThrow(ValidationError);
    expect(() => compileRuleExpression('status', 'in', '')).toThrow(ValidationError);
    expect(() => compileRuleExpression('status', 'in', 5)).toThrow(ValidationError);
  });

  it('requires a non-empty contains value', () => {
    expect(() => compileRuleExpression('title', 'contains', '')).toThrow(ValidationError);
  });
});

describe('compileScoringRule', () => {
  it('fills defaults and assigns an id', () => {
    const rule = compileScoringRule(
      ORG_ID,
      { name: 'VP', field: 'title', operator: 'contains', value: 'vp', score_delta: 30 },
      () => 'rule_fixed'
    );

    expect(rule).toEqual({
      id: 'rule_fixed',
      organization_id: ORG_ID,
      name: 'VP',
      expression: { operator: 'contains', field: 'title', value: 'vp' },
      score_delta: 30,
      priority: 0,
      is_active: true,
    });
  });

  it('rejects unknown operators and bad field names', () => {
    expect(() =>
      compileScoringRule(ORG_ID, { name: 'x', field: 'title', operator: 'matches', value: 'a', score_delta: 1 })
    ).toThrow(ValidationError);
    expect(() =>
      compileScoringRule(ORG_ID, { name: 'x', field: 'title; drop', operator: 'exists', score_delta: 1 })
    ).toThrow(ValidationError);
  });

  it('compiles every default rule', () => {
    const rules = DEFAULT_SCORING_RULES.map((input) => compileScoringRule(ORG_ID, input));
    expect(rules.map((rule) => [rule.name, rule.score_delta])).toEqual([
      ['Has Title', 10],
      ['Has Email', 15],
      ['Email Verified', 20],
      ['Enriched', 30],
      ['Manager', 20],
      ['Director', 25],
      ['VP', 30],
    ]);
  });
});

describe('compilePersona', () => {
  it('applies defaults', () => {
    const persona = compilePersona(ORG_ID, { name: 'Founders', rules: { title_keywords: ['founder'] } }, () => 'p_1');

    expect(persona).toEqual({
      id: 'p_1',
      organization_id: ORG_ID,
      name: 'Founders',
      priority: 5,
      score_bonus: 50,
      is_active: true,
      rules: { title_keywords: ['founder'] },
    });
  });

  it('rejects unknown rule keys', () => {
    expect(() => compilePersona(ORG_ID, { name: 'x', rules: { job_titles: ['ceo'] } })).toThrow(ValidationError);
  });
});
