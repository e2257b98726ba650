/**
 * Rule Evaluation Unit Tests
 *
 * Operators, missing and malformed values, and batch evaluation.
 */

import { describe, it, expect } from 'vitest';
import type { RuleExpression, ScoringRule } from '@leadforge/lib';
import {
  evaluate,
  evaluateAllRules,
  evaluateExpression,
  getLeadFieldValue,
  getMatchedRules,
  sumRuleDeltas,
} from '../../lead-qualifier/rules';
import { ORG_ID, createLead } from '../fixtures';

// ===========================================
// Test Helpers
// ===========================================

function createRule(expression: RuleExpression, overrides: Partial<ScoringRule> = {}): ScoringRule {
  return {
    id: 'rule_test_001',
    organization_id: ORG_ID,
    name: 'Test Rule',
    expression,
    score_delta: 10,
    priority: 1,
    is_active: true,
    ...overrides,
  };
}

const ALL_EXPRESSIONS: RuleExpression[] = [
  { operator: 'exists', field: 'title' },
  { operator: 'not_exists', field: 'title' },
  { operator: 'equals', field: 'title', value: 'vp' },
  { operator: 'contains', field: 'title', value: 'vp' },
  { operator: 'greater_than', field: 'score', value: 10 },
  { operator: 'less_than', field: 'score', value: 10 },
  { operator: 'in', field: 'status', values: ['new'] },
  { operator: 'not_in', field: 'status', values: ['new'] },
];

// ===========================================
// Field Access
// ===========================================

describe('getLeadFieldValue', () => {
  it('reads top-level attributes', () => {
    expect(getLeadFieldValue(createLead({ title: 'CTO' }), 'title')).toBe('CTO');
  });

  it('reads nested custom fields with a dot path', () => {
    const lead = createLead({ custom_fields: { industry: 'SaaS' } });
    expect(getLeadFieldValue(lead, 'custom_fields.industry')).toBe('SaaS');
  });

  it('returns undefined for unknown fields', () => {
    expect(getLeadFieldValue(createLead(), 'nope')).toBeUndefined();
    expect(getLeadFieldValue(createLead(), 'custom_fields.nope.deeper')).toBeUndefined();
  });
});

// ===========================================
// Operators
// ===========================================

describe('exists / not_exists', () => {
  it('treats null and empty strings as missing', () => {
    const rule = createRule({ operator: 'exists', field: 'email' });
    expect(evaluate(createLead({ email: 'jane@example.com' }), rule)).toBe(true);
    expect(evaluate(createLead({ email: null }), rule)).toBe(false);
    expect(evaluate(createLead({ email: '' }), rule)).toBe(false);
  });

  it('negates exists', () => {
    const rule = createRule({ operator: 'not_exists', field: 'email' });
    expect(evaluate(createLead({ email: null }), rule)).toBe(true);
    expect(evaluate(createLead({ email: 'jane@example.com' }), rule)).toBe(false);
  });
});

describe('equals', () => {
  it('compares stringified values case-insensitively', () => {
    expect(evaluateExpression(createLead({ status: 'qualified' }), { operator: 'equals', field: 'status', value: 'QUALIFIED' })).toBe(true);
    expect(evaluateExpression(createLead({ is_email_verified: true }), { operator: 'equals', field: 'is_email_verified', value: 'true' })).toBe(true);
    expect(evaluateExpression(createLead({ is_email_verified: false }), { operator: 'equals', field: 'is_email_verified', value: 'true' })).toBe(false);
  });

  it('is false for a missing field', () => {
    expect(evaluateExpression(createLead({ title: null }), { operator: 'equals', field: 'title', value: 'none' })).toBe(false);
  });
});

describe('contains', () => {
  it('matches substrings case-insensitively', () => {
    const expression: RuleExpression = { operator: 'contains', field: 'title', value: 'director' };
    expect(evaluateExpression(createLead({ title: 'Sales Director, EMEA' }), expression)).toBe(true);
    expect(evaluateExpression(createLead({ title: 'Account Executive' }), expression)).toBe(false);
  });

  it('is false when the field is empty', () => {
    expect(evaluateExpression(createLead({ title: null }), { operator: 'contains', field: 'title', value: 'vp' })).toBe(false);
  });

  it('matches any element of an array field', () => {
    const lead = createLead({ tags: ['ai_discovered', 'high'] });
    expect(evaluateExpression(lead, { operator: 'contains', field: 'tags', value: 'discover' })).toBe(true);
  });
});

describe('greater_than / less_than', () => {
  it('compares numeric fields', () => {
    const lead = createLead({ score: 42 });
    expect(evaluateExpression(lead, { operator: 'greater_than', field: 'score', value: 40 })).toBe(true);
    expect(evaluateExpression(lead, { operator: 'less_than', field: 'score', value: 40 })).toBe(false);
  });

  it('coerces numeric strings', () => {
    const lead = createLead({ custom_fields: { employees: '250' } });
    expect(evaluateExpression(lead, { operator: 'greater_than', field: 'custom_fields.employees', value: 200 })).toBe(true);
  });

  it('treats a missing field as 0', () => {
    const lead = createLead({ custom_fields: {} });
    expect(evaluateExpression(lead, { operator: 'less_than', field: 'custom_fields.employees', value: 1 })).toBe(true);
    expect(evaluateExpression(lead, { operator: 'greater_than', field: 'custom_fields.employees', value: -1 })).toBe(true);
  });

  it('is false for non-numeric values', () => {
    const lead = createLead({ company_size: '51-200' });
    expect(evaluateExpression(lead, { operator: 'greater_than', field: 'company_size', value: 10 })).toBe(false);
    expect(evaluateExpression(lead, { operator: 'less_than', field: 'company_size', value: 10 })).toBe(false);
  });
});

describe('in / not_in', () => {
  it('checks case-insensitive membership', () => {
    const lead = createLead({ status: 'replied' });
    expect(evaluateExpression(lead, { operator: 'in', field: 'status', values: ['Replied', 'qualified'] })).toBe(true);
    expect(evaluateExpression(lead, { operator: 'not_in', field: 'status', values: ['Replied', 'qualified'] })).toBe(false);
  });

  it('treats a missing field as not in the list', () => {
    const lead = createLead({ location: null });
    expect(evaluateExpression(lead, { operator: 'in', field: 'location', values: ['Berlin'] })).toBe(false);
    expect(evaluateExpression(lead, { operator: 'not_in', field: 'location', values: ['Berlin'] })).toBe(true);
  });
});

// ===========================================
// Never Throws
// ===========================================

describe('evaluation never throws', () => {
  const hostile = {
    toString() {
      throw new Error('boom');
    },
  };

  it.each(ALL_EXPRESSIONS)('returns a boolean for $operator on hostile and missing values', (expression) => {
    const leads = [
      createLead(),
      createLead({ title: null }),
      createLead({ custom_fields: { weird: hostile } }),
    ];
    for (const lead of leads) {
      expect(typeof evaluateExpression(lead, expression)).toBe('boolean');
      expect(typeof evaluateExpression(lead, { ...expression, field: 'custom_fields.weird' })).toBe('boolean');
      expect(typeof evaluateExpression(lead, { ...expression, field: 'does.not.exist' })).toBe('boolean');
    }
  });

  it('treats a throwing coercion as a non-match', () => {
    const lead = createLead({ custom_fields: { weird: hostile } });
    expect(evaluateExpression(lead, { operator: 'equals', field: 'custom_fields.weird', value: 'x' })).toBe(false);
    expect(evaluateExpression(lead, { operator: 'contains', field: 'custom_fields.weird', value: 'x' })).toBe(false);
  });
});

// ===========================================
// Batch Evaluation
// ===========================================

describe('evaluateAllRules', () => {
  const rules = [
    createRule({ operator: 'exists', field: 'title' }, { id: 'r1', name: 'Has Title', score_delta: 10 }),
    createRule({ operator: 'contains', field: 'title', value: 'vp' }, { id: 'r2', name: 'VP', score_delta: 30 }),
    createRule({ operator: 'exists', field: 'email' }, { id: 'r3', name: 'Has Email', score_delta: 15 }),
    createRule({ operator: 'exists', field: 'title' }, { id: 'r4', name: 'Inactive', score_delta: 99, is_active: false }),
    createRule({ operator: 'not_exists', field: 'phone' }, { id: 'r5', name: 'No Phone', score_delta: -5 }),
  ];

  it('sums every matching active rule without short-circuiting', () => {
    const results = evaluateAllRules(createLead({ title: 'VP Sales', email: null }), rules);

    expect(results.map((r) => r.rule_id)).toEqual(['r1', 'r2', 'r3', 'r5']);
    expect(getMatchedRules(results).map((r) => r.name)).toEqual(['Has Title', 'VP', 'No Phone']);
    expect(sumRuleDeltas(results)).toBe(35);
  });

  it('reports a zero delta for non-matching rules', () => {
    const results = evaluateAllRules(createLead({ title: null, phone: '+100' }), rules);
    expect(results.every((r) => !r.matched && r.delta === 0)).toBe(true);
  });
});
