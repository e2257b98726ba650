/**
 * Rule Evaluation Module
 *
 * Evaluates compiled scoring rules against a lead using pure functions.
 * Evaluation never throws: a value that cannot be coerced is a non-match,
 * so one malformed rule cannot abort scoring for the others.
 *
 * @module lead-qualifier/rules
 */

import type { Lead, RuleExpression, ScoringRule } from '@leadforge/lib';

// ===========================================
// Types
// ===========================================

export interface RuleResult {
  rule_id: string;
  name: string;
  matched: boolean;
  /** score_delta when matched, otherwise 0 */
  delta: number;
}

// ===========================================
// Field Access
// ===========================================

/**
 * Read a lead attribute; dot paths reach into nested objects
 * (e.g. "custom_fields.industry")
 */
export function getLeadFieldValue(lead: Lead, field: string): unknown {
  let value: unknown = lead;
  for (const part of field.split('.')) {
    if (typeof value !== 'object' || value === null || !Object.prototype.hasOwnProperty.call(value, part)) {
      return undefined;
    }
    value = Reflect.get(value, part);
  }
  return value;
}

function isPresent(value: unknown): boolean {
  return value !== null && value !== undefined && value !== '';
}

function asComparable(value: unknown): string[] {
  const items = Array.isArray(value) ? value : [value];
  return items.filter(isPresent).map((item) => String(item).toLowerCase());
}

/**
 * Coerce to a number; missing values count as 0, anything non-numeric is NaN
 */
function asNumber(value: unknown): number {
  if (!isPresent(value)) return 0;
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string') return value.trim() === '' ? Number.NaN : Number(value);
  return Number.NaN;
}

// ===========================================
// Operator Functions (Pure)
// ===========================================

export function evaluateExists(value: unknown): boolean {
  return isPresent(value);
}

export function evaluateEquals(value: unknown, expected: string): boolean {
  if (!isPresent(value)) return false;
  return String(value).toLowerCase() === expected.toLowerCase();
}

export function evaluateContains(value: unknown, substring: string): boolean {
  const needle = substring.toLowerCase();
  return asComparable(value).some((item) => item.includes(needle));
}

export function evaluateGreaterThan(value: unknown, threshold: number): boolean {
  const numeric = asNumber(value);
  return !Number.isNaN(numeric) && numeric > threshold;
}

export function evaluateLessThan(value: unknown, threshold: number): boolean {
  const numeric = asNumber(value);
  return !Number.isNaN(numeric) && numeric < threshold;
}

export function evaluateIn(value: unknown, list: string[]): boolean {
  const candidates = new Set(list.map((item) => item.toLowerCase()));
  return asComparable(value).some((item) => candidates.has(item));
}

// ===========================================
// Rule Evaluation Dispatcher
// ===========================================

/**
 * Evaluate a compiled expression against a lead
 */
export function evaluateExpression(lead: Lead, expression: RuleExpression): boolean {
  try {
    const value = getLeadFieldValue(lead, expression.field);

    switch (expression.operator) {
      case 'exists':
        return evaluateExists(value);
      case 'not_exists':
        return !evaluateExists(value);
      case 'equals':
        return evaluateEquals(value, expression.value);
      case 'contains':
        return evaluateContains(value, expression.value);
      case 'greater_than':
        return evaluateGreaterThan(value, expression.value);
      case 'less_than':
        return evaluateLessThan(value, expression.value);
      case 'in':
        return evaluateIn(value, expression.values);
      case 'not_in':
        return !evaluateIn(value, expression.values);
      default: {
        // Exhaustive check
        const _exhaustive: never = expression;
        return false;
      }
    }
  } catch {
    // Coercion failures (e.g. a throwing toString) are non-matches
    return false;
  }
}

/**
 * Evaluate one scoring rule against a lead
 */
export function evaluate(lead: Lead, rule: ScoringRule): boolean {
  return evaluateExpression(lead, rule.expression);
}

// ===========================================
// Batch Rule Evaluation
// ===========================================

/**
 * Evaluate every active rule. All are summed; none short-circuits.
 */
export function evaluateAllRules(lead: Lead, rules: ScoringRule[]): RuleResult[] {
  return rules
    .filter((rule) => rule.is_active)
    .map((rule) => {
      const matched = evaluate(lead, rule);
      return {
        rule_id: rule.id,
        name: rule.name,
        matched,
        delta: matched ? rule.score_delta : 0,
      };
    });
}

export function sumRuleDeltas(results: RuleResult[]): number {
  return results.reduce((sum, r) => sum + r.delta, 0);
}

export function getMatchedRules(results: RuleResult[]): RuleResult[] {
  return results.filter((r) => r.matched);
}
