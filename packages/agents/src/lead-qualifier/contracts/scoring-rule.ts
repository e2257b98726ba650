/**
 * Scoring Rule Contract
 *
 * Raw rule definitions arrive as `{field, operator, value}` with a loosely
 * typed value. They are compiled once, at write time, into a tagged
 * RuleExpression so evaluation never re-parses strings.
 *
 * @module lead-qualifier/contracts/scoring-rule
 */

import { z } from 'zod';
import {
  RuleOperatorSchema,
  ValidationError,
  formatZodError,
} from '@leadforge/lib';
import { generateId } from '../../repository/lead-records';
import type { OrganizationId, RuleExpression, RuleOperator, ScoringRule } from '@leadforge/lib';

// ===========================================
// Input Schema
// ===========================================

export const RuleValueSchema = z
  .union([z.string(), z.number(), z.boolean(), z.array(z.union([z.string(), z.number()]))])
  .describe('Literal compared against the field; a JSON list or comma-separated string for in/not_in');

export const ScoringRuleInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1).describe('Display name'),
  field: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z0-9_]+)*$/, 'Field must be an attribute name or dot path')
    .describe('Lead attribute, dot paths reach into custom_fields'),
  operator: RuleOperatorSchema,
  value: RuleValueSchema.optional(),
  score_delta: z.number().int().describe('Signed points added on match'),
  priority: z.number().int().default(0).describe('Display ordering only'),
  is_active: z.boolean().default(true),
});

export type ScoringRuleInput = z.input<typeof ScoringRuleInputSchema>;
type RuleValue = z.infer<typeof RuleValueSchema>;

// ===========================================
// Compilation
// ===========================================

function parseList(value: RuleValue | undefined): string[] | null {
  if (Array.isArray(value)) {
    return value.map((item) => String(item));
  }
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (trimmed.startsWith('[')) {
    try {
      const parsed = z.array(z.union([z.string(), z.number()])).safeParse(JSON.parse(trimmed));
      return parsed.success ? parsed.data.map((item) => String(item)) : null;
    } catch {
      return null;
    }
  }

  return trimmed
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function parseNumber(value: RuleValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Compile `{field, operator, value}` into a tagged expression
 *
 * @throws ValidationError when the value does not fit the operator
 */
export function compileRuleExpression(
  field: string,
  operator: RuleOperator,
  value: RuleValue | undefined
): RuleExpression {
  const reject = (reason: string): never => {
    throw new ValidationError(`Invalid ${operator} rule on ${field}: ${reason}`, { field, operator, value });
  };

  switch (operator) {
    case 'exists':
    case 'not_exists':
      return { operator, field };

    case 'equals':
      if (value === undefined || Array.isArray(value)) {
        return reject('expected a single value');
      }
      return { operator, field, value: String(value) };

    case 'contains':
      if (typeof value !== 'string' || value.length === 0) {
        return reject('expected a non-empty string');
      }
      return { operator, field, value };

    case 'greater_than':
    case 'less_than': {
      const threshold = parseNumber(value);
      return threshold === null ? reject('expected a number') : { operator, field, value: threshold };
    }

    case 'in':
    case 'not_in': {
      const values = parseList(value);
      return values === null || values.length === 0
        ? reject('expected a non-empty list')
        : { operator, field, values };
    }

    default: {
      const _exhaustive: never = operator;
      return reject(`unknown operator ${String(_exhaustive)}`);
    }
  }
}

/**
 * Validate and compile a raw scoring rule for an organization
 *
 * @throws ValidationError
 */
export function compileScoringRule(
  organizationId: OrganizationId,
  input: unknown,
  newId: () => string = () => generateId('rule')
): ScoringRule {
  const parsed = ScoringRuleInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid scoring rule', { fields: formatZodError(parsed.error) });
  }

  const rule = parsed.data;
  return {
    id: rule.id ?? newId(),
    organization_id: organizationId,
    name: rule.name,
    expression: compileRuleExpression(rule.field, rule.operator, rule.value),
    score_delta: rule.score_delta,
    priority: rule.priority,
    is_active: rule.is_active,
  };
}

// ===========================================
// Default Rules
// ===========================================

/** Rules installed for a new organization */
export const DEFAULT_SCORING_RULES: ScoringRuleInput[] = [
  { name: 'Has Title', field: 'title', operator: 'exists', score_delta: 10, priority: 1 },
  { name: 'Has Email', field: 'email', operator: 'exists', score_delta: 15, priority: 2 },
  { name: 'Email Verified', field: 'is_email_verified', operator: 'equals', value: 'true', score_delta: 20, priority: 3 },
  { name: 'Enriched', field: 'enrichment_status', operator: 'equals', value: 'enriched', score_delta: 30, priority: 4 },
  { name: 'Manager', field: 'title', operator: 'contains', value: 'manager', score_delta: 20, priority: 5 },
  { name: 'Director', field: 'title', operator: 'contains', value: 'director', score_delta: 25, priority: 6 },
  { name: 'VP', field: 'title', operator: 'contains', value: 'vp', score_delta: 30, priority: 7 },
];
