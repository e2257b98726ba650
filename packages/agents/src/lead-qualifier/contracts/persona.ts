/**
 * Persona Contract
 *
 * @module lead-qualifier/contracts/persona
 */

import { z } from 'zod';
import { PersonaRulesSchema, ValidationError, formatZodError } from '@leadforge/lib';
import { generateId } from '../../repository/lead-records';
import type { OrganizationId, Persona } from '@leadforge/lib';

export const PersonaInputSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  priority: z.number().int().min(1).max(10).default(5).describe('Highest priority is matched first'),
  score_bonus: z.number().int().default(50).describe('Points added when this persona matches'),
  is_active: z.boolean().default(true),
  rules: PersonaRulesSchema.refine(
    (rules) =>
      rules.company_size_min === undefined ||
      rules.company_size_max === undefined ||
      rules.company_size_min <= rules.company_size_max,
    { message: 'company_size_min must not exceed company_size_max' }
  ),
});

export type PersonaInput = z.input<typeof PersonaInputSchema>;

/**
 * Validate a persona definition for an organization
 *
 * @throws ValidationError
 */
export function compilePersona(
  organizationId: OrganizationId,
  input: unknown,
  newId: () => string = () => generateId('persona')
): Persona {
  const parsed = PersonaInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid persona', { fields: formatZodError(parsed.error) });
  }

  const { id, ...persona } = parsed.data;
  return { ...persona, id: id ?? newId(), organization_id: organizationId };
}
