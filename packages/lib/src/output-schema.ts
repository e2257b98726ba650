/**
 * Output schema rendering for prompts.
 *
 * Prompts ask the provider for a JSON object matching a zod schema; the
 * schema is embedded as JSON Schema so the prompt and the validator cannot
 * drift apart.
 *
 * @module output-schema
 */

import { zodToJsonSchema } from 'zod-to-json-schema';
import type { ZodSchema } from 'zod';

/**
 * Render a zod schema as compact JSON Schema text (no $schema, no $refs)
 */
export function renderOutputSchema(schema: ZodSchema): string {
  const { $schema: _ignored, ...jsonSchema } = zodToJsonSchema(schema, {
    $refStrategy: 'none',
    target: 'jsonSchema7',
  });
  return JSON.stringify(jsonSchema);
}
