/**
 * Structured Generation
 *
 * Prompt a text generator for JSON and validate the reply against a zod
 * schema. Rate-limited calls are retried within the configured bounds and
 * every attempt carries its own timeout.
 *
 * @module structured-generation
 */

import type { z } from 'zod';
import { MalformedOutputError } from './errors';
import { withRateLimitRetry, withTimeout } from './retry';
import type { RateLimitRetryConfig, RetryHooks } from './retry';
import { extractJsonObject } from './text-generation';
import type { GenerateOptions, TextGenerator } from './text-generation';

export interface StructuredGenerationOptions extends GenerateOptions {
  /** Operation name used for the generation and for timeout errors */
  name: string;
  timeoutMs: number;
  retry?: Partial<RateLimitRetryConfig>;
  hooks?: RetryHooks;
}

/**
 * Validate provider text against a schema
 *
 * @throws MalformedOutputError
 */
export function parseStructuredOutput<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  label: string
): T {
  const parsed = schema.safeParse(extractJsonObject(text));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new MalformedOutputError(`${label} failed validation (${issues.join('; ')})`, text);
  }
  return parsed.data;
}

export async function generateStructured<T>(
  generator: TextGenerator,
  prompt: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: StructuredGenerationOptions
): Promise<T> {
  const { timeoutMs, retry, hooks, ...generateOptions } = options;
  const text = await withRateLimitRetry(
    () => withTimeout(options.name, timeoutMs, () => generator.generate(prompt, generateOptions)),
    retry,
    hooks
  );
  return parseStructuredOutput(text, schema, options.name);
}
