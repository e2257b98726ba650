/**
 * Text Generation Provider
 *
 * Narrow `generate(prompt) -> text` capability over the Anthropic Messages
 * API. Callers parse and validate the returned text themselves. When no API
 * key is configured `createTextGenerator` returns null and callers use their
 * rule-based fallback.
 *
 * @module text-generation
 */

import Anthropic from '@anthropic-ai/sdk';
import { MalformedOutputError, ProviderUnavailableError, RateLimitError } from './errors';
import { getLangfuse, isLangfuseEnabled } from './observability/langfuse-client';
import { withTimeout } from './retry';

// ===========================================
// Types
// ===========================================

export interface GenerateOptions {
  /** Name recorded on the Langfuse generation */
  name?: string;
  /** Parent trace id; generations are only traced when present */
  traceId?: string;
  maxTokens?: number;
  metadata?: Record<string, unknown>;
}

export interface TextGenerator {
  readonly model: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface AnthropicTextGeneratorConfig {
  apiKey: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

export const DEFAULT_TEXT_GENERATOR_CONFIG: Omit<AnthropicTextGeneratorConfig, 'apiKey'> = {
  model: 'claude-sonnet-4-20250514',
  maxTokens: 1024,
  timeoutMs: 30_000,
};

// ===========================================
// Anthropic Implementation
// ===========================================

export class AnthropicTextGenerator implements TextGenerator {
  private client: Anthropic;
  private config: AnthropicTextGeneratorConfig;

  constructor(config: Partial<AnthropicTextGeneratorConfig> & { apiKey: string }) {
    if (!config.apiKey) {
      throw new ProviderUnavailableError('ANTHROPIC_API_KEY is required');
    }
    this.config = { ...DEFAULT_TEXT_GENERATOR_CONFIG, ...config };
    this.client = new Anthropic({ apiKey: this.config.apiKey });
  }

  get model(): string {
    return this.config.model;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const langfuse = getLangfuse();
    type LangfuseGeneration = ReturnType<NonNullable<typeof langfuse>['generation']>;
    let generation: LangfuseGeneration | null = null;
    if (langfuse && isLangfuseEnabled() && options.traceId) {
      generation = langfuse.generation({
        traceId: options.traceId,
        name: options.name ?? 'text_generation',
        model: this.config.model,
        input: { prompt },
        metadata: { promptLength: prompt.length, ...options.metadata },
      });
    }

    const startTime = Date.now();

    try {
      const response = await withTimeout(
        options.name ?? 'text_generation',
        this.config.timeoutMs,
        (signal) =>
          this.client.messages.create(
            {
              model: this.config.model,
              max_tokens: options.maxTokens ?? this.config.maxTokens,
              messages: [{ role: 'user', content: prompt }],
            },
            { signal }
          )
      );

      const textContent = response.content.find((block) => block.type === 'text');
      if (!textContent || textContent.type !== 'text') {
        throw new MalformedOutputError('No text response from provider');
      }

      generation?.end({
        output: textContent.text,
        usage: {
          input: response.usage.input_tokens,
          output: response.usage.output_tokens,
          total: response.usage.input_tokens + response.usage.output_tokens,
        },
        metadata: { latencyMs: Date.now() - startTime },
      });

      return textContent.text;
    } catch (error) {
      const normalized = normalizeProviderError(error);
      generation?.end({
        output: null,
        level: 'ERROR',
        statusMessage: normalized.message,
        metadata: { latencyMs: Date.now() - startTime, error: normalized.message },
      });
      throw normalized;
    }
  }
}

/**
 * Map SDK errors onto the shared taxonomy
 */
export function normalizeProviderError(error: unknown): Error {
  if (error instanceof Anthropic.APIError && error.status === 429) {
    return new RateLimitError(error.message);
  }
  if (error instanceof Error) {
    if (error.message.toLowerCase().includes('quota')) {
      return new RateLimitError(error.message);
    }
    return error;
  }
  return new Error(String(error));
}

// ===========================================
// Factory
// ===========================================

/**
 * Create a text generator, or null when no API key is configured
 */
export function createTextGenerator(
  config: Partial<AnthropicTextGeneratorConfig> = {}
): TextGenerator | null {
  const apiKey = config.apiKey ?? process.env.ANTHROPIC_API_KEY;
  if (!apiKey) {
    return null;
  }
  return new AnthropicTextGenerator({ ...config, apiKey });
}

// ===========================================
// Response Parsing
// ===========================================

/**
 * Strip code fences and extract the first JSON object from provider text
 */
export function extractJsonObject(text: string): unknown {
  const unfenced = text
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '');

  const jsonMatch = unfenced.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new MalformedOutputError('No JSON found in provider response', text);
  }

  try {
    const parsed: unknown = JSON.parse(jsonMatch[0]);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedOutputError(`Invalid JSON in provider response: ${reason}`, text);
  }
}
