/**
 * Shared library for the lead qualification pipeline.
 */

// Entity schemas and types
export * from './types';

// Error taxonomy
export * from './errors';

// Structured logging
export {
  StructuredLogger,
  DEFAULT_LOGGER_CONFIG,
  LOG_LEVEL_PRIORITY,
  parseLogLevel,
} from './logging';
export type { LoggerConfig, LogLevel, LogEntry } from './logging';

// Retry and timeouts
export {
  withRateLimitRetry,
  withTimeout,
  sleep,
  isRateLimitSignal,
  toRateLimitError,
  DEFAULT_RATE_LIMIT_RETRY_CONFIG,
} from './retry';
export type { RateLimitRetryConfig, RetryHooks } from './retry';

// Text generation (Anthropic)
export {
  AnthropicTextGenerator,
  createTextGenerator,
  extractJsonObject,
  normalizeProviderError,
  DEFAULT_TEXT_GENERATOR_CONFIG,
} from './text-generation';
export type {
  TextGenerator,
  GenerateOptions,
  AnthropicTextGeneratorConfig,
} from './text-generation';

// Validated JSON generation
export { generateStructured, parseStructuredOutput } from './structured-generation';
export type { StructuredGenerationOptions } from './structured-generation';

// Prompt output schemas
export { renderOutputSchema } from './output-schema';

// Observability (Langfuse integration)
export * from './observability';

// Redis lead store
export {
  initRedis,
  getRedisStore,
  resetRedis,
  leadKey,
  leadIndexKey,
  leadDedupKey,
} from './redis-client';
export type { RedisStore, RedisConfig } from './redis-client';

// Profile URLs
export { canonicalizeProfileUrl, hashProfileUrl } from './profile-url';
