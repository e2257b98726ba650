/**
 * Observability Module
 *
 * Langfuse tracing for scoring and ingestion.
 *
 * @example
 * ```typescript
 * initLangfuse();
 *
 * const trace = createLeadScoringTrace({
 *   organizationId: 'org_1',
 *   leadId: 'lead_123',
 *   leadData: { title: 'VP of Sales' },
 * });
 *
 * if (trace) {
 *   endLeadScoringTrace(trace.traceId, {
 *     score: 65,
 *     method: 'deterministic',
 *     processingTimeMs: 12,
 *   });
 * }
 *
 * await flushLangfuse();
 * ```
 */

// Client management
export {
  initLangfuse,
  getLangfuse,
  isLangfuseEnabled,
  flushLangfuse,
  shutdownLangfuse,
  resetLangfuse,
} from './langfuse-client';

// Tracing utilities
export {
  createAgentTrace,
  endTrace,
  endTraceWithError,
  createSpan,
  endSpan,
  createLeadScoringTrace,
  endLeadScoringTrace,
  createIngestionTrace,
  endIngestionTrace,
  withSpan,
} from './tracing';
export type { TraceContext } from './tracing';

// Types
export type {
  AgentName,
  TraceMetadata,
  CreateTraceInput,
  SpanInput,
  SpanOutput,
  LeadScoringTraceInput,
  LeadScoringTraceOutput,
  IngestionTraceInput,
  IngestionTraceOutput,
  LangfuseConfig,
} from './types';

export { LANGFUSE_ENV_VARS } from './types';
