/**
 * Tracing Helpers
 *
 * Domain wrappers over Langfuse traces and spans. Every helper returns null
 * or does nothing when observability is disabled.
 */

import type {
  CreateTraceInput,
  IngestionTraceInput,
  IngestionTraceOutput,
  LeadScoringTraceInput,
  LeadScoringTraceOutput,
  SpanInput,
  SpanOutput,
  TraceMetadata,
} from './types';
import { getLangfuse } from './langfuse-client';

// ===========================================
// Types for Langfuse Objects
// ===========================================

type LangfuseTrace = ReturnType<NonNullable<ReturnType<typeof getLangfuse>>['trace']>;
type LangfuseSpan = ReturnType<LangfuseTrace['span']>;

export interface TraceContext {
  trace: LangfuseTrace;
  traceId: string;
  metadata: TraceMetadata;
}

// Active traces keyed by trace id
const activeTraces = new Map<string, TraceContext>();

// ===========================================
// Trace Lifecycle
// ===========================================

export function createAgentTrace(input: CreateTraceInput): TraceContext | null {
  const langfuse = getLangfuse();
  if (!langfuse) {
    return null;
  }

  const trace = langfuse.trace({
    name: input.name,
    sessionId: input.metadata.sessionId,
    tags: [input.metadata.agentName, ...(input.metadata.tags ?? [])],
    metadata: {
      agentName: input.metadata.agentName,
      organizationId: input.metadata.organizationId,
      environment: input.metadata.environment ?? process.env.NODE_ENV ?? 'development',
    },
    input: input.input,
  });

  const context: TraceContext = { trace, traceId: trace.id, metadata: input.metadata };
  activeTraces.set(trace.id, context);
  return context;
}

export function endTrace(traceId: string, output?: Record<string, unknown>): void {
  const context = activeTraces.get(traceId);
  if (context) {
    context.trace.update({ output });
    activeTraces.delete(traceId);
  }
}

/**
 * End a trace whose work threw before its normal end
 */
export function endTraceWithError(traceId: string, error: string): void {
  endTrace(traceId, { status: 'failed', error });
}

export function createSpan(traceId: string, input: SpanInput): LangfuseSpan | null {
  const context = activeTraces.get(traceId);
  if (!context) {
    return null;
  }
  return context.trace.span({
    name: input.name,
    input: input.input,
    metadata: input.metadata,
  });
}

export function endSpan(span: LangfuseSpan | null, output?: SpanOutput): void {
  span?.end({
    output: output?.output,
    statusMessage: output?.statusMessage,
    level: output?.level,
  });
}

// ===========================================
// Lead Scoring
// ===========================================

export function createLeadScoringTrace(input: LeadScoringTraceInput): TraceContext | null {
  return createAgentTrace({
    name: `score_lead_${input.leadId}`,
    metadata: {
      agentName: 'lead_qualifier',
      organizationId: input.organizationId,
    },
    input: {
      leadId: input.leadId,
      leadData: input.leadData,
    },
  });
}

export function endLeadScoringTrace(traceId: string, output: LeadScoringTraceOutput): void {
  endTrace(traceId, { ...output });
}

// ===========================================
// Ingestion
// ===========================================

export function createIngestionTrace(input: IngestionTraceInput): TraceContext | null {
  return createAgentTrace({
    name: `ingest_post_${input.postId}`,
    metadata: {
      agentName: 'interaction_ingest',
      organizationId: input.organizationId,
      tags: input.campaignId ? ['campaign'] : [],
    },
    input: { ...input },
  });
}

export function endIngestionTrace(traceId: string, output: IngestionTraceOutput): void {
  endTrace(traceId, { ...output });
}

// ===========================================
// Utility Functions
// ===========================================

/**
 * Wrap an async step in a span. Runs `fn` untraced when no trace is active.
 */
export async function withSpan<T>(
  name: string,
  traceId: string | undefined,
  fn: () => Promise<T>
): Promise<T> {
  const span = traceId ? createSpan(traceId, { name }) : null;
  const startTime = Date.now();

  try {
    const result = await fn();
    endSpan(span, {
      output: { success: true, durationMs: Date.now() - startTime },
      statusMessage: 'Completed successfully',
    });
    return result;
  } catch (error) {
    endSpan(span, {
      output: { success: false, error: String(error), durationMs: Date.now() - startTime },
      statusMessage: String(error),
      level: 'ERROR',
    });
    throw error;
  }
}
