/**
 * Observability Types
 *
 * Type definitions for Langfuse integration and tracing.
 */

import type { LeadId, OrganizationId, SourcePostId } from '../types';

// ===========================================
// Agent Names
// ===========================================

/** Agent names for tracing */
export type AgentName = 'lead_qualifier' | 'interaction_ingest';

// ===========================================
// Trace Types
// ===========================================

/** Trace metadata for agent operations */
export interface TraceMetadata {
  agentName: AgentName;
  organizationId: OrganizationId;
  sessionId?: string;
  tags?: string[];
  environment?: string;
}

/** Input for creating an agent trace */
export interface CreateTraceInput {
  name: string;
  metadata: TraceMetadata;
  input?: Record<string, unknown>;
}

// ===========================================
// Span Types
// ===========================================

/** Span input for creating child observations */
export interface SpanInput {
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
}

/** Span output for ending observations */
export interface SpanOutput {
  output?: unknown;
  statusMessage?: string;
  level?: 'DEBUG' | 'DEFAULT' | 'WARNING' | 'ERROR';
}

// ===========================================
// Domain Trace Types
// ===========================================

/** Lead scoring trace input */
export interface LeadScoringTraceInput {
  organizationId: OrganizationId;
  leadId: LeadId;
  leadData: {
    title?: string | null;
    company?: string | null;
    status?: string;
    source?: string;
  };
}

/** Lead scoring trace output */
export interface LeadScoringTraceOutput {
  score: number;
  method: string;
  qualityTier?: string;
  fallbackReason?: string;
  processingTimeMs: number;
}

/** Ingestion trace input */
export interface IngestionTraceInput {
  organizationId: OrganizationId;
  postId: SourcePostId;
  postUrl: string;
  campaignId?: string | null;
}

/** Ingestion trace output */
export interface IngestionTraceOutput {
  status: 'completed' | 'failed';
  leadsCreated: number;
  interactionsProcessed: number;
  recordsSkipped: number;
  error?: string;
  processingTimeMs: number;
}

// ===========================================
// Configuration Types
// ===========================================

/** Langfuse client configuration */
export interface LangfuseConfig {
  publicKey: string;
  secretKey: string;
  baseUrl?: string;
  enabled?: boolean;
  flushAt?: number;
  flushInterval?: number;
  requestTimeout?: number;
}

/** Environment variable names for Langfuse */
export const LANGFUSE_ENV_VARS = {
  publicKey: 'LANGFUSE_PUBLIC_KEY',
  secretKey: 'LANGFUSE_SECRET_KEY',
  baseUrl: 'LANGFUSE_BASE_URL',
} as const;
