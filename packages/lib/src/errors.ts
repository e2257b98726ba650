/**
 * Error taxonomy shared by the scoring and ingestion packages.
 *
 * Fatal errors (tenant mismatch, upstream fetch failure) propagate to the
 * workflow boundary. Degradable errors (provider unavailable, rate limited,
 * malformed output, timeout) are caught by the caller and replaced with a
 * rule-based result.
 *
 * @module errors
 */

import { ZodError } from 'zod';

// ===========================================
// Error Codes
// ===========================================

export const ErrorCodes = {
  // Data access
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  TENANT_MISMATCH: 'TENANT_MISMATCH',

  // External collaborators
  PROVIDER_UNAVAILABLE: 'PROVIDER_UNAVAILABLE',
  RATE_LIMITED: 'RATE_LIMITED',
  MALFORMED_OUTPUT: 'MALFORMED_OUTPUT',
  UPSTREAM_FETCH_FAILED: 'UPSTREAM_FETCH_FAILED',
  TIMEOUT: 'TIMEOUT',

  // Startup
  CONFIG_ERROR: 'CONFIG_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ===========================================
// Error Classes
// ===========================================

export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, ErrorCodes.NOT_FOUND, { resource, id });
    this.name = 'NotFoundError';
  }
}

export class TenantAccessError extends AppError {
  constructor(resource: string, id: string, organizationId: string) {
    super(
      `${resource} ${id} does not belong to organization ${organizationId}`,
      ErrorCodes.TENANT_MISMATCH,
      { resource, id, organizationId }
    );
    this.name = 'TenantAccessError';
  }
}

export class ProviderUnavailableError extends AppError {
  constructor(message = 'Text generation provider is not configured') {
    super(message, ErrorCodes.PROVIDER_UNAVAILABLE);
    this.name = 'ProviderUnavailableError';
  }
}

export class RateLimitError extends AppError {
  constructor(message: string, public retryAfterMs?: number) {
    super(message, ErrorCodes.RATE_LIMITED, retryAfterMs !== undefined ? { retryAfterMs } : undefined);
    this.name = 'RateLimitError';
  }
}

export class MalformedOutputError extends AppError {
  constructor(message: string, public rawText?: string) {
    super(message, ErrorCodes.MALFORMED_OUTPUT);
    this.name = 'MalformedOutputError';
  }
}

export class UpstreamFetchError extends AppError {
  constructor(public readonly step: string, message: string) {
    super(`${step} failed: ${message}`, ErrorCodes.UPSTREAM_FETCH_FAILED, { step });
    this.name = 'UpstreamFetchError';
  }
}

export class TimeoutError extends AppError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, ErrorCodes.TIMEOUT, { operation, timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

// ===========================================
// Helpers
// ===========================================

/**
 * Error code of an AppError, 'UNKNOWN' for anything else
 */
export function errorCode(error: unknown): string {
  return error instanceof AppError ? error.code : 'UNKNOWN';
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format Zod validation errors as a field -> messages map
 */
export function formatZodError(error: ZodError): Record<string, string[]> {
  const formatted: Record<string, string[]> = {};

  for (const issue of error.issues) {
    const key = issue.path.join('.') || 'root';
    if (!formatted[key]) {
      formatted[key] = [];
    }
    formatted[key].push(issue.message);
  }

  return formatted;
}
