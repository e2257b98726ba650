/**
 * Bounded Retry and Timeouts
 *
 * Rate-limited provider calls are retried with a fixed backoff. Both the
 * attempt count and the total time spent waiting are capped, so a stuck
 * provider surfaces a failure instead of stalling the caller.
 *
 * @module retry
 */

import { RateLimitError, TimeoutError } from './errors';

// ===========================================
// Types
// ===========================================

export interface RateLimitRetryConfig {
  /** Maximum number of attempts, including the first */
  maxAttempts: number;
  /** Fixed delay between rate-limited attempts */
  delayMs: number;
  /** Hard cap on the sum of all delays */
  maxTotalWaitMs: number;
}

export const DEFAULT_RATE_LIMIT_RETRY_CONFIG: RateLimitRetryConfig = {
  maxAttempts: 3,
  delayMs: 60_000,
  maxTotalWaitMs: 120_000,
};

export interface RetryHooks {
  /** Called before each wait */
  onRetry?: (attempt: number, delayMs: number, error: RateLimitError) => void;
  /** Injectable sleep (tests pass an immediate one) */
  sleep?: (ms: number) => Promise<void>;
}

// ===========================================
// Helpers
// ===========================================

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Detect rate-limit signals in arbitrary provider errors
 */
export function isRateLimitSignal(error: unknown): boolean {
  if (error instanceof RateLimitError) return true;
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('429') || message.toLowerCase().includes('quota');
}

/**
 * Normalize a thrown value into a RateLimitError when it carries a rate-limit signal
 */
export function toRateLimitError(error: unknown): RateLimitError | null {
  if (error instanceof RateLimitError) return error;
  if (!isRateLimitSignal(error)) return null;
  const message = error instanceof Error ? error.message : String(error);
  return new RateLimitError(message);
}

// ===========================================
// Retry
// ===========================================

/**
 * Run `fn`, retrying on rate-limit signals with a fixed backoff.
 * Any other error is rethrown immediately.
 */
export async function withRateLimitRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RateLimitRetryConfig> = {},
  hooks: RetryHooks = {}
): Promise<T> {
  const { maxAttempts, delayMs, maxTotalWaitMs } = {
    ...DEFAULT_RATE_LIMIT_RETRY_CONFIG,
    ...config,
  };
  const wait = hooks.sleep ?? sleep;
  let totalWaitMs = 0;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const rateLimit = toRateLimitError(error);
      if (!rateLimit) throw error;

      const nextDelay = rateLimit.retryAfterMs ?? delayMs;
      if (attempt >= maxAttempts || totalWaitMs + nextDelay > maxTotalWaitMs) {
        throw rateLimit;
      }

      hooks.onRetry?.(attempt, nextDelay, rateLimit);
      totalWaitMs += nextDelay;
      await wait(nextDelay);
    }
  }
}

/**
 * Race `fn` against a timer. The signal is aborted when the timer wins.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}
