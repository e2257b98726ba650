/**
 * Upstash Redis Client
 *
 * Singleton REST client plus the key layout of the lead store. All keys are
 * namespaced by organization so one tenant's keys never collide with another's.
 *
 * @module redis-client
 */

import { Redis } from '@upstash/redis';

// =============================================================================
// Configuration
// =============================================================================

const KEY_PREFIX = 'leadforge';

export interface RedisConfig {
  url: string;
  token: string;
}

function getConfigFromEnv(): RedisConfig {
  return {
    url: process.env.UPSTASH_REDIS_REST_URL ?? '',
    token: process.env.UPSTASH_REDIS_REST_TOKEN ?? '',
  };
}

// =============================================================================
// Store Interface
// =============================================================================

/**
 * The subset of Redis commands the lead store issues.
 * The Upstash client satisfies it; tests pass an in-memory fake.
 */
export interface RedisStore {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, opts?: { nx: true }): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  sadd(key: string, member: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
}

// =============================================================================
// Redis Client Singleton
// =============================================================================

let redisClient: Redis | null = null;
let isInitialized = false;
let initializationError: string | null = null;

/**
 * Initialize the Redis client. Call during startup.
 */
export function initRedis(config: Partial<RedisConfig> = {}): { success: boolean; error?: string } {
  if (isInitialized) {
    return redisClient ? { success: true } : { success: false, error: initializationError ?? 'Unknown error' };
  }

  isInitialized = true;
  const { url, token } = { ...getConfigFromEnv(), ...config };

  if (!url || !token) {
    initializationError = 'Missing UPSTASH_REDIS_REST_URL or UPSTASH_REDIS_REST_TOKEN';
    console.warn('[redis-client] Redis not configured:', initializationError);
    return { success: false, error: initializationError };
  }

  try {
    redisClient = new Redis({ url, token });
    return { success: true };
  } catch (error) {
    initializationError = error instanceof Error ? error.message : 'Failed to create Redis client';
    console.error('[redis-client] Failed to initialize Redis:', initializationError);
    return { success: false, error: initializationError };
  }
}

/**
 * Get the Redis client as a lead store, or null when not configured
 */
export function getRedisStore(): RedisStore | null {
  if (!isInitialized) {
    initRedis();
  }
  return redisClient;
}

/**
 * Reset the singleton (tests)
 */
export function resetRedis(): void {
  redisClient = null;
  isInitialized = false;
  initializationError = null;
}

// =============================================================================
// Key Builders
// =============================================================================

/** Pattern: leadforge:{orgId}:lead:{leadId} */
export function leadKey(organizationId: string, leadId: string): string {
  return `${KEY_PREFIX}:${organizationId}:lead:${leadId}`;
}

/** Pattern: leadforge:{orgId}:leads (set of lead ids) */
export function leadIndexKey(organizationId: string): string {
  return `${KEY_PREFIX}:${organizationId}:leads`;
}

/** Pattern: leadforge:{orgId}:lead-url:{sha256(canonical url)} */
export function leadDedupKey(organizationId: string, profileUrlHash: string): string {
  return `${KEY_PREFIX}:${organizationId}:lead-url:${profileUrlHash}`;
}
