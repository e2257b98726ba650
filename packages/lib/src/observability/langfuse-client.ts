/**
 * Langfuse Client Singleton
 *
 * Tracing is opt-in: without LANGFUSE_PUBLIC_KEY and LANGFUSE_SECRET_KEY
 * every helper in this module is a no-op.
 */

import { Langfuse } from 'langfuse';
import type { LangfuseConfig } from './types';
import { LANGFUSE_ENV_VARS } from './types';

// ===========================================
// Singleton Instance
// ===========================================

let langfuseInstance: Langfuse | null = null;
let initAttempted = false;

function getConfigFromEnv(): Partial<LangfuseConfig> {
  return {
    publicKey: process.env[LANGFUSE_ENV_VARS.publicKey],
    secretKey: process.env[LANGFUSE_ENV_VARS.secretKey],
    baseUrl: process.env[LANGFUSE_ENV_VARS.baseUrl] || 'https://cloud.langfuse.com',
    enabled: process.env.LANGFUSE_ENABLED !== 'false',
  };
}

/**
 * Initialize the Langfuse client singleton
 *
 * @returns The client, or null when disabled or missing credentials
 */
export function initLangfuse(config: Partial<LangfuseConfig> = {}): Langfuse | null {
  if (langfuseInstance) {
    return langfuseInstance;
  }
  initAttempted = true;

  const finalConfig = { ...getConfigFromEnv(), ...config };
  if (!finalConfig.publicKey || !finalConfig.secretKey || finalConfig.enabled === false) {
    return null;
  }

  try {
    langfuseInstance = new Langfuse({
      publicKey: finalConfig.publicKey,
      secretKey: finalConfig.secretKey,
      baseUrl: finalConfig.baseUrl,
      flushAt: finalConfig.flushAt ?? 15,
      flushInterval: finalConfig.flushInterval ?? 10000,
      requestTimeout: finalConfig.requestTimeout ?? 10000,
    });
    console.info('[Langfuse] Client initialized.');
    return langfuseInstance;
  } catch (error) {
    console.error('[Langfuse] Failed to initialize client:', error);
    return null;
  }
}

/**
 * Get the client, initializing from the environment on first use
 */
export function getLangfuse(): Langfuse | null {
  if (langfuseInstance) {
    return langfuseInstance;
  }
  return initAttempted ? null : initLangfuse();
}

export function isLangfuseEnabled(): boolean {
  return langfuseInstance !== null;
}

/**
 * Flush pending events. Call before process exit.
 */
export async function flushLangfuse(): Promise<void> {
  if (!langfuseInstance) return;
  try {
    await langfuseInstance.flushAsync();
  } catch (error) {
    console.error('[Langfuse] Failed to flush events:', error);
  }
}

export async function shutdownLangfuse(): Promise<void> {
  if (!langfuseInstance) return;
  try {
    await langfuseInstance.shutdownAsync();
  } catch (error) {
    console.error('[Langfuse] Failed to shutdown client:', error);
  } finally {
    langfuseInstance = null;
  }
}

/**
 * Reset the singleton (tests)
 */
export function resetLangfuse(): void {
  langfuseInstance = null;
  initAttempted = false;
}
