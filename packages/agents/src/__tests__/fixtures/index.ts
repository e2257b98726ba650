/**
 * Shared test fixtures: entity builders and in-process stand-ins for the
 * external collaborators.
 *
 * @module __tests__/fixtures
 */

import { vi } from 'vitest';
import type {
  GenerateOptions,
  Lead,
  Persona,
  RedisStore,
  TextGenerator,
} from '@leadforge/lib';
import type { ScraperJobSpec, ScraperProvider, ScraperRecord } from '../../interaction-ingest/contracts';

export const ORG_ID = 'org_test';
export const OTHER_ORG_ID = 'org_other';
export const FIXED_NOW = new Date('2025-03-01T12:00:00.000Z');

// ===========================================
// Entity Builders
// ===========================================

export function createLead(overrides: Partial<Lead> = {}): Lead {
  return {
    id: 'lead_test_001',
    organization_id: ORG_ID,
    name: 'Jane Doe',
    profile_url: null,
    title: null,
    company: null,
    location: null,
    email: null,
    phone: null,
    company_size: null,
    company_industry: null,
    company_website: null,
    score: 0,
    status: 'new',
    source: 'manual',
    is_email_verified: false,
    enrichment_status: 'pending',
    enriched_at: null,
    custom_fields: {},
    tags: [],
    notes: null,
    campaign_id: null,
    created_at: FIXED_NOW.toISOString(),
    updated_at: FIXED_NOW.toISOString(),
    ...overrides,
  };
}

export function createPersona(overrides: Partial<Persona> = {}): Persona {
  return {
    id: 'persona_test_001',
    organization_id: ORG_ID,
    name: 'Sales Leaders',
    priority: 5,
    score_bonus: 50,
    is_active: true,
    rules: {},
    ...overrides,
  };
}

// ===========================================
// Text Generator
// ===========================================

type Reply = string | Error | ((prompt: string) => string);

/**
 * Scripted text generator: replies are consumed in order, the last one repeats
 */
export class FakeTextGenerator implements TextGenerator {
  readonly model = 'fake-model';
  readonly prompts: string[] = [];
  readonly options: GenerateOptions[] = [];
  private replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies;
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);
    const reply = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (reply === undefined) {
      throw new Error('FakeTextGenerator has no scripted reply');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(prompt) : reply;
  }
}

// ===========================================
// Scraper
// ===========================================

/**
 * Scraper provider serving canned records per job kind; an Error fails the job
 */
export class FakeScraperProvider implements ScraperProvider {
  readonly jobs: ScraperJobSpec[] = [];

  constructor(private readonly results: Partial<Record<string, ScraperRecord[] | Error>> = {}) {}

  async runJob(job: ScraperJobSpec): Promise<string> {
    this.jobs.push(job);
    return job.kind;
  }

  async fetchResults(ref: string): Promise<ScraperRecord[]> {
    const result = this.results[ref] ?? [];
    if (result instanceof Error) throw result;
    return result;
  }
}

// ===========================================
// Redis
// ===========================================

/**
 * In-memory RedisStore. Each command yields to the event loop first, so
 * concurrent callers interleave the way they would against a server.
 */
export class FakeRedis implements RedisStore {
  readonly values = new Map<string, unknown>();
  readonly sets = new Map<string, Set<string>>();

  async get(key: string): Promise<unknown> {
    await Promise.resolve();
    return this.values.has(key) ? structuredClone(this.values.get(key)) : null;
  }

  async set(key: string, value: unknown, opts?: { nx: true }): Promise<unknown> {
    await Promise.resolve();
    if (opts?.nx && this.values.has(key)) {
      return null;
    }
    this.values.set(key, structuredClone(value));
    return 'OK';
  }

  async del(...keys: string[]): Promise<number> {
    await Promise.resolve();
    let removed = 0;
    for (const key of keys) {
      if (this.values.delete(key)) removed++;
    }
    return removed;
  }

  async sadd(key: string, member: string): Promise<number> {
    await Promise.resolve();
    const set = this.sets.get(key) ?? new Set<string>();
    const added = set.has(member) ? 0 : 1;
    set.add(member);
    this.sets.set(key, set);
    return added;
  }

  async smembers(key: string): Promise<string[]> {
    await Promise.resolve();
    return [...(this.sets.get(key) ?? [])];
  }
}

// ===========================================
// Logging
// ===========================================

/**
 * Logger config that captures parsed entries
 */
export function captureLogs() {
  const entries: Array<Record<string, unknown>> = [];
  const output = vi.fn((message: string) => {
    entries.push(JSON.parse(message));
  });
  return {
    entries,
    config: { level: 'debug' as const, prettyPrint: false, includeTimestamp: false, output },
    events: () => entries.map((entry) => entry.event),
  };
}

export const fixedClock = () => new Date(FIXED_NOW);
