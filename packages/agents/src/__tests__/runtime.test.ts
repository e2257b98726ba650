/**
 * Pipeline Runtime Tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../config';
import { createInMemoryRepositories } from '../repository';
import { createPipelineRuntime } from '../runtime';
import { FakeScraperProvider, FakeTextGenerator, ORG_ID, fixedClock } from './fixtures';

const QUIET = { LOG_LEVEL: 'error' };

describe('createPipelineRuntime', () => {
  it('runs without a provider or scraper', () => {
    const runtime = createPipelineRuntime(loadConfig(QUIET), {
      repositories: createInMemoryRepositories(),
      generator: null,
    });

    expect(runtime.orchestrator.aiEnabled).toBe(false);
    expect(runtime.ingestion).toBeNull();
  });

  it('enables the AI path when a generator is given', () => {
    const runtime = createPipelineRuntime(loadConfig(QUIET), {
      repositories: createInMemoryRepositories(),
      generator: new FakeTextGenerator('{}'),
    });

    expect(runtime.orchestrator.aiEnabled).toBe(true);
  });

  it('disables the AI path when scoring is turned off', () => {
    const runtime = createPipelineRuntime(
      loadConfig({ ...QUIET, ANTHROPIC_API_KEY: 'test-key', AI_SCORING_ENABLED: 'false' }),
      { repositories: createInMemoryRepositories() }
    );

    expect(runtime.orchestrator.aiEnabled).toBe(false);
  });

  it('wires ingestion and scoring over shared repositories', async () => {
    const runtime = createPipelineRuntime(loadConfig({ ...QUIET, QUALIFICATION_THRESHOLD: '30' }), {
      repositories: createInMemoryRepositories({ now: fixedClock }),
      generator: null,
      scraper: new FakeScraperProvider({
        post_detail: [{ text: 'Hiring advice?' }],
        comments: [{ profileUrl: 'https://linkedin.com/in/kim', fullName: 'Kim Lee', headline: 'Sales Director', text: 'Following' }],
      }),
      now: fixedClock,
    });

    const result = await runtime.ingestion?.ingestInteractions(ORG_ID, { postUrl: 'https://linkedin.com/posts/p1' });
    await runtime.queue.onIdle();
    const [lead] = await runtime.repositories.leads.list(ORG_ID);
    // Sales Director with a profile URL, status new, post-analysis source: 90, 40, 50, 50
    const score = lead ? await runtime.orchestrator.calculateScore(ORG_ID, lead) : null;

    await runtime.shutdown();

    expect(result?.leads_created).toBe(1);
    expect(lead?.score).toBe(35);
    expect(score).toBe(64);
  });
});
