/**
 * Scraper Client & Apify Provider Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { RateLimitError, UpstreamFetchError } from '@leadforge/lib';
import { ApifyScraperProvider, parseRetryAfterMs } from '../../interaction-ingest/apify';
import type { ScraperProvider } from '../../interaction-ingest/contracts';
import { ScraperClient } from '../../interaction-ingest/scraper';
import { FakeScraperProvider } from '../fixtures';

// ===========================================
// Test Helpers
// ===========================================

const POST_URL = 'https://linkedin.com/posts/acme-launch';

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status, headers });
}

// ===========================================
// ScraperClient
// ===========================================

describe('ScraperClient', () => {
  it('normalizes the first post-detail record', async () => {
    const provider = new FakeScraperProvider({
      post_detail: [{ text: 'Launch day', authorName: 'Acme', authorProfileUrl: 'https://linkedin.com/company/acme/' }],
    });
    const client = new ScraperClient(provider);

    const detail = await client.fetchPostDetail(POST_URL);

    expect(detail.text).toBe('Launch day');
    expect(detail.author_name).toBe('Acme');
    expect(detail.author_profile_url).toBe('https://linkedin.com/company/acme');
    expect(provider.jobs).toEqual([{ kind: 'post_detail', postUrl: POST_URL, limit: 1 }]);
  });

  it('treats an empty post-detail dataset as a failure', async () => {
    const client = new ScraperClient(new FakeScraperProvider({ post_detail: [] }));

    await expect(client.fetchPostDetail(POST_URL)).rejects.toThrow(
      `fetch_post_detail failed: no post detail returned for ${POST_URL}`
    );
  });

  it('accepts empty comment and reaction lists', async () => {
    const client = new ScraperClient(new FakeScraperProvider({}));

    await expect(client.fetchComments(POST_URL)).resolves.toEqual([]);
    await expect(client.fetchReactions(POST_URL)).resolves.toEqual([]);
  });

  it('applies the page sizes', async () => {
    const comments = [{ text: 'a' }, { text: 'b' }, { text: 'c' }];
    const provider = new FakeScraperProvider({ comments });
    const client = new ScraperClient(provider, { commentsPageSize: 2, reactionsPageSize: 5 });

    const result = await client.fetchComments(POST_URL);
    await client.fetchReactions(POST_URL);

    expect(result).toEqual([{ text: 'a' }, { text: 'b' }]);
    expect(provider.jobs.map((job) => job.limit)).toEqual([2, 5]);
  });

  it('tags provider failures with the step', async () => {
    const client = new ScraperClient(new FakeScraperProvider({ reactions: new Error('actor crashed') }));

    const error = await client.fetchReactions(POST_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(UpstreamFetchError);
    expect(error).toMatchObject({
      step: 'fetch_reactions',
      code: 'UPSTREAM_FETCH_FAILED',
      message: 'fetch_reactions failed: actor crashed',
    });
  });

  it('times out slow jobs', async () => {
    const provider: ScraperProvider = {
      runJob: () => new Promise<string>(() => undefined),
      fetchResults: async () => [],
    };
    const client = new ScraperClient(provider, { timeoutMs: 10 });

    await expect(client.fetchComments(POST_URL)).rejects.toThrow(
      'fetch_comments failed: fetch_comments timed out after 10ms'
    );
  });

  it('aborts the provider request when the job times out', async () => {
    const signals: Array<AbortSignal | undefined> = [];
    const provider: ScraperProvider = {
      runJob: (_job, signal) => {
        signals.push(signal);
        return new Promise<string>(() => undefined);
      },
      fetchResults: async () => [],
    };
    const client = new ScraperClient(provider, { timeoutMs: 10 });

    await expect(client.fetchReactions(POST_URL)).rejects.toThrow('fetch_reactions timed out after 10ms');

    expect(signals).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(true);
  });

  it('hands the same signal to the result fetch', async () => {
    const signals: Array<AbortSignal | undefined> = [];
    const provider: ScraperProvider = {
      runJob: async (_job, signal) => {
        signals.push(signal);
        return 'ds-1';
      },
      fetchResults: async (_ref, signal) => {
        signals.push(signal);
        return [{ text: 'hi' }];
      },
    };
    const client = new ScraperClient(provider);

    await expect(client.fetchComments(POST_URL)).resolves.toEqual([{ text: 'hi' }]);

    expect(signals).toHaveLength(2);
    expect(signals[0]).toBeInstanceOf(AbortSignal);
    expect(signals[1]).toBe(signals[0]);
    expect(signals[0]?.aborted).toBe(false);
  });
});

// ===========================================
// ApifyScraperProvider
// ===========================================

describe('ApifyScraperProvider', () => {
  it('runs the actor for the job kind and returns the dataset id', async () => {
    const fetchMock = vi.fn(async () =>
      jsonResponse(201, { data: { id: 'run-1', status: 'SUCCEEDED', defaultDatasetId: 'ds-1' } })
    );
    const provider = new ApifyScraperProvider({
      token: 'test-token',
      fetch: fetchMock,
      baseUrl: 'https://apify.test/v2',
      waitForFinishSecs: 30,
    });

    const datasetId = await provider.runJob({ kind: 'comments', postUrl: POST_URL, limit: 50 });

    expect(datasetId).toBe('ds-1');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://apify.test/v2/acts/curious_programmer~linkedin-post-comments-scraper/runs?waitForFinish=30',
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-token' },
        body: JSON.stringify({ postUrl: POST_URL, limit: 50 }),
      }
    );
  });

  it('fails when the run did not succeed', async () => {
    const provider = new ApifyScraperProvider({
      token: 'test-token',
      fetch: async () => jsonResponse(201, { data: { id: 'run-2', status: 'TIMED-OUT', defaultDatasetId: 'ds-2' } }),
    });

    await expect(provider.runJob({ kind: 'post_detail', postUrl: POST_URL })).rejects.toThrow(
      'post_detail failed: Apify run run-2 finished with status TIMED-OUT'
    );
  });

  it('reads dataset items', async () => {
    const items = [{ text: 'First!', profileUrl: 'https://linkedin.com/in/ana', name: 'Ana' }];
    const fetchMock = vi.fn(async () => jsonResponse(200, items));
    const provider = new ApifyScraperProvider({ token: 'test-token', fetch: fetchMock, baseUrl: 'https://apify.test/v2' });

    await expect(provider.fetchResults('ds-1')).resolves.toEqual(items);
    expect(fetchMock).toHaveBeenCalledWith('https://apify.test/v2/datasets/ds-1/items?clean=true&format=json', {
      headers: { Authorization: 'Bearer test-token' },
    });
  });

  it('rejects a dataset that is not a list of records', async () => {
    const provider = new ApifyScraperProvider({ token: 'test-token', fetch: async () => jsonResponse(200, ['x']) });

    await expect(provider.fetchResults('ds-9')).rejects.toThrow('dataset failed: invalid items in dataset ds-9');
  });

  it('maps 429 to a rate-limit error', async () => {
    const provider = new ApifyScraperProvider({
      token: 'test-token',
      fetch: async () => jsonResponse(429, {}, { 'Retry-After': '3' }),
    });

    const error = await provider.fetchResults('ds-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfterMs: 3000 });
  });

  it('leaves the delay to the caller when Retry-After is an HTTP date', async () => {
    const provider = new ApifyScraperProvider({
      token: 'test-token',
      fetch: async () => jsonResponse(429, {}, { 'Retry-After': 'Wed, 21 Oct 2026 07:28:00 GMT' }),
    });

    const error = await provider.fetchResults('ds-1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ retryAfterMs: undefined });
  });

  it('passes the abort signal to fetch', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => jsonResponse(200, []));
    const provider = new ApifyScraperProvider({ token: 'test-token', fetch: fetchMock });
    const controller = new AbortController();

    await provider.fetchResults('ds-1', controller.signal);

    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
  });
});

describe('parseRetryAfterMs', () => {
  it('reads delay-seconds', () => {
    expect(parseRetryAfterMs('3')).toBe(3000);
    expect(parseRetryAfterMs(' 0 ')).toBe(0);
  });

  it('ignores missing or non-numeric values', () => {
    expect(parseRetryAfterMs(null)).toBeUndefined();
    expect(parseRetryAfterMs('')).toBeUndefined();
    expect(parseRetryAfterMs('Wed, 21 Oct 2026 07:28:00 GMT')).toBeUndefined();
    expect(parseRetryAfterMs('soon')).toBeUndefined();
  });

  it('maps other error statuses to fetch failures', async () => {
    const provider = new ApifyScraperProvider({ token: 'test-token', fetch: async () => jsonResponse(500, {}) });

    await expect(provider.fetchResults('ds-1')).rejects.toThrow('dataset failed: Apify API error: 500');
  });
});
