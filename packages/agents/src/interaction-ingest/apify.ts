/**
 * Apify Scraper Provider
 *
 * Runs one Apify actor per job kind through the REST API, waiting for the
 * run to finish, and reads the run's default dataset.
 *
 * @module interaction-ingest/apify
 */

import { z } from 'zod';
import { RateLimitError, UpstreamFetchError } from '@leadforge/lib';
import { ScraperRecordSchema } from './contracts/scraper';
import type { ScraperJobKind, ScraperJobSpec, ScraperProvider, ScraperRecord } from './contracts/scraper';

const APIFY_API_URL = 'https://api.apify.com/v2';

export interface ApifyProviderConfig {
  token: string;
  /** Actor id per job kind, e.g. "username~actor-name" */
  actors: Record<ScraperJobKind, string>;
  /** Seconds the API holds the request open for the run to finish */
  waitForFinishSecs: number;
  baseUrl: string;
  fetch: typeof fetch;
}

export const DEFAULT_APIFY_ACTORS: Record<ScraperJobKind, string> = {
  post_detail: 'curious_programmer~linkedin-post-scraper',
  comments: 'curious_programmer~linkedin-post-comments-scraper',
  reactions: 'curious_programmer~linkedin-post-reactions-scraper',
};

const RunResponseSchema = z.object({
  data: z.object({
    id: z.string(),
    status: z.string(),
    defaultDatasetId: z.string(),
  }),
});

const DatasetItemsSchema = z.array(ScraperRecordSchema);

/**
 * Retry-After in delay-seconds form. Anything else (an HTTP date, garbage)
 * yields undefined so the caller's default delay applies.
 */
export function parseRetryAfterMs(header: string | null): number | undefined {
  if (header === null || !/^\s*\d+\s*$/.test(header)) return undefined;
  const seconds = Number.parseInt(header, 10);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
}

export class ApifyScraperProvider implements ScraperProvider {
  private config: ApifyProviderConfig;

  constructor(config: Pick<ApifyProviderConfig, 'token'> & Partial<ApifyProviderConfig>) {
    this.config = {
      actors: DEFAULT_APIFY_ACTORS,
      waitForFinishSecs: 120,
      baseUrl: APIFY_API_URL,
      fetch: globalThis.fetch,
      ...config,
    };
  }

  /**
   * Start the actor and wait for it; returns the dataset id
   */
  async runJob(job: ScraperJobSpec, signal?: AbortSignal): Promise<string> {
    const actorId = this.config.actors[job.kind];
    const url = `${this.config.baseUrl}/acts/${encodeURIComponent(actorId)}/runs?waitForFinish=${this.config.waitForFinishSecs}`;
    const input: Record<string, unknown> = { postUrl: job.postUrl };
    if (job.limit !== undefined) input.limit = job.limit;

    const body = await this.request(job.kind, url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.config.token}`,
      },
      body: JSON.stringify(input),
      signal,
    });

    const parsed = RunResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamFetchError(job.kind, 'invalid run response from Apify');
    }
    const run = parsed.data.data;
    if (run.status !== 'SUCCEEDED') {
      throw new UpstreamFetchError(job.kind, `Apify run ${run.id} finished with status ${run.status}`);
    }
    return run.defaultDatasetId;
  }

  async fetchResults(datasetId: string, signal?: AbortSignal): Promise<ScraperRecord[]> {
    const url = `${this.config.baseUrl}/datasets/${encodeURIComponent(datasetId)}/items?clean=true&format=json`;
    const body = await this.request('dataset', url, {
      headers: { Authorization: `Bearer ${this.config.token}` },
      signal,
    });

    const parsed = DatasetItemsSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamFetchError('dataset', `invalid items in dataset ${datasetId}`);
    }
    return parsed.data;
  }

  private async request(step: string, url: string, init: RequestInit): Promise<unknown> {
    const response = await this.config.fetch(url, init);

    if (response.status === 429) {
      throw new RateLimitError('Apify rate limit exceeded', parseRetryAfterMs(response.headers.get('Retry-After')));
    }
    if (!response.ok) {
      throw new UpstreamFetchError(step, `Apify API error: ${response.status}`);
    }

    return response.json();
  }
}

export function createApifyScraperProvider(
  config: Pick<ApifyProviderConfig, 'token'> & Partial<ApifyProviderConfig>
): ApifyScraperProvider {
  return new ApifyScraperProvider(config);
}
