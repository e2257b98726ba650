/**
 * Scraper Client
 *
 * Wraps a ScraperProvider with per-call timeouts and maps every failure to
 * UpstreamFetchError tagged with the workflow step. A post-detail job that
 * returns nothing is a failure; empty comment or reaction lists are not.
 *
 * @module interaction-ingest/scraper
 */

import { UpstreamFetchError, errorMessage, withTimeout } from '@leadforge/lib';
import type { ScraperJobSpec, ScraperProvider, ScraperRecord, PostDetail } from './contracts/scraper';
import { normalizePostDetail } from './records';

export type FetchStep = 'fetch_post_detail' | 'fetch_comments' | 'fetch_reactions';

export interface ScraperClientConfig {
  /** Timeout for one job plus its result fetch */
  timeoutMs: number;
  commentsPageSize: number;
  reactionsPageSize: number;
}

export const DEFAULT_SCRAPER_CLIENT_CONFIG: ScraperClientConfig = {
  timeoutMs: 120_000,
  commentsPageSize: 100,
  reactionsPageSize: 100,
};

export class ScraperClient {
  private config: ScraperClientConfig;

  constructor(
    private readonly provider: ScraperProvider,
    config: Partial<ScraperClientConfig> = {}
  ) {
    this.config = { ...DEFAULT_SCRAPER_CLIENT_CONFIG, ...config };
  }

  /**
   * @throws UpstreamFetchError when the job fails or yields no record
   */
  async fetchPostDetail(postUrl: string): Promise<PostDetail> {
    const records = await this.run('fetch_post_detail', { kind: 'post_detail', postUrl, limit: 1 });
    const first = records[0];
    if (!first) {
      throw new UpstreamFetchError('fetch_post_detail', `no post detail returned for ${postUrl}`);
    }
    return normalizePostDetail(first);
  }

  fetchComments(postUrl: string): Promise<ScraperRecord[]> {
    return this.run('fetch_comments', { kind: 'comments', postUrl, limit: this.config.commentsPageSize });
  }

  fetchReactions(postUrl: string): Promise<ScraperRecord[]> {
    return this.run('fetch_reactions', { kind: 'reactions', postUrl, limit: this.config.reactionsPageSize });
  }

  private async run(step: FetchStep, job: ScraperJobSpec): Promise<ScraperRecord[]> {
    try {
      const records = await withTimeout(step, this.config.timeoutMs, async (signal) => {
        const ref = await this.provider.runJob(job, signal);
        return this.provider.fetchResults(ref, signal);
      });
      // Providers may ignore the limit
      return job.limit === undefined ? records : records.slice(0, job.limit);
    } catch (error) {
      if (error instanceof UpstreamFetchError && error.step === step) throw error;
      throw new UpstreamFetchError(step, errorMessage(error));
    }
  }
}

export function createScraperClient(
  provider: ScraperProvider,
  config?: Partial<ScraperClientConfig>
): ScraperClient {
  return new ScraperClient(provider, config);
}
