/**
 * Scraper Contract
 *
 * The scraping collaborator runs jobs and returns untyped key-value
 * records. Field names vary between scrapers; normalization reads them
 * through ordered fallback lists.
 *
 * @module interaction-ingest/contracts/scraper
 */

import { z } from 'zod';

export const ScraperRecordSchema = z.record(z.unknown());
export type ScraperRecord = z.infer<typeof ScraperRecordSchema>;

export type ScraperJobKind = 'post_detail' | 'comments' | 'reactions';

export interface ScraperJobSpec {
  kind: ScraperJobKind;
  postUrl: string;
  /** Upper bound on returned records */
  limit?: number;
}

export interface ScraperProvider {
  /** Start a job and return a reference to its results. Aborting the signal cancels in-flight requests. */
  runJob(job: ScraperJobSpec, signal?: AbortSignal): Promise<string>;
  fetchResults(ref: string, signal?: AbortSignal): Promise<ScraperRecord[]>;
}

export interface PostDetail {
  author_name: string | null;
  author_profile_url: string | null;
  text: string | null;
  raw: ScraperRecord;
}

// ===========================================
// Fallback Keys
// ===========================================

export const PROFILE_URL_KEYS = ['authorProfileUrl', 'profileUrl', 'url', 'linkedInUrl', 'author.profileUrl'];
export const NAME_KEYS = ['authorFullName', 'fullName', 'name', 'title', 'author.name'];
export const HEADLINE_KEYS = ['authorHeadline', 'headline', 'subTitle', 'author.headline'];
export const CONTENT_KEYS = ['text', 'comment', 'postContent'];
