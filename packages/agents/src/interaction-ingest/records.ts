/**
 * Scraper Record Normalization
 *
 * Turns untyped scraper records into interaction candidates. Each field is
 * read from the first key of its fallback list that holds a non-empty
 * string; nested keys use dot paths. Records without an actor name or a
 * usable profile URL are rejected with a reason and never abort siblings.
 *
 * @module interaction-ingest/records
 */

import { canonicalizeProfileUrl } from '@leadforge/lib';
import type { InteractionType } from '@leadforge/lib';
import { CONTENT_KEYS, HEADLINE_KEYS, NAME_KEYS, PROFILE_URL_KEYS } from './contracts/scraper';
import type { PostDetail, ScraperRecord } from './contracts/scraper';

// ===========================================
// Types
// ===========================================

export interface NormalizedRecord {
  type: InteractionType;
  /** Canonical profile URL */
  profile_url: string;
  name: string;
  headline: string | null;
  content: string | null;
  raw: ScraperRecord;
}

export type NormalizeOutcome =
  | { ok: true; record: NormalizedRecord }
  | { ok: false; reason: string };

const POST_AUTHOR_NAME_KEYS = ['authorFullName', 'authorName', 'author.name'];
const POST_AUTHOR_URL_KEYS = ['authorProfileUrl', 'author.profileUrl', 'author.url'];

// ===========================================
// Field Access
// ===========================================

export function readPath(record: ScraperRecord, path: string): unknown {
  let value: unknown = record;
  for (const part of path.split('.')) {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return undefined;
    value = Reflect.get(value, part);
  }
  return value;
}

/**
 * First non-empty string among the keys, trimmed
 */
export function pickString(record: ScraperRecord, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = readPath(record, key);
    if (typeof value === 'string' && value.trim() !== '') {
      return value.trim();
    }
  }
  return null;
}

function isPresent(record: ScraperRecord, key: string): boolean {
  const value = record[key];
  return value !== undefined && value !== null && value !== '';
}

// ===========================================
// Classification
// ===========================================

/**
 * Comment when there is text and the record is not the post itself;
 * reaction when a reaction type is set; post_author for the post record;
 * profile_visit otherwise.
 */
export function detectInteractionType(record: ScraperRecord): InteractionType {
  const isPost = record.type === 'Post';
  if (!isPost && pickString(record, ['text']) !== null) return 'comment';
  if (isPresent(record, 'reactionType')) return 'reaction';
  if (isPost || isPresent(record, 'postContent')) return 'post_author';
  return 'profile_visit';
}

// ===========================================
// Normalization
// ===========================================

export function normalizeRecord(raw: ScraperRecord): NormalizeOutcome {
  const url = pickString(raw, PROFILE_URL_KEYS);
  if (!url) return { ok: false, reason: 'missing profile URL' };

  const profileUrl = canonicalizeProfileUrl(url);
  if (!profileUrl) return { ok: false, reason: 'invalid profile URL' };

  const name = pickString(raw, NAME_KEYS);
  if (!name) return { ok: false, reason: 'missing actor name' };

  return {
    ok: true,
    record: {
      type: detectInteractionType(raw),
      profile_url: profileUrl,
      name,
      headline: pickString(raw, HEADLINE_KEYS),
      content: pickString(raw, CONTENT_KEYS),
      raw,
    },
  };
}

export function normalizePostDetail(raw: ScraperRecord): PostDetail {
  return {
    author_name: pickString(raw, POST_AUTHOR_NAME_KEYS),
    author_profile_url: canonicalizeProfileUrl(pickString(raw, POST_AUTHOR_URL_KEYS)),
    text: pickString(raw, CONTENT_KEYS),
    raw,
  };
}
