/**
 * Profile URL canonicalization. The canonical form is the lead dedup key.
 *
 * @module profile-url
 */

import { createHash } from 'node:crypto';

/**
 * Canonicalize a profile URL: https scheme, lowercase host without `www.`,
 * no query or fragment, no trailing slash. Returns null for unparsable input.
 */
export function canonicalizeProfileUrl(raw: string | null | undefined): string | null {
  if (!raw) return null;
  const trimmed = raw.trim();
  if (!trimmed) return null;

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;

  let url: URL;
  try {
    url = new URL(withScheme);
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }

  const host = url.hostname.toLowerCase().replace(/^www\./, '');
  const path = url.pathname.replace(/\/+$/, '');
  return `https://${host}${path}`;
}

/**
 * SHA-256 of the canonical URL, used where the URL itself is too long for a key
 */
export function hashProfileUrl(canonicalUrl: string): string {
  return createHash('sha256').update(canonicalUrl).digest('hex');
}
