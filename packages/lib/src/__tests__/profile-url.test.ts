/**
 * Profile URL Tests
 */

import { describe, it, expect } from 'vitest';
import { canonicalizeProfileUrl, hashProfileUrl } from '../profile-url';

describe('canonicalizeProfileUrl', () => {
  it('normalizes scheme, host, query and trailing slash', () => {
    expect(canonicalizeProfileUrl('http://www.LinkedIn.com/in/jane/?utm_source=x#top')).toBe(
      'https://linkedin.com/in/jane'
    );
  });

  it('adds a scheme when missing', () => {
    expect(canonicalizeProfileUrl('linkedin.com/in/jane')).toBe('https://linkedin.com/in/jane');
  });

  it('maps equivalent spellings to one key', () => {
    const a = canonicalizeProfileUrl('https://linkedin.com/in/jane');
    const b = canonicalizeProfileUrl('  https://www.linkedin.com/in/jane/  ');
    expect(a).toBe(b);
  });

  it('returns null for empty or unusable input', () => {
    expect(canonicalizeProfileUrl(undefined)).toBeNull();
    expect(canonicalizeProfileUrl('   ')).toBeNull();
    expect(canonicalizeProfileUrl('ftp://files.example.com/in/jane')).toBeNull();
    expect(canonicalizeProfileUrl('not a url')).toBeNull();
  });
});

describe('hashProfileUrl', () => {
  it('is a stable hex digest', () => {
    const hash = hashProfileUrl('https://linkedin.com/in/jane');
    expect(hash).toMatch(/^[0-9a-f]{64}$/);
    expect(hashProfileUrl('https://linkedin.com/in/jane')).toBe(hash);
    expect(hashProfileUrl('https://linkedin.com/in/john')).not.toBe(hash);
  });
});
