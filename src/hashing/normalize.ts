/**
 * URL and content normalization for deduplication
 *
 * Two inputs a reader would call "the same link" or "the same article"
 * must normalize to the same string. Every function here is pure and
 * idempotent: f(f(x)) === f(x).
 */

import crypto from 'crypto';
import { ValidationError } from '../errors/index.js';
import type { DedupHashes } from '../types/index.js';

/**
 * Query parameters added by campaign and click trackers
 */
export const TRACKING_PARAMS: ReadonlySet<string> = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'msclkid',
  '_ga',
  'mc_cid',
  'mc_eid',
]);

function stripTrackingParams(search: string): string {
  return search
    .replace(/^\?/, '')
    .split('&')
    .filter((segment) => {
      if (!segment) return false;
      const key = segment.split('=', 1)[0] ?? '';
      return !TRACKING_PARAMS.has(key.toLowerCase());
    })
    .join('&');
}

/**
 * Normalize a URL for deduplication.
 *
 * Lowercases scheme and host, drops default ports and the fragment,
 * strips tracking parameters and trailing slashes. Remaining path and
 * query order are left as they are.
 *
 * @example
 * normalizeUrl('https://Example.com:443/path/?utm_source=x&id=123#top')
 * // => 'https://example.com/path?id=123'
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    throw new ValidationError(`Invalid URL: ${url}`);
  }

  // URL already lowercases scheme/host and drops default ports
  const path = parsed.pathname.replace(/\/+$/, '') || '/';
  const query = stripTrackingParams(parsed.search);

  return `${parsed.protocol}//${parsed.host}${path}${query ? `?${query}` : ''}`;
}

/**
 * Normalize article text: lowercase, collapse whitespace, trim.
 * Punctuation is kept, so "Hello world!!" and "Hello world" differ.
 */
export function normalizeContent(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * SHA-256 hex digest (64 chars)
 */
export function hashText(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

export function urlHash(url: string): string {
  return hashText(normalizeUrl(url));
}

export function contentHash(text: string): string {
  return hashText(normalizeContent(text));
}

/**
 * All dedup keys for one article
 */
export function computeDedupHashes(url: string, content: string): DedupHashes {
  const sourceUrlNormalized = normalizeUrl(url);
  return {
    sourceUrlNormalized,
    urlHash: hashText(sourceUrlNormalized),
    contentHash: contentHash(content),
  };
}
