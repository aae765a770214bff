/**
 * Hashing Module
 *
 * Dedup keys and slugs
 */

export {
  normalizeUrl,
  normalizeContent,
  hashText,
  urlHash,
  contentHash,
  computeDedupHashes,
  TRACKING_PARAMS,
} from './normalize.js';

export { slugify } from './slugify.js';
