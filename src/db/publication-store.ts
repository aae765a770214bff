/**
 * Publication store (PostgreSQL)
 *
 * Bound to whatever Queryable it is given; inside a publish unit of work
 * that is the transaction's client, so the insert commits or rolls back
 * together with the staging link.
 */

import { AlreadyPublishedError } from '../errors/index.js';
import { isRecord } from '../utils/guards.js';
import { getErrorCode, runQuery, type Queryable } from './index.js';
import type { NewPublication, PublicationRef } from '../types/index.js';
import type { PublicationWriter } from '../staging/repository.js';

export class PgPublicationStore implements PublicationWriter {
  constructor(private readonly db: Queryable) {}

  /**
   * A taken slug leaves no row and no aborted transaction; a second
   * publication for the same item is AlreadyPublished.
   */
  async createPublication(input: NewPublication): Promise<PublicationRef | null> {
    const result = await runQuery<{ id: string; slug: string }>(
      this.db,
      `INSERT INTO publications (
         scraping_item_id, state, slug, title, summary, body, category, tags,
         content_sin_vueltas, content_lo_central, content_en_profundidad,
         media, signing_identity, published_by, origin_type, published_at
       ) VALUES ($1, 'published', $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, 'detected_media', $14)
       ON CONFLICT (slug) DO NOTHING
       RETURNING id, slug`,
      [
        input.scrapingItemId,
        input.slug,
        input.title,
        input.summary,
        input.body,
        input.category,
        input.tags,
        input.contentBrief,
        input.contentCore,
        input.contentDeep,
        JSON.stringify(input.media),
        input.signingIdentity,
        input.publishedBy,
        input.publishedAt,
      ]
    ).catch((error: unknown) => {
      if (isItemLinkViolation(error)) {
        throw new AlreadyPublishedError(input.scrapingItemId, null);
      }
      throw error;
    });

    const row = result.rows[0];
    return row ? { id: row.id, slug: row.slug } : null;
  }
}

const ITEM_LINK_CONSTRAINT = 'publications_scraping_item_id_key';

function isItemLinkViolation(error: unknown): boolean {
  return getErrorCode(error) === '23505' && isRecord(error) && error['constraint'] === ITEM_LINK_CONSTRAINT;
}
