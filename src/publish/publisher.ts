/**
 * Publish Transaction
 *
 * Converts a ready_to_publish staging item into a durable publication.
 * The publication insert and the staging link share one unit of work
 * with the item row locked, so an item is published at most once and a
 * failure leaves neither write behind.
 */

import {
  AlreadyPublishedError,
  InvalidStateError,
  NotFoundError,
  SlugConflictError,
  ValidationError,
} from '../errors/index.js';
import { slugify } from '../hashing/index.js';
import { assertTransition } from '../staging/state-machine.js';
import { logger } from '../utils/logger.js';
import { AI_METADATA_KEYS, type PublicationMedia, type PublicationRef, type StagingItem } from '../types/index.js';
import type { StagingRepository } from '../staging/repository.js';

export interface PublishOverrides {
  title?: string;
  summary?: string;
  body?: string;
}

export interface PublishRequest {
  itemId: string;
  /** Account performing the publish; recorded for audit */
  operatorId: string;
  /** Editorial persona credited publicly */
  signingIdentity?: string | null;
  overrides?: PublishOverrides;
}

/** Slug candidates tried before giving up */
const MAX_SLUG_ATTEMPTS = 20;

export interface PublishResult {
  publicationId: string;
  slug: string;
  item: StagingItem;
}

export class PublishTransaction {
  constructor(
    private readonly repo: StagingRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async publish(request: PublishRequest): Promise<PublishResult> {
    const operatorId = request.operatorId.trim();
    if (!operatorId) {
      throw new ValidationError('operatorId is required to publish', ['operatorId']);
    }

    const result = await this.repo.transaction(async (scope) => {
      const item = await scope.lockItem(request.itemId);
      if (!item) {
        throw new NotFoundError(request.itemId);
      }
      if (item.publicationId !== null || item.state === 'published') {
        throw new AlreadyPublishedError(item.id, item.publicationId);
      }
      if (item.state !== 'ready_to_publish') {
        throw new InvalidStateError(
          item.state,
          `Item ${item.id} is '${item.state}'; only 'ready_to_publish' items can be published`
        );
      }
      assertTransition(item.state, 'published', 'publish');

      const overrides = request.overrides ?? {};
      const title = firstText(overrides.title, item.aiTitle, item.title);
      if (!title) {
        throw new InvalidStateError(item.state, `Item ${item.id} has no title to publish`);
      }

      const publishedAt = this.now();
      const metadata = item.aiMetadata ?? {};
      const content = {
        scrapingItemId: item.id,
        title,
        summary: firstText(overrides.summary, item.aiSummary, item.summary) ?? '',
        body: overrides.body ?? item.content,
        category: item.aiCategory,
        tags: item.aiTags ?? item.tags,
        contentBrief: readingLevel(metadata, AI_METADATA_KEYS.readingLevelBrief),
        contentCore: readingLevel(metadata, AI_METADATA_KEYS.readingLevelCore),
        contentDeep: readingLevel(metadata, AI_METADATA_KEYS.readingLevelDeep),
        media: toMedia(item.imageUrls),
        signingIdentity: request.signingIdentity ?? null,
        publishedBy: operatorId,
        publishedAt,
      };

      let publication: PublicationRef | null = null;
      for (const slug of slugCandidates(title, item.id, MAX_SLUG_ATTEMPTS)) {
        publication = await scope.publications.createPublication({ ...content, slug });
        if (publication) break;
        logger.debug({ itemId: item.id, slug }, 'Slug taken, trying next candidate');
      }
      if (!publication) {
        throw new SlugConflictError(item.id, MAX_SLUG_ATTEMPTS);
      }

      const linked = await scope.markPublished(item.id, {
        publicationId: publication.id,
        publishedAt,
        publishedBy: operatorId,
        stateMessage: `Published by ${operatorId}`,
      });

      return { publicationId: publication.id, slug: publication.slug, item: linked };
    });

    logger.info(
      { itemId: request.itemId, publicationId: result.publicationId, slug: result.slug, operatorId },
      'Item published'
    );
    return result;
  }
}

/**
 * Slugs to try in order: the title slug, then suffixed with the item id
 * prefix, then with a counter
 */
export function* slugCandidates(title: string, itemId: string, limit: number): Generator<string> {
  const idPrefix = itemId.slice(0, 8);
  const base = slugify(title) || `articulo-${idPrefix}`;
  const suffixed = `${base}-${idPrefix}`;

  for (let attempt = 0; attempt < limit; attempt++) {
    if (attempt === 0) yield base;
    else if (attempt === 1) yield suffixed;
    else yield `${suffixed}-${attempt}`;
  }
}

function firstText(...values: (string | null | undefined)[]): string | null {
  for (const value of values) {
    if (value && value.trim()) {
      return value;
    }
  }
  return null;
}

function readingLevel(metadata: Record<string, unknown>, key: string): string | null {
  const value = metadata[key];
  return typeof value === 'string' && value.trim() ? value : null;
}

function toMedia(imageUrls: string[]): PublicationMedia[] {
  return imageUrls.map((url, order) => ({ type: 'image', url, caption: '', order }));
}

