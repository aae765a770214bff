/**
 * Ingestion Gateway
 *
 * Entry point for producers. Validates a raw article, derives its dedup
 * keys and upserts it by normalized URL, so re-ingesting the same article
 * never creates a second row and never rewinds its pipeline progress.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { SOURCE_MEDIA, type RawArticle, type StagingInput, type StagingItem } from '../types/index.js';
import type { StagingStore } from '../staging/store.js';

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const urlList = z.array(z.string().url()).default([]);

export const rawArticleSchema = z.object({
  sourceMedia: z.enum(SOURCE_MEDIA),
  sourceSection: optionalText,
  url: z.string().url(),
  canonicalUrl: z.string().url().nullish().transform((value) => value ?? null),
  title: z.string().trim().min(1, 'title is required'),
  subtitle: optionalText,
  summary: optionalText,
  content: z.string().refine((value) => value.trim().length > 0, 'content must not be empty'),
  rawHtml: z.string().nullish().transform((value) => value ?? null),
  author: optionalText,
  articleDate: z
    .union([z.date(), z.string().datetime({ offset: true })])
    .nullish()
    .transform((value) => (value === null || value === undefined ? null : new Date(value))),
  tags: z.array(z.string().trim().min(1)).default([]),
  imageUrls: urlList,
  videoUrls: urlList,
  scraperName: z.string().min(1).optional(),
  scraperVersion: z.string().nullish().transform((value) => value ?? null),
  scrapingRunId: z.string().uuid().nullish().transform((value) => value ?? null),
  scrapingDurationMs: z.number().int().nonnegative().nullish().transform((value) => value ?? null),
  extraMetadata: z.record(z.unknown()).nullish().transform((value) => value ?? null),
});

export interface IngestOptions {
  /** Audit identity of the producer */
  createdBy?: string | null;
  scrapingRunId?: string | null;
  maxRetries?: number;
}

export interface IngestResult {
  item: StagingItem;
  created: boolean;
  contentChanged: boolean;
}

export interface IngestBatchResult {
  created: number;
  updated: number;
  unchanged: number;
  failed: number;
  items: StagingItem[];
}

export class IngestionGateway {
  constructor(
    private readonly store: StagingStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async ingest(raw: RawArticle, options: IngestOptions = {}): Promise<IngestResult> {
    const input = this.toStagingInput(raw, options);
    const { item, created, outcome } = await this.store.upsert(input);

    logger.debug({ itemId: item.id, url: raw.url, outcome }, 'Article ingested');
    return { item, created, contentChanged: outcome === 'updated' };
  }

  /**
   * Ingest sequentially. A failing article is logged and counted; the
   * rest of the batch still runs.
   */
  async ingestBatch(raws: RawArticle[], options: IngestOptions = {}): Promise<IngestBatchResult> {
    const result: IngestBatchResult = { created: 0, updated: 0, unchanged: 0, failed: 0, items: [] };

    for (const raw of raws) {
      try {
        const { item, created, contentChanged } = await this.ingest(raw, options);
        result.items.push(item);
        if (created) result.created++;
        else if (contentChanged) result.updated++;
        else result.unchanged++;
      } catch (error) {
        result.failed++;
        logger.warn({ error, url: raw.url, sourceMedia: raw.sourceMedia }, 'Failed to ingest article');
      }
    }

    logger.info(
      { created: result.created, updated: result.updated, unchanged: result.unchanged, failed: result.failed },
      'Ingestion batch complete'
    );
    return result;
  }

  private toStagingInput(raw: RawArticle, options: IngestOptions): StagingInput {
    const parsed = rawArticleSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'article'}: ${issue.message}`);
      throw new ValidationError(`Invalid article ${String(raw.url)}: ${issues.join('; ')}`, issues);
    }

    const article = parsed.data;
    if (article.articleDate && isNaN(article.articleDate.getTime())) {
      throw new ValidationError(`Invalid article date for ${article.url}`, ['articleDate']);
    }
    if (article.articleDate && article.articleDate.getTime() > this.now().getTime()) {
      throw new ValidationError(
        `Article date ${article.articleDate.toISOString()} is in the future for ${article.url}`,
        ['articleDate']
      );
    }

    return {
      sourceMedia: article.sourceMedia,
      sourceSection: article.sourceSection,
      sourceUrl: article.url,
      canonicalUrl: article.canonicalUrl,
      title: article.title,
      subtitle: article.subtitle,
      summary: article.summary,
      content: article.content,
      rawHtml: article.rawHtml,
      author: article.author,
      articleDate: article.articleDate,
      tags: article.tags,
      imageUrls: article.imageUrls,
      videoUrls: article.videoUrls,
      scraperName: article.scraperName ?? `${article.sourceMedia}-scraper`,
      scraperVersion: article.scraperVersion,
      scrapingRunId: options.scrapingRunId ?? article.scrapingRunId,
      scrapingDurationMs: article.scrapingDurationMs,
      maxRetries: options.maxRetries,
      createdBy: options.createdBy ?? null,
      extraMetadata: article.extraMetadata,
    };
  }
}
