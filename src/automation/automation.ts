/**
 * Automation
 *
 * The unattended steps around AI processing: queueing fresh scraped
 * items, the quality gate that promotes ai_completed items, expiry of
 * items nobody picked up and auto-publish for sources that opt in.
 */

import { config, getSource } from '../config/index.js';
import { VALID_CATEGORIES, type MediaSource } from '../config/sources.js';
import { isErrorKind } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import {
  AI_METADATA_KEYS,
  SOURCE_MEDIA,
  type ListOrder,
  type MetadataBag,
  type SortField,
  type SourceMedia,
  type StagingFilters,
  type StagingItem,
} from '../types/index.js';
import type { StagingStore } from '../staging/store.js';
import type { PublishTransaction } from '../publish/publisher.js';

const AUTOMATION_ID = 'system:automation';
const PAGE_SIZE = 100;

export interface QualityThresholds {
  minTitleLength: number;
  minSummaryLength: number;
  minContentLength: number;
}

export type QualityVerdict = { ok: true } | { ok: false; reason: string };

export interface AutomationOptions {
  now?: () => Date;
  quality?: QualityThresholds;
  systemOperatorId?: string;
  sourceLookup?: (media: SourceMedia) => MediaSource | undefined;
  /** Trigram similarity above which a prepared title counts as a repeat */
  titleSimilarityThreshold?: number;
}

export interface QueueResult {
  queued: number;
  skipped: number;
}

export interface PrepareResult {
  checked: number;
  promoted: number;
  rejected: number;
  duplicates: number;
  skipped: number;
}

export interface ExpireResult {
  discarded: number;
  skipped: number;
}

export interface AutoPublishResult {
  checked: number;
  published: number;
  waiting: number;
  skipped: number;
  failed: number;
}

// Reading levels carry their own floors
const MIN_BRIEF_LENGTH = 20;
const MIN_CORE_LENGTH = 50;

function metadataText(bag: MetadataBag | null, key: string): string {
  const value = bag?.[key];
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Decide whether an AI-completed item is fit to publish
 */
export function checkQuality(item: StagingItem, thresholds: QualityThresholds = config.pipeline.quality): QualityVerdict {
  const title = item.aiTitle?.trim() ?? '';
  const summary = item.aiSummary?.trim() ?? '';
  const category = item.aiCategory ?? '';

  if (title.length < thresholds.minTitleLength) {
    return { ok: false, reason: `title too short (${title.length} chars, min ${thresholds.minTitleLength})` };
  }
  if (summary.length < thresholds.minSummaryLength) {
    return { ok: false, reason: `summary too short (${summary.length} chars, min ${thresholds.minSummaryLength})` };
  }
  if (!VALID_CATEGORIES.some((valid) => valid === category)) {
    return { ok: false, reason: `invalid category '${category}'` };
  }

  const brief = metadataText(item.aiMetadata, AI_METADATA_KEYS.readingLevelBrief);
  const core = metadataText(item.aiMetadata, AI_METADATA_KEYS.readingLevelCore);
  const deep = metadataText(item.aiMetadata, AI_METADATA_KEYS.readingLevelDeep);

  if (brief.length < MIN_BRIEF_LENGTH) {
    return { ok: false, reason: `missing '${AI_METADATA_KEYS.readingLevelBrief}' reading level` };
  }
  if (core.length < MIN_CORE_LENGTH) {
    return { ok: false, reason: `missing '${AI_METADATA_KEYS.readingLevelCore}' reading level` };
  }
  if (deep.length < thresholds.minContentLength) {
    return { ok: false, reason: `'${AI_METADATA_KEYS.readingLevelDeep}' too short (${deep.length} chars)` };
  }

  const content = item.content.trim();
  if (content.length < thresholds.minContentLength) {
    return { ok: false, reason: `source content too short (${content.length} chars)` };
  }

  if (item.aiMetadata?.[AI_METADATA_KEYS.isValid] === false) {
    const reason = metadataText(item.aiMetadata, AI_METADATA_KEYS.validationReason);
    return { ok: false, reason: reason || 'marked invalid by the model' };
  }

  return { ok: true };
}

/** What a sweep visitor did with an item */
type Visit = 'moved' | 'stayed';

/**
 * Item moved or vanished between the read and the write
 */
function isRace(error: unknown): boolean {
  return (
    isErrorKind(error, 'InvalidTransition') ||
    isErrorKind(error, 'NotFound') ||
    isErrorKind(error, 'ConcurrentModification')
  );
}

export class Automation {
  private readonly now: () => Date;
  private readonly quality: QualityThresholds;
  private readonly systemOperatorId: string;
  private readonly sourceLookup: (media: SourceMedia) => MediaSource | undefined;
  private readonly titleSimilarityThreshold: number;

  constructor(
    private readonly store: StagingStore,
    private readonly publisher: PublishTransaction,
    options: AutomationOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.quality = options.quality ?? config.pipeline.quality;
    this.systemOperatorId = options.systemOperatorId ?? config.pipeline.systemOperatorId;
    this.sourceLookup = options.sourceLookup ?? getSource;
    this.titleSimilarityThreshold = options.titleSimilarityThreshold ?? config.pipeline.titleSimilarityThreshold;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // AI queue
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Approve items scraped within the last `hours` for AI processing.
   * Older scraped items wait for an operator.
   */
  async queueForAi(hours: number = config.pipeline.autoQueueHours): Promise<QueueResult> {
    const result: QueueResult = { queued: 0, skipped: 0 };
    if (hours <= 0) {
      return result;
    }

    const since = new Date(this.now().getTime() - hours * 3_600_000);
    await this.sweep({ state: 'scraped', dateFrom: since }, 'scrapedAt', 'oldest', async (item) => {
      try {
        await this.store.update(item.id, { state: 'ready_for_ai' }, { actor: 'automation', updatedBy: AUTOMATION_ID });
        result.queued++;
        return 'moved';
      } catch (error) {
        if (!isRace(error)) {
          throw error;
        }
        result.skipped++;
        return 'stayed';
      }
    });

    if (result.queued > 0) {
      logger.info({ ...result, hours }, 'Queued scraped items for AI');
    }
    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Quality gate
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Promote every ai_completed item that passes the quality gate and does
   * not repeat an already prepared title, most recently processed first.
   * Failing items stay put with the reason in their state message.
   */
  async autoPrepare(): Promise<PrepareResult> {
    const result: PrepareResult = { checked: 0, promoted: 0, rejected: 0, duplicates: 0, skipped: 0 };

    await this.sweep({ state: 'ai_completed' }, 'aiProcessedAt', 'newest', async (item) => {
      result.checked++;
      try {
        const verdict = checkQuality(item, this.quality);
        if (!verdict.ok) {
          result.rejected++;
          await this.noteRejection(item, verdict.reason);
          return 'stayed';
        }

        const match = await this.store.findSimilarTitle(item.aiTitle ?? '', item.id, this.titleSimilarityThreshold);
        if (match) {
          await this.store.markTitleDuplicate(item.id, match);
          result.duplicates++;
          logger.info({ itemId: item.id, matchId: match.id, similarity: match.similarity }, 'Item repeats a prepared title');
          return 'moved';
        }

        await this.store.update(
          item.id,
          { state: 'ready_to_publish', stateMessage: 'Auto-prepare: quality checks passed' },
          { actor: 'automation', updatedBy: AUTOMATION_ID }
        );
        result.promoted++;
        return 'moved';
      } catch (error) {
        if (!isRace(error)) {
          throw error;
        }
        result.skipped++;
        return 'stayed';
      }
    });

    if (result.checked > 0) {
      logger.info(result, 'Auto-prepare complete');
    }
    return result;
  }

  private async noteRejection(item: StagingItem, reason: string): Promise<void> {
    const message = `Auto-prepare: ${reason}`;
    // Message-only write; stateUpdatedAt keeps counting toward expiry
    if (item.stateMessage !== message) {
      await this.store.update(item.id, { stateMessage: message }, { actor: 'automation', updatedBy: AUTOMATION_ID });
    }
    logger.debug({ itemId: item.id, reason }, 'Item failed quality gate');
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Expiry
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Discard ai_completed items whose state has not moved for `hours`
   */
  async expireStale(hours: number = config.pipeline.expireAiCompletedHours): Promise<ExpireResult> {
    const cutoff = new Date(this.now().getTime() - hours * 3_600_000);
    const result: ExpireResult = { discarded: 0, skipped: 0 };

    const filters: StagingFilters = { state: 'ai_completed', dateField: 'stateUpdatedAt', dateTo: cutoff };
    await this.sweep(filters, 'stateUpdatedAt', 'oldest', async (item) => {
      try {
        await this.store.update(
          item.id,
          { state: 'discarded', stateMessage: `Expired: more than ${hours}h in ai_completed` },
          { actor: 'automation', updatedBy: AUTOMATION_ID }
        );
        result.discarded++;
        return 'moved';
      } catch (error) {
        if (!isRace(error)) {
          throw error;
        }
        result.skipped++;
        return 'stayed';
      }
    });

    if (result.discarded > 0) {
      logger.info({ ...result, hours }, 'Expired stale items');
    }
    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Auto-publish
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Publish ready items from sources that opt in, once their review
   * window has passed. Each source is queried on its own with its window
   * in the filter, so other sources' backlogs never hide eligible items.
   */
  async autoPublish(): Promise<AutoPublishResult> {
    const result: AutoPublishResult = { checked: 0, published: 0, waiting: 0, skipped: 0, failed: 0 };
    const now = this.now().getTime();

    for (const media of SOURCE_MEDIA) {
      const source = this.sourceLookup(media);
      if (!source?.autoPublish) {
        continue;
      }

      const cutoff = new Date(now - source.autoPublishDelayMinutes * 60_000);
      const { total: waiting } = await this.store.list(
        {
          state: 'ready_to_publish',
          sourceMedia: media,
          dateField: 'stateUpdatedAt',
          dateFrom: new Date(cutoff.getTime() + 1),
        },
        { limit: 1 }
      );
      result.waiting += waiting;

      const eligible: StagingFilters = { state: 'ready_to_publish', sourceMedia: media, dateField: 'stateUpdatedAt', dateTo: cutoff };
      await this.sweep(eligible, 'stateUpdatedAt', 'oldest', async (item) => {
        result.checked++;
        return this.publishOne(item, result);
      });
    }

    if (result.checked > 0 || result.waiting > 0) {
      logger.info(result, 'Auto-publish complete');
    }
    return result;
  }

  private async publishOne(item: StagingItem, result: AutoPublishResult): Promise<Visit> {
    try {
      const { slug } = await this.publisher.publish({ itemId: item.id, operatorId: this.systemOperatorId });
      result.published++;
      logger.info({ itemId: item.id, slug, media: item.sourceMedia }, 'Item auto-published');
      return 'moved';
    } catch (error) {
      if (isErrorKind(error, 'AlreadyPublished') || isErrorKind(error, 'NotFound')) {
        result.skipped++;
        return 'moved';
      }
      if (isErrorKind(error, 'InvalidState')) {
        result.skipped++;
        return 'stayed';
      }
      if (isErrorKind(error, 'TransientStoreError')) {
        throw error;
      }
      result.failed++;
      logger.error({ itemId: item.id, error }, 'Auto-publish failed');
      return 'stayed';
    }
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Paging
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Visit every item matching `filters` once, page by page. Items the
   * visitor moves out of the set free their slot, so the offset only
   * advances past items that stayed.
   */
  private async sweep(
    filters: StagingFilters,
    orderBy: SortField,
    order: ListOrder,
    visit: (item: StagingItem) => Promise<Visit>
  ): Promise<void> {
    const seen = new Set<string>();
    let offset = 0;

    for (;;) {
      const { items } = await this.store.list(filters, { limit: PAGE_SIZE, offset, order, orderBy });
      if (items.length === 0) break;

      let moved = 0;
      for (const item of items) {
        if (seen.has(item.id)) continue;
        seen.add(item.id);
        if ((await visit(item)) === 'moved') moved++;
      }
      offset += items.length - moved;
    }
  }
}
