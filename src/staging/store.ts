/**
 * Staging Store
 *
 * Single entry point for reading and mutating staging items. Every state
 * change goes through `update`, which checks the transition table, applies
 * the entry effects of the target state and writes conditionally on the
 * state it read.
 */

import {
  CannotDeletePublishedError,
  ConcurrentModificationError,
  NotFoundError,
  RetryLimitExceededError,
  TerminalStateImmutableError,
  ValidationError,
} from '../errors/index.js';
import { computeDedupHashes, contentHash } from '../hashing/index.js';
import { logger } from '../utils/logger.js';
import { assertNever } from '../utils/guards.js';
import { assertTransition, canTransition, isTerminal } from './state-machine.js';
import type { StagingRepository, UpsertOutcome } from './repository.js';
import type {
  Actor,
  NewStagingItem,
  Page,
  Pagination,
  PipelineState,
  SimilarTitle,
  StagingChanges,
  StagingFilters,
  StagingInput,
  StagingItem,
  StagingPatch,
} from '../types/index.js';

export interface StagingStoreOptions {
  now?: () => Date;
  /** Retry ceiling given to new items */
  defaultMaxRetries?: number;
  listDefaultLimit?: number;
  listMaxLimit?: number;
  /** Conditional write attempts before ConcurrentModification */
  maxUpdateAttempts?: number;
}

export interface UpdateOptions {
  actor?: Actor;
  updatedBy?: string | null;
}

export interface StagingUpsertResult {
  item: StagingItem;
  created: boolean;
  outcome: UpsertOutcome;
}

export interface DedupResult {
  groupsFound: number;
  markedCount: number;
}

/** Fields a terminal item still accepts */
const TERMINAL_MUTABLE_FIELDS: ReadonlySet<string> = new Set<keyof StagingPatch>(['stateMessage', 'extraMetadata']);

const DEDUP_OPERATOR = 'system:dedup';
const TITLE_DEDUP_OPERATOR = 'system:title-dedup';
const MATCH_TITLE_PREVIEW = 60;

export class StagingStore {
  private readonly now: () => Date;
  private readonly defaultMaxRetries: number;
  private readonly listDefaultLimit: number;
  private readonly listMaxLimit: number;
  private readonly maxUpdateAttempts: number;

  constructor(
    private readonly repo: StagingRepository,
    options: StagingStoreOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.defaultMaxRetries = options.defaultMaxRetries ?? 3;
    this.listDefaultLimit = options.listDefaultLimit ?? 50;
    this.listMaxLimit = options.listMaxLimit ?? 100;
    this.maxUpdateAttempts = options.maxUpdateAttempts ?? 3;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Writes
  // ═══════════════════════════════════════════════════════════════════════════

  /**
   * Insert a new item at `scraped`. Throws DuplicateUrlError when the
   * normalized URL is already staged.
   */
  async create(input: StagingInput): Promise<StagingItem> {
    const item = await this.repo.insert(this.toNewItem(input));
    logger.debug({ itemId: item.id, sourceMedia: item.sourceMedia }, 'Staging item created');
    return item;
  }

  /**
   * Insert, or refresh the raw content of the item staged for the same URL
   */
  async upsert(input: StagingInput): Promise<StagingUpsertResult> {
    const { item, outcome } = await this.repo.upsert(this.toNewItem(input));
    return { item, created: outcome === 'created', outcome };
  }

  async update(id: string, patch: StagingPatch, options: UpdateOptions = {}): Promise<StagingItem> {
    for (let attempt = 1; attempt <= this.maxUpdateAttempts; attempt++) {
      const current = await this.get(id);
      const changes = this.planUpdate(current, patch, options);
      const updated = await this.repo.updateIfState(id, current.state, changes);

      if (updated) {
        if (updated.state !== current.state) {
          logger.debug({ itemId: id, from: current.state, to: updated.state, actor: options.actor ?? 'operator' }, 'State changed');
        }
        return updated;
      }

      logger.debug({ itemId: id, attempt, expectedState: current.state }, 'Conditional write lost, re-reading');
    }

    throw new ConcurrentModificationError(id);
  }

  async delete(id: string): Promise<void> {
    const current = await this.get(id);
    if (current.state === 'published' || current.publicationId !== null) {
      throw new CannotDeletePublishedError(id);
    }

    if (await this.repo.deleteUnpublished(id)) {
      logger.info({ itemId: id, state: current.state }, 'Staging item deleted');
      return;
    }

    // Published or removed in between
    const latest = await this.repo.findById(id);
    if (latest) {
      throw new CannotDeletePublishedError(id);
    }
    throw new NotFoundError(id);
  }

  /**
   * Mark every non-keeper member of each content-hash group as duplicate.
   * The keeper is the earliest scraped member, ties broken by id.
   */
  async markDuplicates(): Promise<DedupResult> {
    const groups = await this.repo.findDuplicateGroups();
    let markedCount = 0;

    for (const group of groups) {
      const [keeper, ...others] = group.members;
      if (!keeper) continue;

      for (const member of others) {
        if (await this.markDuplicate(member.id, member.state, keeper.id)) {
          markedCount++;
        }
      }
    }

    if (groups.length > 0) {
      logger.info({ groupsFound: groups.length, markedCount }, 'Duplicate sweep complete');
    }
    return { groupsFound: groups.length, markedCount };
  }

  /**
   * Mark an ai_completed item as a repeat of an already prepared title.
   * One conditional write: if the item moved on meanwhile this throws
   * ConcurrentModification and the item is left alone.
   */
  async markTitleDuplicate(id: string, match: SimilarTitle): Promise<StagingItem> {
    const current = await this.get(id);
    assertTransition(current.state, 'duplicate', 'titleDedup');

    const now = this.now();
    const percent = Math.round(match.similarity * 100);
    const marked = await this.repo.updateIfState(id, current.state, {
      state: 'duplicate',
      stateUpdatedAt: now,
      stateMessage: `Title ${percent}% similar to ${match.kind} ${match.id}: '${match.title.slice(0, MATCH_TITLE_PREVIEW)}'`,
      updatedAt: now,
      updatedBy: TITLE_DEDUP_OPERATOR,
    });
    if (!marked) {
      throw new ConcurrentModificationError(id);
    }
    return marked;
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Reads
  // ═══════════════════════════════════════════════════════════════════════════

  findSimilarTitle(title: string, excludeId: string, threshold: number): Promise<SimilarTitle | null> {
    return this.repo.findSimilarTitle(title, excludeId, threshold);
  }

  async get(id: string): Promise<StagingItem> {
    const item = await this.repo.findById(id);
    if (!item) {
      throw new NotFoundError(id);
    }
    return item;
  }

  async list(filters: StagingFilters = {}, pagination: Pagination = {}): Promise<Page<StagingItem>> {
    const limit = clamp(pagination.limit, 1, this.listMaxLimit, this.listDefaultLimit);
    const offset = clamp(pagination.offset, 0, Number.MAX_SAFE_INTEGER, 0);

    const { items, total } = await this.repo.list(filters, {
      limit,
      offset,
      order: pagination.order ?? 'newest',
      orderBy: pagination.orderBy ?? 'scrapedAt',
    });

    return { items, total, limit, offset, hasMore: offset + items.length < total };
  }

  // ═══════════════════════════════════════════════════════════════════════════
  // Internals
  // ═══════════════════════════════════════════════════════════════════════════

  private toNewItem(input: StagingInput): NewStagingItem {
    if (input.content.trim().length === 0) {
      throw new ValidationError('Content must not be empty', ['content']);
    }
    if (input.articleDate && input.articleDate.getTime() > this.now().getTime()) {
      throw new ValidationError(`Article date ${input.articleDate.toISOString()} is in the future`, ['articleDate']);
    }
    const maxRetries = input.maxRetries ?? this.defaultMaxRetries;
    if (!Number.isInteger(maxRetries) || maxRetries < 0) {
      throw new ValidationError('maxRetries must be a non-negative integer', ['maxRetries']);
    }

    return {
      sourceMedia: input.sourceMedia,
      sourceSection: input.sourceSection,
      sourceUrl: input.sourceUrl,
      canonicalUrl: input.canonicalUrl,
      title: input.title,
      subtitle: input.subtitle,
      summary: input.summary,
      content: input.content,
      rawHtml: input.rawHtml,
      author: input.author,
      articleDate: input.articleDate,
      tags: input.tags,
      imageUrls: input.imageUrls,
      videoUrls: input.videoUrls,
      scraperName: input.scraperName,
      scraperVersion: input.scraperVersion,
      scrapingRunId: input.scrapingRunId,
      scrapingDurationMs: input.scrapingDurationMs,
      ...computeDedupHashes(input.sourceUrl, input.content),
      maxRetries,
      createdBy: input.createdBy ?? null,
      extraMetadata: input.extraMetadata ?? null,
    };
  }

  /**
   * Validate `patch` against `current` and compute the row changes.
   * Throws the domain error for any rule the patch breaks.
   */
  private planUpdate(current: StagingItem, patch: StagingPatch, options: UpdateOptions): StagingChanges {
    const now = this.now();
    const { state: target, ...fields } = patch;
    const nextState = target !== undefined && target !== current.state ? target : null;

    if (nextState) {
      assertTransition(current.state, nextState, 'update');
    }

    if (isTerminal(current.state)) {
      const frozen = Object.keys(fields).filter((field) => !TERMINAL_MUTABLE_FIELDS.has(field));
      if (frozen.length > 0) {
        throw new TerminalStateImmutableError(current.state, frozen);
      }
    }

    validatePatch(current, patch);

    const changes: StagingChanges = { ...fields, updatedAt: now };
    if (options.updatedBy !== undefined) {
      changes.updatedBy = options.updatedBy;
    }
    if (fields.content !== undefined && fields.content !== current.content) {
      changes.contentHash = contentHash(fields.content);
    }

    if (!nextState) {
      return changes;
    }

    changes.state = nextState;
    changes.stateUpdatedAt = now;
    this.applyEntryEffects(current, nextState, patch, options.actor ?? 'operator', changes);
    return changes;
  }

  private applyEntryEffects(
    current: StagingItem,
    target: PipelineState,
    patch: StagingPatch,
    actor: Actor,
    changes: StagingChanges
  ): void {
    const maxRetries = patch.maxRetries ?? current.maxRetries;
    const now = this.now();

    switch (target) {
      case 'error':
        changes.retryCount = Math.min(current.retryCount + 1, maxRetries);
        changes.lastError = patch.lastError ?? 'Unknown error';
        changes.lastErrorAt = now;
        if (patch.errorTrace !== undefined) {
          changes.errorTrace = patch.errorTrace;
        }
        break;

      case 'ready_for_ai':
        if (current.state === 'error') {
          if (actor === 'automation') {
            if (current.retryCount >= maxRetries) {
              throw new RetryLimitExceededError(current.id, current.retryCount, maxRetries);
            }
          } else {
            changes.retryCount = 0;
          }
        }
        break;

      case 'ai_completed':
        if (current.aiProcessedAt === null && patch.aiProcessedAt === undefined) {
          changes.aiProcessedAt = now;
        }
        break;

      case 'scraped':
      case 'processing_ai':
      case 'ready_to_publish':
      case 'discarded':
      case 'published':
      case 'duplicate':
        break;

      default:
        assertNever(target);
    }
  }

  /**
   * Move one member to `duplicate`, re-reading when its state moved on.
   * Returns false when the member is already terminal or gone.
   */
  private async markDuplicate(id: string, knownState: PipelineState, keeperId: string): Promise<boolean> {
    let state = knownState;

    for (let attempt = 1; attempt <= this.maxUpdateAttempts; attempt++) {
      if (!canTransition(state, 'duplicate', 'dedupSweep')) {
        return false;
      }

      const now = this.now();
      const marked = await this.repo.updateIfState(id, state, {
        state: 'duplicate',
        stateUpdatedAt: now,
        stateMessage: `Duplicate of item ${keeperId}`,
        updatedAt: now,
        updatedBy: DEDUP_OPERATOR,
      });
      if (marked) {
        return true;
      }

      const latest = await this.repo.findById(id);
      if (!latest) {
        return false;
      }
      state = latest.state;
    }

    logger.warn({ itemId: id, keeperId }, 'Item kept changing during duplicate sweep; left for the next sweep');
    return false;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

function validatePatch(current: StagingItem, patch: StagingPatch): void {
  const issues: string[] = [];

  if (patch.content !== undefined && patch.content.trim().length === 0) {
    issues.push('content must not be empty');
  }
  if (patch.maxRetries !== undefined) {
    if (!Number.isInteger(patch.maxRetries) || patch.maxRetries < 0) {
      issues.push('maxRetries must be a non-negative integer');
    } else if (patch.maxRetries < current.retryCount) {
      issues.push(`maxRetries cannot drop below the current retry count (${current.retryCount})`);
    }
  }
  if (patch.aiTokensUsed != null && (!Number.isInteger(patch.aiTokensUsed) || patch.aiTokensUsed < 0)) {
    issues.push('aiTokensUsed must be a non-negative integer');
  }
  if (patch.aiCostUsd != null && (!Number.isFinite(patch.aiCostUsd) || patch.aiCostUsd < 0)) {
    issues.push('aiCostUsd must be a non-negative number');
  }

  if (issues.length > 0) {
    throw new ValidationError(`Invalid update for item ${current.id}: ${issues.join('; ')}`, issues);
  }
}

function clamp(value: number | undefined, min: number, max: number, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.min(Math.max(Math.trunc(value), min), max);
}
