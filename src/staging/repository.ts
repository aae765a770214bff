/**
 * Persistence contracts for the staging store
 *
 * The store owns the state machine; repositories only offer atomic
 * primitives (conditional writes, native upsert, locked transactions).
 * PostgreSQL implementation: db/staging-repository.ts.
 */

import type {
  DuplicateGroup,
  ListOrder,
  NewPublication,
  NewStagingItem,
  PipelineState,
  PublicationRef,
  SimilarTitle,
  SortField,
  SourceMedia,
  StagingChanges,
  StagingFilters,
  StagingItem,
} from '../types/index.js';

export type UpsertOutcome = 'created' | 'updated' | 'unchanged';

export interface UpsertResult {
  item: StagingItem;
  outcome: UpsertOutcome;
}

/**
 * Raw aggregate read in a single statement
 */
export interface StatsSnapshot {
  totalItems: number;
  byState: Partial<Record<PipelineState, number>>;
  bySourceMedia: Partial<Record<SourceMedia, number>>;
  avgAiTokens: number | null;
  totalAiCostUsd: number | null;
  itemsInError: number;
  itemsWithErrors: number;
  itemsReadyForAi: number;
  itemsReadyToPublish: number;
  generatedAt: Date;
}

export interface PageRequest {
  limit: number;
  offset: number;
  order: ListOrder;
  orderBy: SortField;
}

export interface PublicationLink {
  publicationId: string;
  publishedAt: Date;
  publishedBy: string;
  stateMessage: string | null;
}

/**
 * Publication store collaborator, bound to the enclosing transaction
 */
export interface PublicationWriter {
  /**
   * Insert the publication. Returns null when the slug is taken, leaving
   * the unit of work usable for another candidate.
   */
  createPublication(input: NewPublication): Promise<PublicationRef | null>;
}

/**
 * Operations available inside a publish unit of work. Everything done
 * through a scope commits or rolls back together.
 */
export interface PublishScope {
  /** Read the item and hold a row lock until the unit of work ends */
  lockItem(id: string): Promise<StagingItem | null>;
  markPublished(id: string, link: PublicationLink): Promise<StagingItem>;
  publications: PublicationWriter;
}

export interface StagingRepository {
  /** Plain insert. Throws DuplicateUrlError when url_hash exists. */
  insert(item: NewStagingItem): Promise<StagingItem>;

  /**
   * Insert, or refresh raw content of the row holding the same url_hash.
   * Lifecycle, AI and error fields are never touched; terminal rows and
   * identical content come back unchanged.
   */
  upsert(item: NewStagingItem): Promise<UpsertResult>;

  findById(id: string): Promise<StagingItem | null>;

  /**
   * Apply changes only while the row is still in `expectedState`.
   * Returns null when the row is missing or its state moved on.
   */
  updateIfState(id: string, expectedState: PipelineState, changes: StagingChanges): Promise<StagingItem | null>;

  /** Delete unless published or linked. Returns false when nothing was deleted. */
  deleteUnpublished(id: string): Promise<boolean>;

  list(filters: StagingFilters, page: PageRequest): Promise<{ items: StagingItem[]; total: number }>;

  findDuplicateGroups(): Promise<DuplicateGroup[]>;

  /**
   * Most similar title above `threshold` among published publications,
   * then among prepared or published items other than `excludeId`.
   * Comparison is case-insensitive.
   */
  findSimilarTitle(title: string, excludeId: string, threshold: number): Promise<SimilarTitle | null>;

  statsSnapshot(): Promise<StatsSnapshot>;

  transaction<T>(work: (scope: PublishScope) => Promise<T>): Promise<T>;
}
