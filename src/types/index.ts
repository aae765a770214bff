/**
 * Core types for the newsroom staging pipeline
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Enumerations
// ═══════════════════════════════════════════════════════════════════════════════

export const SOURCE_MEDIA = [
  'lagaceta',
  'clarin',
  'infobae',
  'lanacion',
  'pagina12',
  'perfil',
  'ambito',
  'cronista',
  'other',
] as const;

export type SourceMedia = (typeof SOURCE_MEDIA)[number];

/**
 * Pipeline states. Closed list: adding a state means updating the
 * transition table in staging/state-machine.ts and the schema CHECK.
 */
export const PIPELINE_STATES = [
  'scraped',
  'ready_for_ai',
  'processing_ai',
  'ai_completed',
  'error',
  'ready_to_publish',
  'published',
  'discarded',
  'duplicate',
] as const;

export type PipelineState = (typeof PIPELINE_STATES)[number];

export type TerminalState = Extract<PipelineState, 'published' | 'discarded' | 'duplicate'>;

/**
 * Who is driving a state change. Automation is bound by the retry ceiling,
 * operators are not.
 */
export type Actor = 'operator' | 'automation';

// ═══════════════════════════════════════════════════════════════════════════════
// Staging Item
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Open key/value bag. Known AI keys are listed in AI_METADATA_KEYS.
 */
export type MetadataBag = Record<string, unknown>;

export const AI_METADATA_KEYS = {
  readingLevelBrief: 'sin_vueltas',
  readingLevelCore: 'lo_central',
  readingLevelDeep: 'en_profundidad',
  isValid: 'is_valid',
  validationReason: 'validation_reason',
  inputTokens: 'input_tokens',
  outputTokens: 'output_tokens',
} as const;

export interface StagingItem {
  id: string;

  // Origin
  sourceMedia: SourceMedia;
  sourceSection: string | null;
  sourceUrl: string;
  sourceUrlNormalized: string;
  canonicalUrl: string | null;

  // Raw content
  title: string | null;
  subtitle: string | null;
  summary: string | null;
  content: string;
  rawHtml: string | null;
  author: string | null;
  articleDate: Date | null;
  tags: string[];
  imageUrls: string[];
  videoUrls: string[];

  // Dedup keys
  contentHash: string;
  urlHash: string;

  // Scraping traceability
  scraperName: string;
  scraperVersion: string | null;
  scrapingRunId: string | null;
  scrapedAt: Date;
  scrapingDurationMs: number | null;

  // Lifecycle
  state: PipelineState;
  stateUpdatedAt: Date;
  stateMessage: string | null;

  // AI
  aiTitle: string | null;
  aiSummary: string | null;
  aiTags: string[] | null;
  aiCategory: string | null;
  aiModel: string | null;
  aiPromptVersion: string | null;
  aiTokensUsed: number | null;
  aiCostUsd: number | null;
  aiProcessingDurationMs: number | null;
  aiProcessedAt: Date | null;
  aiMetadata: MetadataBag | null;

  // Errors
  retryCount: number;
  maxRetries: number;
  lastError: string | null;
  lastErrorAt: Date | null;
  errorTrace: string | null;

  // Publication link
  publicationId: string | null;
  publishedAt: Date | null;
  publishedBy: string | null;

  // Audit
  createdAt: Date;
  updatedAt: Date;
  createdBy: string | null;
  updatedBy: string | null;

  extraMetadata: MetadataBag | null;
}

/**
 * Raw content fields a producer supplies and an upsert refreshes
 */
export interface RawContentFields {
  title: string | null;
  subtitle: string | null;
  summary: string | null;
  content: string;
  rawHtml: string | null;
  author: string | null;
  articleDate: Date | null;
  tags: string[];
  imageUrls: string[];
  videoUrls: string[];
  canonicalUrl: string | null;
}

export interface StagingOrigin {
  sourceMedia: SourceMedia;
  sourceSection: string | null;
  sourceUrl: string;
  scraperName: string;
  scraperVersion: string | null;
  scrapingRunId: string | null;
  scrapingDurationMs: number | null;
}

export interface DedupHashes {
  sourceUrlNormalized: string;
  urlHash: string;
  contentHash: string;
}

/**
 * Everything needed to insert a new staging row
 */
export interface NewStagingItem extends StagingOrigin, RawContentFields, DedupHashes {
  maxRetries: number;
  createdBy: string | null;
  extraMetadata: MetadataBag | null;
}

/**
 * Producer-facing input to StagingStore.create/upsert; hashes are derived
 */
export interface StagingInput extends StagingOrigin, RawContentFields {
  maxRetries?: number;
  createdBy?: string | null;
  extraMetadata?: MetadataBag | null;
}

/**
 * Partial update accepted by StagingStore.update
 */
export interface StagingPatch {
  state?: PipelineState;
  stateMessage?: string | null;

  // Raw content (rejected on terminal items)
  title?: string | null;
  subtitle?: string | null;
  summary?: string | null;
  content?: string;
  author?: string | null;
  tags?: string[];
  imageUrls?: string[];
  videoUrls?: string[];

  // AI
  aiTitle?: string | null;
  aiSummary?: string | null;
  aiTags?: string[] | null;
  aiCategory?: string | null;
  aiModel?: string | null;
  aiPromptVersion?: string | null;
  aiTokensUsed?: number | null;
  aiCostUsd?: number | null;
  aiProcessingDurationMs?: number | null;
  aiProcessedAt?: Date | null;
  aiMetadata?: MetadataBag | null;

  // Errors
  lastError?: string | null;
  errorTrace?: string | null;
  maxRetries?: number;

  // Metadata (allowed on terminal items)
  extraMetadata?: MetadataBag | null;
}

/**
 * Row-level changes computed by the store and handed to the repository
 */
export type StagingChanges = Partial<
  Omit<StagingItem, 'id' | 'urlHash' | 'sourceUrl' | 'sourceUrlNormalized' | 'createdAt' | 'createdBy' | 'scrapedAt'>
>;

// ═══════════════════════════════════════════════════════════════════════════════
// Producer records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One article as yielded by a producer (scraper or feed)
 */
export interface RawArticle {
  sourceMedia: SourceMedia;
  sourceSection?: string | null;
  url: string;
  canonicalUrl?: string | null;
  title: string;
  subtitle?: string | null;
  summary?: string | null;
  content: string;
  rawHtml?: string | null;
  author?: string | null;
  articleDate?: Date | string | null;
  tags?: string[];
  imageUrls?: string[];
  videoUrls?: string[];
  scraperName?: string;
  scraperVersion?: string | null;
  scrapingRunId?: string | null;
  scrapingDurationMs?: number | null;
  extraMetadata?: MetadataBag | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Queries
// ═══════════════════════════════════════════════════════════════════════════════

export type DateField = 'scrapedAt' | 'stateUpdatedAt';

export interface StagingFilters {
  state?: PipelineState;
  sourceMedia?: SourceMedia;
  scraperName?: string;
  searchText?: string;
  dateFrom?: Date;
  dateTo?: Date;
  dateField?: DateField;
  hasErrors?: boolean;
}

export type ListOrder = 'newest' | 'oldest';

/** Column a listing is ordered by; items without an AI pass sort last */
export type SortField = 'scrapedAt' | 'stateUpdatedAt' | 'aiProcessedAt';

export interface Pagination {
  limit?: number;
  offset?: number;
  /** Newest first unless asked otherwise */
  order?: ListOrder;
  /** Defaults to scrapedAt */
  orderBy?: SortField;
}

export interface Page<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
  hasMore: boolean;
}

export interface DuplicateGroup {
  contentHash: string;
  /** Members ordered by scrapedAt ascending, ties by id */
  members: Pick<StagingItem, 'id' | 'state' | 'scrapedAt'>[];
}

/**
 * Closest already-prepared title, by trigram similarity
 */
export interface SimilarTitle {
  kind: 'publication' | 'item';
  id: string;
  title: string;
  similarity: number;
}

export interface StagingStats {
  totalItems: number;
  byState: Record<PipelineState, number>;
  bySourceMedia: Partial<Record<SourceMedia, number>>;
  avgAiTokens: number | null;
  totalAiCostUsd: number | null;
  itemsInError: number;
  itemsWithErrors: number;
  itemsReadyForAi: number;
  itemsReadyToPublish: number;
  generatedAt: Date;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Publications
// ═══════════════════════════════════════════════════════════════════════════════

export interface PublicationMedia {
  type: 'image';
  url: string;
  caption: string;
  order: number;
}

export interface NewPublication {
  scrapingItemId: string;
  slug: string;
  title: string;
  summary: string;
  body: string;
  category: string | null;
  tags: string[];
  contentBrief: string | null;
  contentCore: string | null;
  contentDeep: string | null;
  media: PublicationMedia[];
  signingIdentity: string | null;
  publishedBy: string;
  publishedAt: Date;
}

export interface PublicationRef {
  id: string;
  slug: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pipeline
// ═══════════════════════════════════════════════════════════════════════════════

export interface PipelineResult {
  /** Scraping run opened for this cycle; null when nothing was fetched or written */
  runId: string | null;
  fetched: number;
  ingested: number;
  duplicates: number;
  queued: number;
  aiProcessed: number;
  prepared: number;
  expired: number;
  reclaimed: number;
  published: number;
  errors: number;
  durationMs: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Scraping runs
// ═══════════════════════════════════════════════════════════════════════════════

export type RunTrigger = 'scheduled' | 'manual';

export type RunStatus = 'running' | 'completed' | 'failed';

export interface ScrapingRun {
  id: string;
  startedAt: Date;
  finishedAt: Date | null;
  durationSeconds: number | null;
  status: RunStatus;
  triggeredBy: RunTrigger;
  sourcesProcessed: string[];
  itemsScraped: number;
  itemsFailed: number;
  itemsDuplicate: number;
  errors: string[];
  errorMessage: string | null;
}

export interface NewScrapingRun {
  triggeredBy: RunTrigger;
  sourcesProcessed: string[];
  startedAt: Date;
}

export interface ScrapingRunOutcome {
  status: Exclude<RunStatus, 'running'>;
  finishedAt: Date;
  itemsScraped: number;
  itemsFailed: number;
  itemsDuplicate: number;
  errors: string[];
  errorMessage: string | null;
}

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
}
