/**
 * PostgreSQL Staging Repository
 *
 * Atomic primitives over the scraping_items table. Uniqueness of
 * url_hash is enforced by the unique index, never by a read-then-insert.
 */

import type { QueryResultRow } from 'pg';
import { DuplicateUrlError } from '../errors/index.js';
import { runQuery, withTransaction, getErrorCode, type PoolLike, type Queryable } from './index.js';
import { URL_HASH_UNIQUE_INDEX } from './schema.js';
import { PgPublicationStore } from './publication-store.js';
import {
  isPipelineState,
  isRecord,
  isSourceMedia,
  toDateOrNull,
  toNumberOrNull,
  toStringArray,
} from '../utils/guards.js';
import type {
  DuplicateGroup,
  NewStagingItem,
  PipelineState,
  SimilarTitle,
  SortField,
  StagingChanges,
  StagingFilters,
  StagingItem,
} from '../types/index.js';
import type {
  PageRequest,
  PublicationLink,
  PublishScope,
  StagingRepository,
  StatsSnapshot,
  UpsertResult,
} from '../staging/repository.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// ═══════════════════════════════════════════════════════════════════════════════
// Column mapping
// ═══════════════════════════════════════════════════════════════════════════════

const INSERT_COLUMNS = {
  sourceMedia: 'source_media',
  sourceSection: 'source_section',
  sourceUrl: 'source_url',
  sourceUrlNormalized: 'source_url_normalized',
  canonicalUrl: 'canonical_url',
  title: 'title',
  subtitle: 'subtitle',
  summary: 'summary',
  content: 'content',
  rawHtml: 'raw_html',
  author: 'author',
  articleDate: 'article_date',
  tags: 'tags',
  imageUrls: 'image_urls',
  videoUrls: 'video_urls',
  contentHash: 'content_hash',
  urlHash: 'url_hash',
  scraperName: 'scraper_name',
  scraperVersion: 'scraper_version',
  scrapingRunId: 'scraping_run_id',
  scrapingDurationMs: 'scraping_duration_ms',
  maxRetries: 'max_retries',
  createdBy: 'created_by',
  extraMetadata: 'extra_metadata',
} as const satisfies Record<keyof NewStagingItem, string>;

const CHANGE_COLUMNS = {
  sourceMedia: 'source_media',
  sourceSection: 'source_section',
  canonicalUrl: 'canonical_url',
  title: 'title',
  subtitle: 'subtitle',
  summary: 'summary',
  content: 'content',
  rawHtml: 'raw_html',
  author: 'author',
  articleDate: 'article_date',
  tags: 'tags',
  imageUrls: 'image_urls',
  videoUrls: 'video_urls',
  contentHash: 'content_hash',
  scraperName: 'scraper_name',
  scraperVersion: 'scraper_version',
  scrapingRunId: 'scraping_run_id',
  scrapingDurationMs: 'scraping_duration_ms',
  state: 'state',
  stateUpdatedAt: 'state_updated_at',
  stateMessage: 'state_message',
  aiTitle: 'ai_title',
  aiSummary: 'ai_summary',
  aiTags: 'ai_tags',
  aiCategory: 'ai_category',
  aiModel: 'ai_model',
  aiPromptVersion: 'ai_prompt_version',
  aiTokensUsed: 'ai_tokens_used',
  aiCostUsd: 'ai_cost_usd',
  aiProcessingDurationMs: 'ai_processing_duration_ms',
  aiProcessedAt: 'ai_processed_at',
  aiMetadata: 'ai_metadata',
  retryCount: 'retry_count',
  maxRetries: 'max_retries',
  lastError: 'last_error',
  lastErrorAt: 'last_error_at',
  errorTrace: 'error_trace',
  publicationId: 'publication_id',
  publishedAt: 'published_at',
  publishedBy: 'published_by',
  updatedAt: 'updated_at',
  updatedBy: 'updated_by',
  extraMetadata: 'extra_metadata',
} as const satisfies Record<keyof StagingChanges, string>;

const SORT_COLUMNS = {
  scrapedAt: 'scraped_at',
  stateUpdatedAt: 'state_updated_at',
  aiProcessedAt: 'ai_processed_at',
} as const satisfies Record<SortField, string>;

const JSON_COLUMNS: ReadonlySet<string> = new Set(['ai_metadata', 'extra_metadata']);

/**
 * Raw fields an upsert refreshes; a difference in any of them counts as a change
 */
const REFRESHED_COLUMNS = [
  'title',
  'subtitle',
  'summary',
  'content',
  'raw_html',
  'author',
  'article_date',
  'tags',
  'image_urls',
  'video_urls',
  'canonical_url',
  'content_hash',
] as const;

function toParam(column: string, value: unknown): unknown {
  if (JSON_COLUMNS.has(column) && value !== null && value !== undefined) {
    return JSON.stringify(value);
  }
  return value ?? null;
}

function isKeyOf<T extends object>(target: T, key: PropertyKey): key is keyof T {
  return Object.prototype.hasOwnProperty.call(target, key);
}

// ═══════════════════════════════════════════════════════════════════════════════
// Row mapping
// ═══════════════════════════════════════════════════════════════════════════════

export interface StagingItemRow extends QueryResultRow {
  id: string;
  source_media: string;
  source_section: string | null;
  source_url: string;
  source_url_normalized: string;
  canonical_url: string | null;
  title: string | null;
  subtitle: string | null;
  summary: string | null;
  content: string;
  raw_html: string | null;
  author: string | null;
  article_date: Date | null;
  tags: string[] | null;
  image_urls: string[] | null;
  video_urls: string[] | null;
  content_hash: string;
  url_hash: string;
  scraper_name: string;
  scraper_version: string | null;
  scraping_run_id: string | null;
  scraped_at: Date;
  scraping_duration_ms: number | null;
  state: string;
  state_updated_at: Date;
  state_message: string | null;
  ai_title: string | null;
  ai_summary: string | null;
  ai_tags: string[] | null;
  ai_category: string | null;
  ai_model: string | null;
  ai_prompt_version: string | null;
  ai_tokens_used: number | null;
  ai_cost_usd: string | number | null;
  ai_processing_duration_ms: number | null;
  ai_processed_at: Date | null;
  ai_metadata: unknown;
  retry_count: number;
  max_retries: number;
  last_error: string | null;
  last_error_at: Date | null;
  error_trace: string | null;
  publication_id: string | null;
  published_at: Date | null;
  published_by: string | null;
  created_at: Date;
  updated_at: Date;
  created_by: string | null;
  updated_by: string | null;
  extra_metadata: unknown;
}

interface UpsertRow extends StagingItemRow {
  inserted: boolean;
}

export function mapStagingItemRow(row: StagingItemRow): StagingItem {
  if (!isPipelineState(row.state)) {
    throw new Error(`Unknown pipeline state '${row.state}' on item ${row.id}`);
  }

  return {
    id: row.id,
    sourceMedia: isSourceMedia(row.source_media) ? row.source_media : 'other',
    sourceSection: row.source_section,
    sourceUrl: row.source_url,
    sourceUrlNormalized: row.source_url_normalized,
    canonicalUrl: row.canonical_url,
    title: row.title,
    subtitle: row.subtitle,
    summary: row.summary,
    content: row.content,
    rawHtml: row.raw_html,
    author: row.author,
    articleDate: toDateOrNull(row.article_date),
    tags: toStringArray(row.tags),
    imageUrls: toStringArray(row.image_urls),
    videoUrls: toStringArray(row.video_urls),
    contentHash: row.content_hash,
    urlHash: row.url_hash,
    scraperName: row.scraper_name,
    scraperVersion: row.scraper_version,
    scrapingRunId: row.scraping_run_id,
    scrapedAt: new Date(row.scraped_at),
    scrapingDurationMs: row.scraping_duration_ms,
    state: row.state,
    stateUpdatedAt: new Date(row.state_updated_at),
    stateMessage: row.state_message,
    aiTitle: row.ai_title,
    aiSummary: row.ai_summary,
    aiTags: row.ai_tags === null ? null : toStringArray(row.ai_tags),
    aiCategory: row.ai_category,
    aiModel: row.ai_model,
    aiPromptVersion: row.ai_prompt_version,
    aiTokensUsed: row.ai_tokens_used,
    aiCostUsd: toNumberOrNull(row.ai_cost_usd),
    aiProcessingDurationMs: row.ai_processing_duration_ms,
    aiProcessedAt: toDateOrNull(row.ai_processed_at),
    aiMetadata: isRecord(row.ai_metadata) ? row.ai_metadata : null,
    retryCount: row.retry_count,
    maxRetries: row.max_retries,
    lastError: row.last_error,
    lastErrorAt: toDateOrNull(row.last_error_at),
    errorTrace: row.error_trace,
    publicationId: row.publication_id,
    publishedAt: toDateOrNull(row.published_at),
    publishedBy: row.published_by,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
    createdBy: row.created_by,
    updatedBy: row.updated_by,
    extraMetadata: isRecord(row.extra_metadata) ? row.extra_metadata : null,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Filters
// ═══════════════════════════════════════════════════════════════════════════════

export function buildWhereClause(filters: StagingFilters): { clause: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  const push = (value: unknown): string => {
    params.push(value);
    return `$${params.length}`;
  };

  if (filters.state) {
    conditions.push(`state = ${push(filters.state)}`);
  }
  if (filters.sourceMedia) {
    conditions.push(`source_media = ${push(filters.sourceMedia)}`);
  }
  if (filters.scraperName) {
    conditions.push(`scraper_name = ${push(filters.scraperName)}`);
  }

  const dateColumn = filters.dateField === 'stateUpdatedAt' ? 'state_updated_at' : 'scraped_at';
  if (filters.dateFrom) {
    conditions.push(`${dateColumn} >= ${push(filters.dateFrom)}`);
  }
  if (filters.dateTo) {
    conditions.push(`${dateColumn} <= ${push(filters.dateTo)}`);
  }

  if (filters.hasErrors !== undefined) {
    conditions.push(filters.hasErrors ? 'last_error IS NOT NULL' : 'last_error IS NULL');
  }

  if (filters.searchText) {
    const pattern = push(`%${escapeLike(filters.searchText)}%`);
    conditions.push(`(title ILIKE ${pattern} ESCAPE '\\' OR content ILIKE ${pattern} ESCAPE '\\')`);
  }

  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Repository
// ═══════════════════════════════════════════════════════════════════════════════

export class PgStagingRepository implements StagingRepository {
  constructor(private readonly pool: PoolLike) {}

  async insert(item: NewStagingItem): Promise<StagingItem> {
    const { columns, placeholders, params } = insertParts(item);

    try {
      const result = await runQuery<StagingItemRow>(
        this.pool,
        `INSERT INTO scraping_items (${columns.join(', ')})
         VALUES (${placeholders.join(', ')})
         RETURNING *`,
        params
      );
      return mapStagingItemRow(firstRow(result.rows));
    } catch (error) {
      if (isUrlHashViolation(error)) {
        throw new DuplicateUrlError(item.urlHash);
      }
      throw error;
    }
  }

  async upsert(item: NewStagingItem): Promise<UpsertResult> {
    const { columns, placeholders, params } = insertParts(item);
    const refresh = [
      ...REFRESHED_COLUMNS,
      'source_section',
      'scraper_version',
      'scraping_run_id',
      'scraping_duration_ms',
    ].map((column) => `${column} = EXCLUDED.${column}`);
    const current = REFRESHED_COLUMNS.map((column) => `scraping_items.${column}`).join(', ');
    const incoming = REFRESHED_COLUMNS.map((column) => `EXCLUDED.${column}`).join(', ');

    const result = await runQuery<UpsertRow>(
      this.pool,
      `INSERT INTO scraping_items (${columns.join(', ')})
       VALUES (${placeholders.join(', ')})
       ON CONFLICT (url_hash) DO UPDATE SET
         ${refresh.join(',\n         ')},
         updated_at = NOW()
       WHERE scraping_items.state NOT IN ('published', 'discarded', 'duplicate')
         AND (${current}) IS DISTINCT FROM (${incoming})
       RETURNING *, (xmax = 0) AS inserted`,
      params
    );

    const row = result.rows[0];
    if (row) {
      return { item: mapStagingItemRow(row), outcome: row.inserted ? 'created' : 'updated' };
    }

    // Conflict without update: terminal row or identical content
    const existing = await runQuery<StagingItemRow>(
      this.pool,
      'SELECT * FROM scraping_items WHERE url_hash = $1',
      [item.urlHash]
    );
    return { item: mapStagingItemRow(firstRow(existing.rows)), outcome: 'unchanged' };
  }

  async findById(id: string): Promise<StagingItem | null> {
    return findItem(this.pool, id, false);
  }

  async updateIfState(
    id: string,
    expectedState: PipelineState,
    changes: StagingChanges
  ): Promise<StagingItem | null> {
    if (!UUID_PATTERN.test(id)) {
      return null;
    }

    const params: unknown[] = [id, expectedState];
    const assignments: string[] = [];
    for (const [field, value] of Object.entries(changes)) {
      if (value === undefined || !isKeyOf(CHANGE_COLUMNS, field)) continue;
      const column = CHANGE_COLUMNS[field];
      params.push(toParam(column, value));
      assignments.push(`${column} = $${params.length}`);
    }

    if (assignments.length === 0) {
      return findItem(this.pool, id, false);
    }

    const result = await runQuery<StagingItemRow>(
      this.pool,
      `UPDATE scraping_items SET ${assignments.join(', ')}
       WHERE id = $1 AND state = $2
       RETURNING *`,
      params
    );
    const row = result.rows[0];
    return row ? mapStagingItemRow(row) : null;
  }

  async deleteUnpublished(id: string): Promise<boolean> {
    if (!UUID_PATTERN.test(id)) {
      return false;
    }
    const result = await runQuery(
      this.pool,
      `DELETE FROM scraping_items
       WHERE id = $1 AND state <> 'published' AND publication_id IS NULL`,
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async list(filters: StagingFilters, page: PageRequest): Promise<{ items: StagingItem[]; total: number }> {
    const { clause, params } = buildWhereClause(filters);
    const direction = page.order === 'oldest' ? 'ASC' : 'DESC';
    const sortColumn = SORT_COLUMNS[page.orderBy];

    const result = await runQuery<StagingItemRow & { total_count: number }>(
      this.pool,
      `SELECT *, COUNT(*) OVER()::int AS total_count
       FROM scraping_items
       ${clause}
       ORDER BY ${sortColumn} ${direction} NULLS LAST, id ${direction}
       LIMIT $${params.length + 1} OFFSET $${params.length + 2}`,
      [...params, page.limit, page.offset]
    );

    const first = result.rows[0];
    if (first) {
      return { items: result.rows.map(mapStagingItemRow), total: first.total_count };
    }

    // Past the last page: the window count is unavailable
    const count = await runQuery<{ total: number }>(
      this.pool,
      `SELECT COUNT(*)::int AS total FROM scraping_items ${clause}`,
      params
    );
    return { items: [], total: count.rows[0]?.total ?? 0 };
  }

  async findDuplicateGroups(): Promise<DuplicateGroup[]> {
    const result = await runQuery<{ content_hash: string; members: unknown }>(
      this.pool,
      `SELECT content_hash,
              json_agg(json_build_object('id', id, 'state', state, 'scrapedAt', scraped_at)
                       ORDER BY scraped_at ASC, id ASC) AS members
       FROM scraping_items
       GROUP BY content_hash
       HAVING COUNT(*) > 1`
    );

    return result.rows.map((row) => ({
      contentHash: row.content_hash,
      members: (Array.isArray(row.members) ? row.members : []).filter(isRecord).flatMap((member) => {
        const scrapedAt = toDateOrNull(member['scrapedAt']);
        const state = member['state'];
        const id = member['id'];
        return typeof id === 'string' && isPipelineState(state) && scrapedAt ? [{ id, state, scrapedAt }] : [];
      }),
    }));
  }

  async findSimilarTitle(title: string, excludeId: string, threshold: number): Promise<SimilarTitle | null> {
    const result = await runQuery<{ kind: string; id: string; title: string; similarity: number }>(
      this.pool,
      `SELECT kind, id, title, similarity FROM (
         SELECT 'publication' AS kind, id::text AS id, title,
                similarity(LOWER(title), LOWER($1))::float8 AS similarity, 0 AS rank
         FROM publications
         WHERE state = 'published' AND similarity(LOWER(title), LOWER($1)) > $3
         UNION ALL
         SELECT 'item', id::text, ai_title,
                similarity(LOWER(ai_title), LOWER($1))::float8, 1
         FROM scraping_items
         WHERE state IN ('ready_to_publish', 'published')
           AND id::text <> $2
           AND ai_title IS NOT NULL
           AND similarity(LOWER(ai_title), LOWER($1)) > $3
       ) matches
       ORDER BY rank, similarity DESC
       LIMIT 1`,
      [title, excludeId, threshold]
    );

    const row = result.rows[0];
    if (!row) {
      return null;
    }
    return {
      kind: row.kind === 'publication' ? 'publication' : 'item',
      id: row.id,
      title: row.title,
      similarity: row.similarity,
    };
  }

  async statsSnapshot(): Promise<StatsSnapshot> {
    // One statement, one snapshot
    const result = await runQuery<StatsRow>(
      this.pool,
      `WITH base AS (
         SELECT state, source_media, ai_tokens_used, ai_cost_usd, last_error FROM scraping_items
       )
       SELECT
         (SELECT COUNT(*)::int FROM base) AS total_items,
         (SELECT COALESCE(json_object_agg(state, n), '{}'::json)
            FROM (SELECT state, COUNT(*)::int AS n FROM base GROUP BY state) s) AS by_state,
         (SELECT COALESCE(json_object_agg(source_media, n), '{}'::json)
            FROM (SELECT source_media, COUNT(*)::int AS n FROM base GROUP BY source_media) m) AS by_source_media,
         (SELECT AVG(ai_tokens_used)::float8 FROM base WHERE ai_tokens_used IS NOT NULL) AS avg_ai_tokens,
         (SELECT SUM(ai_cost_usd)::float8 FROM base WHERE ai_tokens_used IS NOT NULL) AS total_ai_cost_usd,
         (SELECT COUNT(*)::int FROM base WHERE state = 'error') AS items_in_error,
         (SELECT COUNT(*)::int FROM base WHERE last_error IS NOT NULL) AS items_with_errors,
         (SELECT COUNT(*)::int FROM base WHERE state = 'ready_for_ai') AS items_ready_for_ai,
         (SELECT COUNT(*)::int FROM base WHERE state = 'ready_to_publish') AS items_ready_to_publish,
         NOW() AS generated_at`
    );

    const row = firstRow(result.rows);
    return {
      totalItems: row.total_items,
      byState: countsByKey(row.by_state, isPipelineState),
      bySourceMedia: countsByKey(row.by_source_media, isSourceMedia),
      avgAiTokens: toNumberOrNull(row.avg_ai_tokens),
      totalAiCostUsd: toNumberOrNull(row.total_ai_cost_usd),
      itemsInError: row.items_in_error,
      itemsWithErrors: row.items_with_errors,
      itemsReadyForAi: row.items_ready_for_ai,
      itemsReadyToPublish: row.items_ready_to_publish,
      generatedAt: new Date(row.generated_at),
    };
  }

  async transaction<T>(work: (scope: PublishScope) => Promise<T>): Promise<T> {
    return withTransaction(async (client) => {
      const scope: PublishScope = {
        lockItem: (id) => findItem(client, id, true),
        markPublished: (id, link) => markPublished(client, id, link),
        publications: new PgPublicationStore(client),
      };
      return work(scope);
    }, this.pool);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Helpers
// ═══════════════════════════════════════════════════════════════════════════════

interface StatsRow extends QueryResultRow {
  total_items: number;
  by_state: unknown;
  by_source_media: unknown;
  avg_ai_tokens: number | null;
  total_ai_cost_usd: number | null;
  items_in_error: number;
  items_with_errors: number;
  items_ready_for_ai: number;
  items_ready_to_publish: number;
  generated_at: Date;
}

function insertParts(item: NewStagingItem): { columns: string[]; placeholders: string[]; params: unknown[] } {
  const columns: string[] = [];
  const placeholders: string[] = [];
  const params: unknown[] = [];

  for (const field of Object.keys(INSERT_COLUMNS)) {
    if (!isKeyOf(INSERT_COLUMNS, field)) continue;
    const column = INSERT_COLUMNS[field];
    columns.push(column);
    params.push(toParam(column, item[field]));
    placeholders.push(`$${params.length}`);
  }

  return { columns, placeholders, params };
}

async function findItem(db: Queryable, id: string, forUpdate: boolean): Promise<StagingItem | null> {
  if (!UUID_PATTERN.test(id)) {
    return null;
  }
  const result = await runQuery<StagingItemRow>(
    db,
    `SELECT * FROM scraping_items WHERE id = $1${forUpdate ? ' FOR UPDATE' : ''}`,
    [id]
  );
  const row = result.rows[0];
  return row ? mapStagingItemRow(row) : null;
}

async function markPublished(db: Queryable, id: string, link: PublicationLink): Promise<StagingItem> {
  const result = await runQuery<StagingItemRow>(
    db,
    `UPDATE scraping_items
     SET state = 'published',
         state_updated_at = $3,
         state_message = $5,
         publication_id = $2,
         published_at = $3,
         published_by = $4,
         updated_by = $4,
         updated_at = $3
     WHERE id = $1 AND state = 'ready_to_publish' AND publication_id IS NULL
     RETURNING *`,
    [id, link.publicationId, link.publishedAt, link.publishedBy, link.stateMessage]
  );
  return mapStagingItemRow(firstRow(result.rows));
}

function firstRow<T>(rows: T[]): T {
  const row = rows[0];
  if (!row) {
    throw new Error('Expected a row but the query returned none');
  }
  return row;
}

function countsByKey<K extends string>(value: unknown, isKey: (key: unknown) => key is K): Partial<Record<K, number>> {
  const counts: Partial<Record<K, number>> = {};
  if (!isRecord(value)) {
    return counts;
  }
  for (const [key, count] of Object.entries(value)) {
    if (isKey(key) && typeof count === 'number') {
      counts[key] = count;
    }
  }
  return counts;
}

/**
 * Make LIKE wildcards in user text match literally
 */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (char) => `\\${char}`);
}

function isUrlHashViolation(error: unknown): boolean {
  if (getErrorCode(error) !== '23505') {
    return false;
  }
  const constraint = isRecord(error) ? error['constraint'] : undefined;
  return constraint === undefined || constraint === URL_HASH_UNIQUE_INDEX;
}
