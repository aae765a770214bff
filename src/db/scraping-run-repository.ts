/**
 * PostgreSQL Scraping Run Repository
 */

import type { QueryResultRow } from 'pg';
import { runQuery, type Queryable } from './index.js';
import { toDateOrNull, toNumberOrNull, toStringArray } from '../utils/guards.js';
import type { NewScrapingRun, RunStatus, RunTrigger, ScrapingRun, ScrapingRunOutcome } from '../types/index.js';
import type { ScrapingRunRepository } from '../runs/repository.js';

export interface ScrapingRunRow extends QueryResultRow {
  id: string;
  started_at: Date;
  finished_at: Date | null;
  duration_seconds: string | number | null;
  status: string;
  triggered_by: string;
  sources_processed: string[] | null;
  items_scraped: number;
  items_failed: number;
  items_duplicate: number;
  errors: unknown;
  error_message: string | null;
}

function toRunStatus(value: string): RunStatus {
  return value === 'completed' || value === 'failed' ? value : 'running';
}

function toRunTrigger(value: string): RunTrigger {
  return value === 'manual' ? 'manual' : 'scheduled';
}

export function mapScrapingRunRow(row: ScrapingRunRow): ScrapingRun {
  return {
    id: row.id,
    startedAt: new Date(row.started_at),
    finishedAt: toDateOrNull(row.finished_at),
    durationSeconds: toNumberOrNull(row.duration_seconds),
    status: toRunStatus(row.status),
    triggeredBy: toRunTrigger(row.triggered_by),
    sourcesProcessed: toStringArray(row.sources_processed),
    itemsScraped: row.items_scraped,
    itemsFailed: row.items_failed,
    itemsDuplicate: row.items_duplicate,
    errors: toStringArray(row.errors),
    errorMessage: row.error_message,
  };
}

export class PgScrapingRunRepository implements ScrapingRunRepository {
  constructor(private readonly db: Queryable) {}

  async start(run: NewScrapingRun): Promise<ScrapingRun> {
    const result = await runQuery<ScrapingRunRow>(
      this.db,
      `INSERT INTO scraping_runs (started_at, status, triggered_by, sources_processed)
       VALUES ($1, 'running', $2, $3)
       RETURNING *`,
      [run.startedAt, run.triggeredBy, run.sourcesProcessed]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error('Scraping run insert returned no row');
    }
    return mapScrapingRunRow(row);
  }

  async finish(id: string, outcome: ScrapingRunOutcome): Promise<ScrapingRun> {
    const result = await runQuery<ScrapingRunRow>(
      this.db,
      `UPDATE scraping_runs
       SET finished_at = $2,
           duration_seconds = EXTRACT(EPOCH FROM ($2::timestamptz - started_at)),
           status = $3,
           items_scraped = $4,
           items_failed = $5,
           items_duplicate = $6,
           errors = $7,
           error_message = $8
       WHERE id = $1
       RETURNING *`,
      [
        id,
        outcome.finishedAt,
        outcome.status,
        outcome.itemsScraped,
        outcome.itemsFailed,
        outcome.itemsDuplicate,
        JSON.stringify(outcome.errors),
        outcome.errorMessage,
      ]
    );
    const row = result.rows[0];
    if (!row) {
      throw new Error(`Scraping run not found: ${id}`);
    }
    return mapScrapingRunRow(row);
  }

  async listRecent(limit: number): Promise<ScrapingRun[]> {
    const result = await runQuery<ScrapingRunRow>(
      this.db,
      'SELECT * FROM scraping_runs ORDER BY started_at DESC LIMIT $1',
      [limit]
    );
    return result.rows.map(mapScrapingRunRow);
  }
}
