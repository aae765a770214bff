/**
 * Scraping Run Log
 *
 * Opens a run before a fetch and closes it with the counters of the
 * fetch and ingestion that followed. Items ingested in between carry the
 * run id.
 */

import { logger } from '../utils/logger.js';
import type { RunTrigger, ScrapingRun } from '../types/index.js';
import type { ScrapingRunRepository } from './repository.js';

export interface RunCounters {
  itemsScraped: number;
  itemsFailed: number;
  itemsDuplicate: number;
  errors: string[];
}

const EMPTY_COUNTERS: RunCounters = { itemsScraped: 0, itemsFailed: 0, itemsDuplicate: 0, errors: [] };

export class ScrapingRunLog {
  constructor(
    private readonly repo: ScrapingRunRepository,
    private readonly now: () => Date = () => new Date()
  ) {}

  async start(triggeredBy: RunTrigger, sourcesProcessed: string[]): Promise<ScrapingRun> {
    const run = await this.repo.start({ triggeredBy, sourcesProcessed, startedAt: this.now() });
    logger.info({ runId: run.id, triggeredBy, sources: sourcesProcessed.length }, 'Scraping run started');
    return run;
  }

  async complete(run: ScrapingRun, counters: RunCounters): Promise<ScrapingRun> {
    const finished = await this.repo.finish(run.id, {
      ...counters,
      status: 'completed',
      finishedAt: this.now(),
      errorMessage: null,
    });
    logger.info(
      {
        runId: run.id,
        itemsScraped: finished.itemsScraped,
        itemsFailed: finished.itemsFailed,
        itemsDuplicate: finished.itemsDuplicate,
        durationSeconds: finished.durationSeconds,
      },
      'Scraping run completed'
    );
    return finished;
  }

  /**
   * Close the run as failed, keeping whatever was counted before the failure
   */
  async fail(run: ScrapingRun, error: unknown, counters: RunCounters = EMPTY_COUNTERS): Promise<ScrapingRun> {
    const message = error instanceof Error ? error.message : String(error);
    const finished = await this.repo.finish(run.id, {
      ...counters,
      status: 'failed',
      finishedAt: this.now(),
      errorMessage: message,
    });
    logger.error({ runId: run.id, error }, 'Scraping run failed');
    return finished;
  }

  recent(limit = 10): Promise<ScrapingRun[]> {
    return this.repo.listRecent(limit);
  }
}
