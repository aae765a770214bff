/**
 * Persistence contract for scraping run history
 * PostgreSQL implementation: db/scraping-run-repository.ts.
 */

import type { NewScrapingRun, ScrapingRun, ScrapingRunOutcome } from '../types/index.js';

export interface ScrapingRunRepository {
  /** Insert a run in `running` */
  start(run: NewScrapingRun): Promise<ScrapingRun>;

  /** Close a run with its counters; throws when the run does not exist */
  finish(id: string, outcome: ScrapingRunOutcome): Promise<ScrapingRun>;

  /** Most recently started first */
  listRecent(limit: number): Promise<ScrapingRun[]>;
}
