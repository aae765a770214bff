#!/usr/bin/env node
/**
 * Newsroom Staging Pipeline
 *
 * Automated pipeline that:
 * 1. Fetches news from the configured media RSS feeds
 * 2. Stages every article with URL and content deduplication
 * 3. Rewrites queued items with OpenAI
 * 4. Promotes items that pass the quality gate
 * 5. Publishes items exactly once
 *
 * Usage:
 *   node dist/index.js --service  - Run as service (cron scheduler)
 *   node dist/index.js --run      - Run one cycle and exit
 *   node dist/index.js --stats    - Print staging statistics
 *   node dist/index.js --dedup    - Run the duplicate sweep only
 *   node dist/index.js            - Default: service mode
 *
 * Cycle flags: --dry-run, --skip-fetch, --skip-dedup, --skip-ai,
 * --skip-automation, --max-articles=N
 */

import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { initDatabase, closeDatabase } from './db/index.js';
import { PgStagingRepository } from './db/staging-repository.js';
import { PgScrapingRunRepository } from './db/scraping-run-repository.js';
import { ScrapingRunLog } from './runs/index.js';
import { StagingStore } from './staging/index.js';
import { StatsAggregator } from './stats/index.js';
import { runPipeline } from './pipeline.js';
import { runService } from './scheduler.js';
import { parseCliArgs, type CliArgs } from './cli.js';

async function printStats(): Promise<void> {
  const pool = await initDatabase();
  const stats = await new StatsAggregator(new PgStagingRepository(pool)).snapshot();
  const recentRuns = await new ScrapingRunLog(new PgScrapingRunRepository(pool)).recent(5);
  process.stdout.write(`${JSON.stringify({ ...stats, recentRuns }, null, 2)}\n`);
}

async function sweepDuplicates(): Promise<void> {
  const pool = await initDatabase();
  const store = new StagingStore(new PgStagingRepository(pool), { defaultMaxRetries: config.pipeline.maxRetries });
  const result = await store.markDuplicates();
  logger.info(result, 'Duplicate sweep finished');
}

async function runOnce({ options }: CliArgs): Promise<void> {
  if (options.dryRun) {
    logger.info('DRY RUN MODE - No changes will be made');
  }

  const result = await runPipeline({ ...options, trigger: 'manual' });

  logger.info('');
  logger.info('Pipeline Complete:');
  logger.info(`  ✓ Fetched:     ${result.fetched} articles`);
  logger.info(`  ✓ Ingested:    ${result.ingested} articles`);
  logger.info(`  ✓ Duplicates:  ${result.duplicates}`);
  logger.info(`  ✓ Queued:      ${result.queued}`);
  logger.info(`  ✓ AI:          ${result.aiProcessed}`);
  logger.info(`  ✓ Prepared:    ${result.prepared}`);
  logger.info(`  ✓ Expired:     ${result.expired}`);
  logger.info(`  ✓ Reclaimed:   ${result.reclaimed}`);
  logger.info(`  ✓ Published:   ${result.published}`);
  if (result.errors > 0) {
    logger.info(`  ⚠ Errors:      ${result.errors}`);
  }
  if (result.runId) {
    logger.info(`  ⚑ Run:         ${result.runId}`);
  }
  logger.info(`  ⏱ Duration:    ${(result.durationMs / 1000).toFixed(1)}s`);
}

async function main(): Promise<void> {
  const cli = parseCliArgs(process.argv.slice(2));

  logger.info({ env: config.app.env, mode: cli.mode }, 'Starting application');

  switch (cli.mode) {
    case 'run':
      await runOnce(cli);
      break;
    case 'service':
      await runService(cli.options);
      break;
    case 'stats':
      try {
        await printStats();
      } finally {
        await closeDatabase();
      }
      break;
    case 'dedup':
      try {
        await sweepDuplicates();
      } finally {
        await closeDatabase();
      }
      break;
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Application failed');
  process.exitCode = 1;
});
