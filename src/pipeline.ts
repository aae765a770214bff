/**
 * Main Pipeline
 *
 * One cycle of the newsroom workflow:
 * 1. Fetch articles from the media RSS feeds, recorded as a scraping run
 * 2. Ingest them into the staging table under that run
 * 3. Mark content duplicates
 * 4. Queue fresh items for AI
 * 5. Reclaim stalled claims, requeue failed items and run the AI batch
 * 6. Quality gate, expiry and auto-publish
 */

import { config, getActiveSources, getSource } from './config/index.js';
import { initDatabase, closeDatabase } from './db/index.js';
import { PgStagingRepository } from './db/staging-repository.js';
import { PgScrapingRunRepository } from './db/scraping-run-repository.js';
import { ScrapingRunLog, type ScrapingRunRepository } from './runs/index.js';
import { RssProducer, type Producer } from './scraper/index.js';
import { IngestionGateway } from './ingestion/index.js';
import { StagingStore, type StagingRepository } from './staging/index.js';
import { AiProcessor, isAiProcessingAvailable, type CompleteFn } from './ai/index.js';
import { Automation } from './automation/index.js';
import { PublishTransaction } from './publish/index.js';
import { StatsAggregator } from './stats/index.js';
import { logger } from './utils/logger.js';
import type { MediaSource } from './config/sources.js';
import type { PipelineResult, RunTrigger, ScrapingRun, SourceMedia } from './types/index.js';

/**
 * Pipeline options
 */
export interface PipelineOptions {
  /** AI batch size for this cycle */
  maxArticles?: number;
  skipFetch?: boolean;
  skipDedup?: boolean;
  skipAi?: boolean;
  skipAutomation?: boolean;
  /** Defaults to AUTO_PREPARE */
  autoPrepare?: boolean;
  /** Fetch only; nothing is written */
  dryRun?: boolean;
  /** Recorded on the scraping run */
  trigger?: RunTrigger;
}

/**
 * Components one cycle runs on, wired to a single repository
 */
export interface PipelineServices {
  store: StagingStore;
  producer: Producer;
  gateway: IngestionGateway;
  processor: AiProcessor;
  automation: Automation;
  publisher: PublishTransaction;
  runs: ScrapingRunLog;
  stats: StatsAggregator;
  aiEnabled: boolean;
  now: () => Date;
}

export interface ServiceOverrides {
  producer?: Producer;
  complete?: CompleteFn;
  sourceLookup?: (media: SourceMedia) => MediaSource | undefined;
  now?: () => Date;
}

export function createServices(
  repo: StagingRepository,
  runRepo: ScrapingRunRepository,
  overrides: ServiceOverrides = {}
): PipelineServices {
  const now = overrides.now ?? (() => new Date());
  const store = new StagingStore(repo, {
    now,
    defaultMaxRetries: config.pipeline.maxRetries,
    listDefaultLimit: config.pipeline.listDefaultLimit,
    listMaxLimit: config.pipeline.listMaxLimit,
  });
  const publisher = new PublishTransaction(repo, now);

  return {
    store,
    producer: overrides.producer ?? new RssProducer(getActiveSources()),
    gateway: new IngestionGateway(store, now),
    processor: new AiProcessor(store, { complete: overrides.complete, now }),
    automation: new Automation(store, publisher, { now, sourceLookup: overrides.sourceLookup ?? getSource }),
    publisher,
    runs: new ScrapingRunLog(runRepo, now),
    stats: new StatsAggregator(repo),
    aiEnabled: overrides.complete !== undefined || isAiProcessingAvailable(),
    now,
  };
}

/**
 * Run one cycle against already wired services
 */
export async function runCycle(services: PipelineServices, options: PipelineOptions = {}): Promise<PipelineResult> {
  const {
    maxArticles = config.openai.batchSize,
    skipFetch = false,
    skipDedup = false,
    skipAi = false,
    skipAutomation = false,
    autoPrepare = config.pipeline.autoPrepare,
    dryRun = false,
    trigger = 'scheduled',
  } = options;
  const { store, producer, processor, automation, runs } = services;

  const startTime = services.now().getTime();
  const result: PipelineResult = {
    runId: null,
    fetched: 0,
    ingested: 0,
    duplicates: 0,
    queued: 0,
    aiProcessed: 0,
    prepared: 0,
    expired: 0,
    reclaimed: 0,
    published: 0,
    errors: 0,
    durationMs: 0,
  };

  logger.info({ options }, 'Starting pipeline');

  try {
    // Step 1-2: Fetch and ingest
    if (!skipFetch) {
      const run = dryRun ? null : await runs.start(trigger, producer.sources);
      result.runId = run?.id ?? null;
      await fetchAndIngest(services, run, result);
    }

    if (dryRun) {
      result.durationMs = services.now().getTime() - startTime;
      logger.info({ result }, 'Dry run complete');
      return result;
    }

    // Step 3: Duplicate sweep
    if (!skipDedup) {
      logger.info('Step 3: Sweeping duplicates...');
      const dedup = await store.markDuplicates();
      result.duplicates = dedup.markedCount;
    }

    // Step 4-5: AI
    if (!skipAi) {
      logger.info('Step 4: Queueing items for AI...');
      result.queued = (await automation.queueForAi()).queued;

      if (!services.aiEnabled) {
        logger.warn('OpenAI API key not configured, skipping AI processing');
      } else {
        logger.info('Step 5: Running AI batch...');
        result.reclaimed = (await processor.reclaimStale()).reclaimed;
        await processor.retryFailed(maxArticles);
        const batch = await processor.processBatch(maxArticles);
        result.aiProcessed = batch.completed + batch.discarded;
        result.errors += batch.failed;
        logger.info(
          { completed: batch.completed, discarded: batch.discarded, tokens: batch.totalTokens, costUsd: batch.totalCostUsd },
          'AI processing complete'
        );
      }
    }

    // Step 6: Automation
    if (!skipAutomation) {
      logger.info('Step 6: Running automation...');
      if (autoPrepare) {
        result.prepared = (await automation.autoPrepare()).promoted;
      }
      result.expired = (await automation.expireStale()).discarded;

      const published = await automation.autoPublish();
      result.published = published.published;
      result.errors += published.failed;
    }

    result.durationMs = services.now().getTime() - startTime;
    const stats = await services.stats.snapshot();
    logger.info({ result, byState: stats.byState }, 'Pipeline complete');

    return result;
  } catch (error) {
    logger.error({ error }, 'Pipeline failed');
    throw error;
  }
}

/**
 * Steps 1-2. The run, when there is one, closes as completed with the
 * fetch and ingestion counters, or as failed with whatever was counted.
 */
async function fetchAndIngest(
  services: PipelineServices,
  run: ScrapingRun | null,
  result: PipelineResult
): Promise<void> {
  const { producer, gateway, runs } = services;
  const counters = { itemsScraped: 0, itemsFailed: 0, itemsDuplicate: 0, errors: new Array<string>() };

  try {
    logger.info({ producer: producer.name, runId: run?.id }, 'Step 1: Fetching articles...');
    const fetched = await producer.produce();
    result.fetched = fetched.articles.length;
    result.errors += fetched.errors;
    counters.itemsScraped = fetched.articles.length;
    counters.errors.push(...fetched.failures);

    if (!run) {
      logger.info({ fetched: result.fetched }, 'Dry run: skipping ingestion');
      return;
    }

    if (fetched.articles.length > 0) {
      logger.info('Step 2: Ingesting articles...');
      const ingest = await gateway.ingestBatch(fetched.articles, { scrapingRunId: run.id });
      result.ingested = ingest.created + ingest.updated;
      result.errors += ingest.failed;
      counters.itemsFailed = ingest.failed;
      counters.itemsDuplicate = ingest.unchanged;
      logger.info(
        { created: ingest.created, updated: ingest.updated, unchanged: ingest.unchanged, failed: ingest.failed },
        'Ingestion complete'
      );
    }

    await runs.complete(run, counters);
  } catch (error) {
    if (run) {
      await runs.fail(run, error, counters).catch((closeError: unknown) => {
        logger.error({ error: closeError, runId: run.id }, 'Could not close scraping run');
      });
    }
    throw error;
  }
}

/**
 * Run one cycle against PostgreSQL, closing the pool afterwards
 */
export async function runPipeline(options: PipelineOptions = {}): Promise<PipelineResult> {
  try {
    const pool = await initDatabase();
    return await runCycle(createServices(new PgStagingRepository(pool), new PgScrapingRunRepository(pool)), options);
  } finally {
    await closeDatabase();
  }
}
