/**
 * Pipeline Tests
 *
 * Full cycles over the in-memory repository with a stub producer and a
 * stub completion function.
 */

import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { createServices, runCycle, type PipelineServices } from '../pipeline.js';
import type { CompleteFn } from '../ai/index.js';
import type { MediaSource } from '../config/sources.js';
import { RssProducer, type FeedItem, type Producer } from '../scraper/index.js';
import type { RawArticle } from '../types/index.js';
import { FakeClock, MemoryStagingRepository } from './helpers/memory-repository.js';
import { MemoryScrapingRunRepository } from './helpers/memory-run-repository.js';
import { rawArticle } from './helpers/fixtures.js';

const ANSWER = {
  title: 'La inflación de febrero fue la más baja del año',
  summary: 'El índice de precios marcó en febrero la variación mensual más baja de los últimos doce meses.',
  category: 'Economía',
  tags: ['inflacion', 'precios'],
  sin_vueltas: 'La inflación de febrero fue la más baja del año.',
  lo_central: 'El índice de precios al consumidor marcó en febrero su menor variación del último año.',
  en_profundidad:
    'El informe oficial publicado el jueves mostró una desaceleración por tercer mes consecutivo, ' +
    'impulsada por alimentos y servicios regulados.',
  is_valid: true,
  validation_reason: null,
};

const INFOBAE: MediaSource = {
  name: 'Infobae',
  media: 'infobae',
  baseUrl: 'https://www.infobae.com',
  active: true,
  feeds: [],
  maxArticlesPerRun: 10,
  autoPublish: true,
  autoPublishDelayMinutes: 0,
};

const LA_GACETA: MediaSource = {
  name: 'La Gaceta',
  media: 'lagaceta',
  baseUrl: 'https://www.lagaceta.com.ar',
  active: true,
  feeds: [{ section: 'economia', url: 'https://feeds.example.test/lagaceta-economia.xml' }],
  maxArticlesPerRun: 10,
  autoPublish: false,
  autoPublishDelayMinutes: 15,
};

const RUN_ID = '0000000c-0000-4000-8000-000000000001';

function stubProducer(articles: RawArticle[], errors = 0): Producer & { produce: Mock<Producer['produce']> } {
  return {
    name: 'stub',
    sources: ['infobae'],
    produce: vi.fn<Producer['produce']>(async () => ({
      articles,
      fetchedAt: new Date('2025-03-01T12:00:00.000Z'),
      feedsProcessed: 1,
      totalFound: articles.length,
      errors,
      failures: Array.from({ length: errors }, (_, n) => `https://feeds.example.test/${n + 1}.xml: timeout`),
    })),
  };
}

function feedItem(n: number): FeedItem {
  return {
    title: `Exportaciones de limón: informe ${n}`,
    link: `https://www.lagaceta.com.ar/nota/${n}/economia/limon.html`,
    isoDate: '2025-03-01T10:00:00.000Z',
    contentSnippet: `Las exportaciones de limón crecieron según el informe número ${n} de la cámara del sector.`,
  };
}

describe('runCycle', () => {
  let clock: FakeClock;
  let repo: MemoryStagingRepository;
  let runRepo: MemoryScrapingRunRepository;
  let complete: Mock<CompleteFn>;

  const articles = [
    rawArticle(),
    rawArticle({ url: 'https://www.infobae.com/economia/2025/02/27/la-inflacion-de-febrero-amp/' }),
  ];

  beforeEach(() => {
    clock = new FakeClock();
    repo = new MemoryStagingRepository(clock.now);
    runRepo = new MemoryScrapingRunRepository();
    complete = vi.fn<CompleteFn>().mockResolvedValue({
      model: 'gpt-4o-mini',
      choices: [{ message: { content: JSON.stringify(ANSWER) } }],
      usage: { prompt_tokens: 800, completion_tokens: 400, total_tokens: 1200 },
    });
  });

  function services(producer: Producer, withAi = true): PipelineServices {
    return createServices(repo, runRepo, {
      producer,
      complete: withAi ? complete : undefined,
      sourceLookup: (media) => (media === 'infobae' ? INFOBAE : undefined),
      now: clock.now,
    });
  }

  it('should take fetched articles all the way to publication', async () => {
    const result = await runCycle(services(stubProducer(articles)), { autoPrepare: true });

    expect(result).toEqual({
      runId: RUN_ID,
      fetched: 2,
      ingested: 2,
      duplicates: 1,
      queued: 1,
      aiProcessed: 1,
      prepared: 1,
      expired: 0,
      reclaimed: 0,
      published: 1,
      errors: 0,
      durationMs: 0,
    });
    expect(complete).toHaveBeenCalledTimes(1);

    const states = [...repo.items.values()].map((item) => item.state).sort();
    expect(states).toEqual(['duplicate', 'published']);
    expect([...repo.publications.values()][0]?.slug).toBe('la-inflacion-de-febrero-fue-la-mas-baja-del-ano');
  });

  it('should write nothing in a dry run', async () => {
    const producer = stubProducer(articles);

    const result = await runCycle(services(producer), { dryRun: true });

    expect(producer.produce).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ runId: null, fetched: 2, ingested: 0 });
    expect(repo.items.size).toBe(0);
    expect(runRepo.runs.size).toBe(0);
  });

  it('should leave items queued when AI is not configured', async () => {
    const result = await runCycle(services(stubProducer([rawArticle()]), false), { autoPrepare: true });

    expect(result).toMatchObject({ ingested: 1, queued: 1, aiProcessed: 0, prepared: 0, published: 0 });
    expect([...repo.items.values()][0]?.state).toBe('ready_for_ai');
  });

  it('should count producer and ingestion failures as errors', async () => {
    const future = rawArticle({
      url: 'https://www.infobae.com/economia/2025/03/02/manana/',
      articleDate: '2025-03-02T10:00:00.000Z',
    });

    const result = await runCycle(services(stubProducer([future], 2)), { skipAi: true, skipAutomation: true });

    expect(result).toMatchObject({ fetched: 1, ingested: 0, errors: 3 });
    expect(runRepo.runs.get(RUN_ID)).toMatchObject({
      status: 'completed',
      itemsScraped: 1,
      itemsFailed: 1,
      itemsDuplicate: 0,
      errors: ['https://feeds.example.test/1.xml: timeout', 'https://feeds.example.test/2.xml: timeout'],
    });
  });

  it('should record the scraping run and stamp its id on ingested items', async () => {
    const result = await runCycle(services(stubProducer(articles)), {
      skipAi: true,
      skipAutomation: true,
      trigger: 'manual',
    });
    clock.advance(60_000);
    const again = await runCycle(services(stubProducer(articles)), { skipAi: true, skipAutomation: true });

    expect(result.runId).toBe(RUN_ID);
    expect(runRepo.runs.get(RUN_ID)).toMatchObject({
      status: 'completed',
      triggeredBy: 'manual',
      sourcesProcessed: ['infobae'],
      itemsScraped: 2,
      itemsFailed: 0,
      itemsDuplicate: 0,
      errorMessage: null,
      durationSeconds: 0,
    });
    expect(runRepo.runs.get(again.runId ?? '')).toMatchObject({
      triggeredBy: 'scheduled',
      itemsScraped: 2,
      itemsDuplicate: 2,
    });
    expect([...repo.items.values()].map((item) => item.scrapingRunId)).toEqual([RUN_ID, RUN_ID]);
  });

  it('should close the run as failed when the producer throws', async () => {
    const producer = stubProducer(articles);
    producer.produce.mockRejectedValueOnce(new Error('feed host unreachable'));

    await expect(runCycle(services(producer))).rejects.toThrow('feed host unreachable');

    expect(runRepo.runs.get(RUN_ID)).toMatchObject({
      status: 'failed',
      errorMessage: 'feed host unreachable',
      itemsScraped: 0,
    });
  });

  it('should ingest RSS feed items under the run id', async () => {
    const parser = {
      parseURL: vi.fn(async () => ({ items: [feedItem(1), feedItem(2)] })),
    };
    const producer = new RssProducer([LA_GACETA], { parser, now: clock.now });

    const result = await runCycle(services(producer), { skipAi: true, skipAutomation: true });

    expect(result).toMatchObject({ runId: RUN_ID, fetched: 2, ingested: 2, errors: 0 });
    const items = [...repo.items.values()];
    expect(items.map((item) => item.sourceUrl)).toEqual([
      'https://www.lagaceta.com.ar/nota/1/economia/limon.html',
      'https://www.lagaceta.com.ar/nota/2/economia/limon.html',
    ]);
    expect(items.map((item) => item.scrapingRunId)).toEqual([RUN_ID, RUN_ID]);
    expect(items[0]?.scraperName).toBe('lagaceta-rss');
    expect(runRepo.runs.get(RUN_ID)?.sourcesProcessed).toEqual(['lagaceta']);
  });

  it('should skip fetching when asked', async () => {
    const producer = stubProducer(articles);

    await runCycle(services(producer), { skipFetch: true });

    expect(producer.produce).not.toHaveBeenCalled();
  });
});
