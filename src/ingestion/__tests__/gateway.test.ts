/**
 * Ingestion Gateway Tests
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { IngestionGateway } from '../gateway.js';
import { StagingStore } from '../../staging/store.js';
import { ValidationError } from '../../errors/index.js';
import { FakeClock, MemoryStagingRepository } from '../../__tests__/helpers/memory-repository.js';
import { rawArticle } from '../../__tests__/helpers/fixtures.js';

describe('IngestionGateway', () => {
  let clock: FakeClock;
  let repo: MemoryStagingRepository;
  let store: StagingStore;
  let gateway: IngestionGateway;

  beforeEach(() => {
    clock = new FakeClock();
    repo = new MemoryStagingRepository(clock.now);
    store = new StagingStore(repo, { now: clock.now });
    gateway = new IngestionGateway(store, clock.now);
  });

  describe('ingest', () => {
    it('should stage a valid article at scraped', async () => {
      const result = await gateway.ingest(rawArticle(), { createdBy: 'rss-producer' });

      expect(result.created).toBe(true);
      expect(result.contentChanged).toBe(false);
      expect(result.item).toMatchObject({
        state: 'scraped',
        sourceMedia: 'infobae',
        sourceSection: 'economia',
        sourceUrlNormalized: 'https://www.infobae.com/economia/2025/02/27/la-inflacion-de-febrero',
        scraperName: 'infobae-scraper',
        createdBy: 'rss-producer',
        subtitle: null,
      });
      expect(result.item.articleDate).toEqual(new Date('2025-02-27T15:30:00.000Z'));
    });

    it('should treat identical input as a no-op', async () => {
      const first = await gateway.ingest(rawArticle());
      const second = await gateway.ingest(rawArticle());

      expect(second).toMatchObject({ created: false, contentChanged: false });
      expect(second.item.id).toBe(first.item.id);
      expect(repo.items.size).toBe(1);
    });

    it('should refresh changed content without rewinding the item', async () => {
      const { item } = await gateway.ingest(rawArticle());
      await store.update(item.id, { state: 'ready_for_ai' });

      const result = await gateway.ingest(
        rawArticle({ url: `${rawArticle().url}?utm_source=newsletter`, content: 'Versión actualizada del informe.' })
      );

      expect(result).toMatchObject({ created: false, contentChanged: true });
      expect(result.item.id).toBe(item.id);
      expect(result.item.state).toBe('ready_for_ai');
      expect(result.item.content).toBe('Versión actualizada del informe.');
    });

    it('should reject an article dated in the future', async () => {
      const attempt = gateway.ingest(rawArticle({ articleDate: '2025-03-02T00:00:00.000Z' }));

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      expect(repo.items.size).toBe(0);
    });

    it('should list every schema issue', async () => {
      const attempt = gateway.ingest(rawArticle({ title: '   ', url: 'no-es-una-url' }));

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toMatchObject({
        issues: expect.arrayContaining(['title: title is required', 'url: Invalid url']),
      });
    });

    it('should reject empty content', async () => {
      await expect(gateway.ingest(rawArticle({ content: ' \n ' }))).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('ingestBatch', () => {
    it('should count every outcome and keep going past failures', async () => {
      const batch = [
        rawArticle(),
        rawArticle({ url: 'https://www.infobae.com/otra', title: '' }),
        rawArticle(),
        rawArticle({ content: 'Texto corregido.' }),
      ];

      const result = await gateway.ingestBatch(batch);

      expect(result).toMatchObject({ created: 1, updated: 1, unchanged: 1, failed: 1 });
      expect(result.items).toHaveLength(3);
      expect(repo.items.size).toBe(1);
    });
  });
});
