/**
 * Publish Transaction Tests
 *
 * Exactly-once publishing, content selection, slug collisions and
 * rollback of partial writes.
 */

import { beforeEach, describe, expect, it } from 'vitest';
import { PublishTransaction } from '../publisher.js';
import { StagingStore } from '../../staging/store.js';
import {
  AlreadyPublishedError,
  InvalidStateError,
  NotFoundError,
  SlugConflictError,
  ValidationError,
} from '../../errors/index.js';
import type { StagingInput, StagingItem } from '../../types/index.js';
import { FakeClock, MemoryStagingRepository } from '../../__tests__/helpers/memory-repository.js';
import { stagingInput } from '../../__tests__/helpers/fixtures.js';

const AI_TITLE = 'Aprobaron el presupuesto 2026 en la Legislatura';
const AI_SUMMARY = 'La ley obtuvo 38 votos y fija el gasto provincial del año próximo.';

describe('PublishTransaction', () => {
  let clock: FakeClock;
  let repo: MemoryStagingRepository;
  let store: StagingStore;
  let publisher: PublishTransaction;

  beforeEach(() => {
    clock = new FakeClock();
    repo = new MemoryStagingRepository(clock.now);
    store = new StagingStore(repo, { now: clock.now });
    publisher = new PublishTransaction(repo, clock.now);
  });

  async function readyItem(input: Partial<StagingInput> = {}, withAi = true): Promise<StagingItem> {
    const item = await store.create(stagingInput(input));
    await store.update(item.id, { state: 'ready_for_ai' });
    await store.update(item.id, { state: 'processing_ai' });
    await store.update(
      item.id,
      withAi
        ? {
            state: 'ai_completed',
            aiTitle: AI_TITLE,
            aiSummary: AI_SUMMARY,
            aiCategory: 'Política',
            aiTags: ['presupuesto'],
            aiMetadata: { sin_vueltas: 'Corto', lo_central: 'Central', en_profundidad: 'Largo' },
          }
        : { state: 'ai_completed' }
    );
    return store.update(item.id, { state: 'ready_to_publish' });
  }

  it('should create the publication and link the item', async () => {
    const item = await readyItem();
    clock.advance(60_000);

    const result = await publisher.publish({
      itemId: item.id,
      operatorId: 'editor-1',
      signingIdentity: 'Redacción Tucumán',
    });

    expect(result.slug).toBe('aprobaron-el-presupuesto-2026-en-la-legislatura');
    expect(result.item).toMatchObject({
      state: 'published',
      publicationId: result.publicationId,
      publishedBy: 'editor-1',
      stateMessage: 'Published by editor-1',
    });
    expect(result.item.publishedAt).toEqual(clock.now());

    const publication = repo.publications.get(result.publicationId);
    expect(publication).toMatchObject({
      scrapingItemId: item.id,
      title: AI_TITLE,
      summary: AI_SUMMARY,
      body: item.content,
      category: 'Política',
      tags: ['presupuesto'],
      contentBrief: 'Corto',
      contentCore: 'Central',
      contentDeep: 'Largo',
      signingIdentity: 'Redacción Tucumán',
      publishedBy: 'editor-1',
      media: [{ type: 'image', url: 'https://img.example.test/legislatura.jpg', caption: '', order: 0 }],
    });
  });

  it('should prefer overrides, then AI fields, then raw fields', async () => {
    const plain = await readyItem({ sourceUrl: 'https://a.example.test/plain' }, false);
    const edited = await readyItem({ sourceUrl: 'https://a.example.test/edited' });

    const fromRaw = await publisher.publish({ itemId: plain.id, operatorId: 'editor-1' });
    const fromOverride = await publisher.publish({
      itemId: edited.id,
      operatorId: 'editor-1',
      overrides: { title: 'Título editado', summary: 'Bajada editada', body: 'Cuerpo editado' },
    });

    expect(fromRaw.slug).toBe('la-legislatura-aprobo-el-presupuesto-provincial');
    expect(repo.publications.get(fromRaw.publicationId)).toMatchObject({
      title: 'La Legislatura aprobó el presupuesto provincial',
      summary: 'El proyecto obtuvo 38 votos afirmativos tras una sesión de seis horas.',
      tags: ['legislatura', 'presupuesto'],
      category: null,
      contentBrief: null,
      signingIdentity: null,
    });
    expect(fromOverride.slug).toBe('titulo-editado');
    expect(repo.publications.get(fromOverride.publicationId)).toMatchObject({
      title: 'Título editado',
      summary: 'Bajada editada',
      body: 'Cuerpo editado',
    });
  });

  it('should publish exactly once when two operators race', async () => {
    const item = await readyItem();

    const outcomes = await Promise.allSettled([
      publisher.publish({ itemId: item.id, operatorId: 'editor-1' }),
      publisher.publish({ itemId: item.id, operatorId: 'editor-2' }),
    ]);

    const fulfilled = outcomes.filter((outcome) => outcome.status === 'fulfilled');
    const rejected = outcomes.flatMap((outcome) => (outcome.status === 'rejected' ? [outcome.reason] : []));
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toBeInstanceOf(AlreadyPublishedError);
    expect(repo.publications.size).toBe(1);
  });

  it('should reject a second publish with the existing publication id', async () => {
    const item = await readyItem();
    const first = await publisher.publish({ itemId: item.id, operatorId: 'editor-1' });

    const again = publisher.publish({ itemId: item.id, operatorId: 'editor-1' });

    await expect(again).rejects.toBeInstanceOf(AlreadyPublishedError);
    await expect(again).rejects.toMatchObject({ publicationId: first.publicationId });
  });

  it('should only publish ready_to_publish items', async () => {
    const item = await store.create(stagingInput());

    await expect(publisher.publish({ itemId: item.id, operatorId: 'editor-1' })).rejects.toBeInstanceOf(
      InvalidStateError
    );
    expect(repo.publications.size).toBe(0);
  });

  it('should require a title', async () => {
    const item = await readyItem({ title: null }, false);

    await expect(publisher.publish({ itemId: item.id, operatorId: 'editor-1' })).rejects.toThrow(
      `Item ${item.id} has no title to publish`
    );
  });

  it('should throw NotFound for an unknown item', async () => {
    await expect(publisher.publish({ itemId: 'missing', operatorId: 'editor-1' })).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it('should require an operator', async () => {
    const item = await readyItem();

    await expect(publisher.publish({ itemId: item.id, operatorId: '  ' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('should suffix colliding slugs', async () => {
    const first = await readyItem({ sourceUrl: 'https://a.example.test/1' });
    const second = await readyItem({ sourceUrl: 'https://a.example.test/2' });
    const third = await readyItem({ sourceUrl: 'https://a.example.test/3' });
    const base = 'aprobaron-el-presupuesto-2026-en-la-legislatura';

    const slugs: string[] = [];
    for (const item of [first, second, third]) {
      slugs.push((await publisher.publish({ itemId: item.id, operatorId: 'editor-1' })).slug);
    }

    expect(slugs).toEqual([base, `${base}-${second.id.slice(0, 8)}`, `${base}-${third.id.slice(0, 8)}-2`]);
  });

  describe('slug races', () => {
    const base = 'aprobaron-el-presupuesto-2026-en-la-legislatura';

    function takenElsewhere(slug: string): void {
      repo.addPublication({
        scrapingItemId: 'e0000000-0000-4000-8000-000000000001',
        slug,
        title: AI_TITLE,
        summary: '',
        body: 'Publicada por otra redacción',
        category: null,
        tags: [],
        contentBrief: null,
        contentCore: null,
        contentDeep: null,
        media: [],
        signingIdentity: null,
        publishedBy: 'editor-2',
        publishedAt: clock.now(),
      });
    }

    it('should move to the next candidate when another writer takes the slug first', async () => {
      const item = await readyItem();
      repo.beforeCreatePublication = (slug) => {
        repo.beforeCreatePublication = null;
        takenElsewhere(slug);
      };

      const result = await publisher.publish({ itemId: item.id, operatorId: 'editor-1' });

      expect(result.slug).toBe(`${base}-${item.id.slice(0, 8)}`);
      expect(result.item.state).toBe('published');
      expect([...repo.publications.values()].map((publication) => publication.slug)).toEqual([base, result.slug]);
    });

    it('should give up with SlugConflict when every candidate is taken', async () => {
      const item = await readyItem();
      repo.beforeCreatePublication = takenElsewhere;

      const error = await publisher.publish({ itemId: item.id, operatorId: 'editor-1' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(SlugConflictError);
      expect(error).toMatchObject({ kind: 'SlugConflict', attempts: 20, transient: true });
      expect(await store.get(item.id)).toMatchObject({ state: 'ready_to_publish', publicationId: null });
    });
  });

  describe('rollback', () => {
    it('should leave no publication when linking fails', async () => {
      const item = await readyItem();
      repo.failNext = 'markPublished';

      await expect(publisher.publish({ itemId: item.id, operatorId: 'editor-1' })).rejects.toThrow('link write failed');

      expect(repo.publications.size).toBe(0);
      expect(await store.get(item.id)).toMatchObject({ state: 'ready_to_publish', publicationId: null });
    });

    it('should leave the item untouched when the publication insert fails', async () => {
      const item = await readyItem();
      repo.failNext = 'createPublication';

      await expect(publisher.publish({ itemId: item.id, operatorId: 'editor-1' })).rejects.toThrow(
        'publication store unavailable'
      );

      expect(await store.get(item.id)).toMatchObject({ state: 'ready_to_publish', publicationId: null });
      const retried = await publisher.publish({ itemId: item.id, operatorId: 'editor-1' });
      expect(retried.item.state).toBe('published');
    });
  });
});
