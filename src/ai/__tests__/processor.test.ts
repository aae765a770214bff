/**
 * AI Processor Tests
 *
 * The OpenAI call is replaced by a stub completion function; the staging
 * store runs over the in-memory repository.
 */

import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import OpenAI from 'openai';
import { AiProcessor, parseAiResponse, type CompleteFn, type CompletionResponse } from '../processor.js';
import { estimateCostUsd, priceFor } from '../pricing.js';
import { StagingStore } from '../../staging/store.js';
import { RateLimiter } from '../../utils/rate-limiter.js';
import type { StagingInput, StagingItem } from '../../types/index.js';
import { FakeClock, MemoryStagingRepository } from '../../__tests__/helpers/memory-repository.js';
import { stagingInput } from '../../__tests__/helpers/fixtures.js';

const VALID_ANSWER = {
  title: 'La Legislatura aprobó el presupuesto 2026',
  summary: 'La ley obtuvo 38 votos afirmativos y fija el gasto provincial del año próximo.',
  category: 'Política',
  tags: ['presupuesto', 'legislatura', 'tucuman'],
  sin_vueltas: 'Se aprobó el presupuesto provincial.',
  lo_central: 'La Legislatura aprobó el presupuesto con 38 votos tras seis horas de sesión.',
  en_profundidad: 'El debate se extendió durante seis horas y el oficialismo reunió los votos necesarios.',
  is_valid: true,
  validation_reason: null,
};

function completion(content: string, model = 'gpt-4o-mini'): CompletionResponse {
  return {
    model,
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 1000, completion_tokens: 500, total_tokens: 1500 },
  };
}

describe('AiProcessor', () => {
  let clock: FakeClock;
  let repo: MemoryStagingRepository;
  let store: StagingStore;
  let complete: Mock<CompleteFn>;
  let processor: AiProcessor;

  beforeEach(() => {
    clock = new FakeClock();
    repo = new MemoryStagingRepository(clock.now);
    store = new StagingStore(repo, { now: clock.now });
    complete = vi.fn<CompleteFn>();
    processor = new AiProcessor(store, {
      complete,
      model: 'gpt-4o-mini',
      promptVersion: '2.0.0',
      rateLimiter: new RateLimiter(600_000),
      retry: { maxAttempts: 3, initialDelayMs: 1, maxDelayMs: 1 },
      now: clock.now,
    });
  });

  async function readyForAi(input: Partial<StagingInput> = {}): Promise<StagingItem> {
    const item = await store.create(stagingInput(input));
    return store.update(item.id, { state: 'ready_for_ai' });
  }

  describe('processBatch', () => {
    it('should write AI fields and complete the item', async () => {
      const item = await readyForAi();
      complete.mockResolvedValueOnce(completion(JSON.stringify(VALID_ANSWER)));

      const result = await processor.processBatch(10);

      expect(result).toEqual({
        processed: 1,
        completed: 1,
        discarded: 0,
        failed: 0,
        skipped: 0,
        totalTokens: 1500,
        totalCostUsd: 0.00045,
      });

      const done = await store.get(item.id);
      expect(done).toMatchObject({
        state: 'ai_completed',
        aiTitle: VALID_ANSWER.title,
        aiSummary: VALID_ANSWER.summary,
        aiCategory: 'Política',
        aiTags: VALID_ANSWER.tags,
        aiModel: 'gpt-4o-mini',
        aiPromptVersion: '2.0.0',
        aiTokensUsed: 1500,
        aiCostUsd: 0.00045,
        updatedBy: 'system:ai-processor',
      });
      expect(done.aiMetadata).toEqual({
        sin_vueltas: VALID_ANSWER.sin_vueltas,
        lo_central: VALID_ANSWER.lo_central,
        en_profundidad: VALID_ANSWER.en_profundidad,
        is_valid: true,
        validation_reason: null,
        input_tokens: 1000,
        output_tokens: 500,
      });
      expect(done.aiProcessedAt).toEqual(clock.now());
    });

    it('should ask for a JSON answer built from the item', async () => {
      await readyForAi();
      complete.mockResolvedValueOnce(completion(JSON.stringify(VALID_ANSWER)));

      await processor.processBatch(10);

      const body = complete.mock.calls[0]?.[0];
      expect(body?.model).toBe('gpt-4o-mini');
      expect(body?.response_format).toEqual({ type: 'json_object' });
      expect(body?.messages[1]).toMatchObject({ role: 'user' });
      expect(JSON.stringify(body?.messages[1])).toContain('MEDIO: lagaceta / politica');
    });

    it('should discard items the model rejects', async () => {
      const item = await readyForAi();
      complete.mockResolvedValueOnce(
        completion(JSON.stringify({ ...VALID_ANSWER, is_valid: false, validation_reason: 'Publicidad' }))
      );

      const result = await processor.processBatch(10);

      expect(result.discarded).toBe(1);
      expect(await store.get(item.id)).toMatchObject({
        state: 'discarded',
        stateMessage: 'AI validation: Publicidad',
      });
    });

    it('should park the item in error when the answer is unusable', async () => {
      const item = await readyForAi();
      complete.mockResolvedValueOnce(completion('esto no es json'));

      const result = await processor.processBatch(10);

      expect(result.failed).toBe(1);
      const failed = await store.get(item.id);
      expect(failed).toMatchObject({
        state: 'error',
        retryCount: 1,
        lastError: 'OpenAI response is not valid JSON',
      });
      expect(failed.errorTrace).toContain('OpenAI response is not valid JSON');
    });

    it('should retry dropped connections', async () => {
      const item = await readyForAi();
      complete
        .mockRejectedValueOnce(new OpenAI.APIConnectionError({ message: 'socket hang up' }))
        .mockResolvedValueOnce(completion(JSON.stringify(VALID_ANSWER)));

      await processor.processBatch(10);

      expect(complete).toHaveBeenCalledTimes(2);
      expect((await store.get(item.id)).state).toBe('ai_completed');
    });

    it('should not retry errors that will not go away', async () => {
      await readyForAi();
      complete.mockRejectedValue(new Error('context length exceeded'));

      const result = await processor.processBatch(10);

      expect(complete).toHaveBeenCalledTimes(1);
      expect(result.failed).toBe(1);
    });

    it('should skip an item someone else claimed first', async () => {
      const item = await readyForAi();
      repo.beforeConditionalWrite = (id) => {
        const current = repo.items.get(id);
        if (current) repo.items.set(id, { ...current, state: 'discarded' });
      };

      const result = await processor.processBatch(10);

      expect(result).toMatchObject({ processed: 1, skipped: 1 });
      expect(complete).not.toHaveBeenCalled();
      expect(repo.items.get(item.id)?.state).toBe('discarded');
    });

    it('should take the oldest items first', async () => {
      const older = await readyForAi({ sourceUrl: 'https://a.example.test/old' });
      clock.advance(60_000);
      await readyForAi({ sourceUrl: 'https://a.example.test/new' });
      complete.mockResolvedValue(completion(JSON.stringify(VALID_ANSWER)));

      await processor.processBatch(1);

      expect((await store.get(older.id)).state).toBe('ai_completed');
      expect(await store.list({ state: 'ready_for_ai' })).toMatchObject({ total: 1 });
    });
  });

  describe('reclaimStale', () => {
    it('should move claims older than the timeout to error for the retry pass', async () => {
      const stuck = await readyForAi({ sourceUrl: 'https://a.example.test/stuck' });
      await store.update(stuck.id, { state: 'processing_ai' }, { actor: 'automation' });
      clock.advance(31 * 60_000);
      const working = await readyForAi({ sourceUrl: 'https://a.example.test/working' });
      await store.update(working.id, { state: 'processing_ai' }, { actor: 'automation' });

      const result = await processor.reclaimStale(30);

      expect(result).toEqual({ reclaimed: 1, skipped: 0 });
      expect(await store.get(stuck.id)).toMatchObject({
        state: 'error',
        retryCount: 1,
        lastError: 'Processing stalled for more than 30 minutes',
      });
      expect((await store.get(working.id)).state).toBe('processing_ai');
      expect(await processor.retryFailed(10)).toEqual({ requeued: 1, parked: 0, skipped: 0 });
      expect((await store.get(stuck.id)).state).toBe('ready_for_ai');
    });
  });

  describe('retryFailed', () => {
    it('should requeue items under their bound and leave the rest parked', async () => {
      complete.mockResolvedValue(completion('{}'));
      const retryable = await readyForAi({ sourceUrl: 'https://a.example.test/r' });
      const exhausted = await readyForAi({ sourceUrl: 'https://a.example.test/x', maxRetries: 1 });
      await processor.processBatch(10);

      const result = await processor.retryFailed(10);

      expect(result).toEqual({ requeued: 1, parked: 1, skipped: 0 });
      expect(await store.get(retryable.id)).toMatchObject({ state: 'ready_for_ai', retryCount: 1 });
      expect(await store.get(exhausted.id)).toMatchObject({ state: 'error', retryCount: 1 });
    });
  });
});

describe('parseAiResponse', () => {
  it('should name the missing fields', () => {
    const { title: _title, ...withoutTitle } = VALID_ANSWER;

    expect(() => parseAiResponse(JSON.stringify(withoutTitle))).toThrow(
      'OpenAI response failed validation: title: Required'
    );
  });

  it('should reject an empty answer', () => {
    expect(() => parseAiResponse(null)).toThrow('Empty response from OpenAI');
  });
});

describe('pricing', () => {
  it('should price dated snapshots as their family', () => {
    expect(priceFor('gpt-4o-mini-2024-07-18')).toEqual({ input: 0.15, output: 0.6 });
    expect(priceFor('gpt-4o-2024-08-06')).toEqual({ input: 2.5, output: 10 });
  });

  it('should fall back to the default model price', () => {
    expect(priceFor('modelo-desconocido')).toEqual({ input: 0.15, output: 0.6 });
  });

  it('should compute cost per million tokens', () => {
    expect(estimateCostUsd('gpt-4o', 1_000_000, 0)).toBe(2.5);
    expect(estimateCostUsd('gpt-4o-mini', 1000, 500)).toBe(0.00045);
  });
});
