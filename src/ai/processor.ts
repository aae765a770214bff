/**
 * AI Processor
 *
 * Claims ready_for_ai items, asks the model for an editorial rewrite in
 * three reading depths and writes the result back through the staging
 * store. Items the model judges unpublishable are discarded; failures
 * park the item in `error` for the retry pass.
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';
import { z } from 'zod';
import { config } from '../config/index.js';
import { isErrorKind } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import { AI_METADATA_KEYS, type StagingItem } from '../types/index.js';
import type { StagingStore } from '../staging/store.js';
import { estimateCostUsd } from './pricing.js';

/**
 * The subset of a chat completion the processor reads
 */
export interface CompletionResponse {
  model: string;
  choices: { message: { content: string | null } }[];
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number } | null;
}

export type CompleteFn = (body: ChatCompletionCreateParamsNonStreaming) => Promise<CompletionResponse>;

export type ProcessOutcome = 'completed' | 'discarded' | 'failed' | 'skipped';

export interface AiBatchResult {
  processed: number;
  completed: number;
  discarded: number;
  failed: number;
  skipped: number;
  totalTokens: number;
  totalCostUsd: number;
}

export interface ReclaimResult {
  reclaimed: number;
  skipped: number;
}

export interface RetryFailedResult {
  requeued: number;
  parked: number;
  skipped: number;
}

export interface AiProcessorOptions {
  complete?: CompleteFn;
  model?: string;
  promptVersion?: string;
  rateLimiter?: RateLimiter;
  retry?: RetryOptions;
  maxConcurrent?: number;
  now?: () => Date;
}

const PROCESSOR_ID = 'system:ai-processor';
const MAX_SOURCE_CHARS = 6000;

/**
 * Expected model output
 */
export const aiResponseSchema = z.object({
  title: z.string().trim().min(1),
  summary: z.string().trim().min(1),
  category: z.string().trim().min(1),
  tags: z.array(z.string().trim().min(1)).max(10).default([]),
  sin_vueltas: z.string().trim(),
  lo_central: z.string().trim(),
  en_profundidad: z.string().trim(),
  is_valid: z.boolean(),
  validation_reason: z.string().nullish(),
});

export type AiResponse = z.infer<typeof aiResponseSchema>;

const SYSTEM_PROMPT = `Sos un editor periodístico de un medio digital argentino.
Con el texto fuente, reescribí la noticia en tus palabras (no plagies) y devolvé JSON con este formato exacto:
{
  "title": "título informativo, máximo 120 caracteres",
  "summary": "bajada de una o dos oraciones, máximo 320 caracteres",
  "category": "una de: ${config.categories.join(', ')}",
  "tags": ["entre 3 y 8 etiquetas"],
  "sin_vueltas": "la noticia en una o dos oraciones",
  "lo_central": "los hechos principales en un párrafo",
  "en_profundidad": "contexto y detalle en varios párrafos",
  "is_valid": true,
  "validation_reason": null
}

Marcá is_valid en false, con el motivo en validation_reason, cuando el texto no sea una noticia publicable
(publicidad, listado de enlaces, contenido truncado o sin hechos verificables).`;

export function buildUserPrompt(item: StagingItem): string {
  return `TÍTULO ORIGINAL: ${item.title ?? ''}
MEDIO: ${item.sourceMedia}${item.sourceSection ? ` / ${item.sourceSection}` : ''}
FECHA: ${item.articleDate ? item.articleDate.toISOString() : 'desconocida'}

FUENTE:
${item.content.slice(0, MAX_SOURCE_CHARS)}`;
}

/**
 * Parse and validate the model's JSON answer
 */
export function parseAiResponse(content: string | null | undefined): AiResponse {
  if (!content) {
    throw new Error('Empty response from OpenAI');
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new Error('OpenAI response is not valid JSON', { cause: error });
  }

  const parsed = aiResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`OpenAI response failed validation: ${issues.join('; ')}`);
  }
  return parsed.data;
}

/**
 * Retry rate limits, server errors and dropped connections only
 */
export function isRetryableAiError(error: unknown): boolean {
  if (error instanceof OpenAI.APIError) {
    return error.status === undefined || error.status === 429 || error.status >= 500;
  }
  return false;
}

/**
 * Another worker or an operator moved the item first
 */
function isLostClaim(error: unknown): boolean {
  return (
    isErrorKind(error, 'InvalidTransition') ||
    isErrorKind(error, 'NotFound') ||
    isErrorKind(error, 'ConcurrentModification')
  );
}

export function isAiProcessingAvailable(): boolean {
  return !!config.openai.apiKey;
}

function createOpenAiComplete(): CompleteFn {
  let client: OpenAI | null = null;

  return (body) => {
    if (!config.openai.apiKey) {
      throw new Error('OPENAI_API_KEY is not configured');
    }
    // withRetry owns retries
    client ??= new OpenAI({ apiKey: config.openai.apiKey, maxRetries: 0 });
    return client.chat.completions.create(body);
  };
}

export class AiProcessor {
  private readonly complete: CompleteFn;
  private readonly model: string;
  private readonly promptVersion: string;
  private readonly rateLimiter: RateLimiter;
  private readonly retry: RetryOptions;
  private readonly maxConcurrent: number;
  private readonly now: () => Date;

  constructor(
    private readonly store: StagingStore,
    options: AiProcessorOptions = {}
  ) {
    this.complete = options.complete ?? createOpenAiComplete();
    this.model = options.model ?? config.openai.model;
    this.promptVersion = options.promptVersion ?? config.openai.promptVersion;
    this.rateLimiter = options.rateLimiter ?? new RateLimiter(config.rateLimit.openai.requestsPerMinute);
    this.retry = { ...config.retry, ...options.retry };
    this.maxConcurrent = options.maxConcurrent ?? 2;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Process up to `limit` ready_for_ai items, oldest first
   */
  async processBatch(limit: number = config.openai.batchSize): Promise<AiBatchResult> {
    const { items } = await this.store.list({ state: 'ready_for_ai' }, { limit, order: 'oldest' });
    const result: AiBatchResult = {
      processed: 0,
      completed: 0,
      discarded: 0,
      failed: 0,
      skipped: 0,
      totalTokens: 0,
      totalCostUsd: 0,
    };

    if (items.length === 0) {
      logger.info('No items ready for AI processing');
      return result;
    }

    logger.info({ count: items.length, model: this.model }, 'Starting AI batch');

    for (let i = 0; i < items.length; i += this.maxConcurrent) {
      const chunk = items.slice(i, i + this.maxConcurrent);
      const outcomes = await Promise.all(chunk.map((item) => this.processItem(item)));

      for (const { outcome, tokens, costUsd } of outcomes) {
        result.processed++;
        result[outcome]++;
        result.totalTokens += tokens;
        result.totalCostUsd += costUsd;
      }
    }

    result.totalCostUsd = Math.round(result.totalCostUsd * 1e6) / 1e6;
    logger.info(result, 'AI batch complete');
    return result;
  }

  /**
   * Claim one item and run it through the model
   */
  async processItem(item: StagingItem): Promise<{ outcome: ProcessOutcome; tokens: number; costUsd: number }> {
    const skipped = { outcome: 'skipped' as const, tokens: 0, costUsd: 0 };

    try {
      await this.store.update(item.id, { state: 'processing_ai' }, { actor: 'automation', updatedBy: PROCESSOR_ID });
    } catch (error) {
      if (!isLostClaim(error)) {
        throw error;
      }
      logger.debug({ itemId: item.id, error }, 'Item claimed elsewhere, skipping');
      return skipped;
    }

    const startedAt = this.now().getTime();

    try {
      const response = await this.rateLimiter.execute(() =>
        withRetry(
          () =>
            this.complete({
              model: this.model,
              messages: [
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: buildUserPrompt(item) },
              ],
              temperature: 0.3,
              max_tokens: 2000,
              response_format: { type: 'json_object' },
            }),
          { ...this.retry, operation: 'ai.complete', shouldRetry: isRetryableAiError }
        )
      );

      const answer = parseAiResponse(response.choices[0]?.message.content);
      const inputTokens = response.usage?.prompt_tokens ?? 0;
      const outputTokens = response.usage?.completion_tokens ?? 0;
      const tokens = response.usage?.total_tokens ?? inputTokens + outputTokens;
      const costUsd = estimateCostUsd(response.model || this.model, inputTokens, outputTokens);
      const processedAt = this.now();
      const outcome: ProcessOutcome = answer.is_valid ? 'completed' : 'discarded';

      await this.store.update(
        item.id,
        {
          state: answer.is_valid ? 'ai_completed' : 'discarded',
          stateMessage: answer.is_valid ? null : `AI validation: ${answer.validation_reason ?? 'not publishable'}`,
          aiTitle: answer.title,
          aiSummary: answer.summary,
          aiCategory: answer.category,
          aiTags: answer.tags,
          aiModel: this.model,
          aiPromptVersion: this.promptVersion,
          aiTokensUsed: tokens,
          aiCostUsd: costUsd,
          aiProcessingDurationMs: processedAt.getTime() - startedAt,
          aiProcessedAt: processedAt,
          aiMetadata: {
            [AI_METADATA_KEYS.readingLevelBrief]: answer.sin_vueltas,
            [AI_METADATA_KEYS.readingLevelCore]: answer.lo_central,
            [AI_METADATA_KEYS.readingLevelDeep]: answer.en_profundidad,
            [AI_METADATA_KEYS.isValid]: answer.is_valid,
            [AI_METADATA_KEYS.validationReason]: answer.validation_reason ?? null,
            [AI_METADATA_KEYS.inputTokens]: inputTokens,
            [AI_METADATA_KEYS.outputTokens]: outputTokens,
          },
        },
        { actor: 'automation', updatedBy: PROCESSOR_ID }
      );

      logger.info({ itemId: item.id, outcome, tokens, costUsd }, 'Item processed by AI');
      return { outcome, tokens, costUsd };
    } catch (error) {
      await this.recordFailure(item, error);
      return { outcome: 'failed', tokens: 0, costUsd: 0 };
    }
  }

  /**
   * Move items stuck in processing_ai for longer than `minutes` to error,
   * where the retry pass picks them up. A worker that died after claiming
   * an item leaves it there.
   */
  async reclaimStale(minutes: number = config.openai.claimTimeoutMinutes): Promise<ReclaimResult> {
    const cutoff = new Date(this.now().getTime() - minutes * 60_000);
    const result: ReclaimResult = { reclaimed: 0, skipped: 0 };
    const { items } = await this.store.list(
      { state: 'processing_ai', dateField: 'stateUpdatedAt', dateTo: cutoff },
      { limit: config.pipeline.listMaxLimit, order: 'oldest', orderBy: 'stateUpdatedAt' }
    );

    for (const item of items) {
      try {
        await this.store.update(
          item.id,
          { state: 'error', lastError: `Processing stalled for more than ${minutes} minutes` },
          { actor: 'automation', updatedBy: PROCESSOR_ID }
        );
        result.reclaimed++;
      } catch (error) {
        if (!isLostClaim(error)) {
          throw error;
        }
        result.skipped++;
      }
    }

    if (result.reclaimed > 0) {
      logger.warn({ ...result, minutes }, 'Reclaimed stalled AI claims');
    }
    return result;
  }

  /**
   * Requeue errored items still under their retry bound
   */
  async retryFailed(limit: number = config.openai.batchSize): Promise<RetryFailedResult> {
    const { items } = await this.store.list({ state: 'error' }, { limit, order: 'oldest' });
    const result: RetryFailedResult = { requeued: 0, parked: 0, skipped: 0 };

    for (const item of items) {
      if (item.retryCount >= item.maxRetries) {
        result.parked++;
        continue;
      }

      try {
        await this.store.update(item.id, { state: 'ready_for_ai' }, { actor: 'automation', updatedBy: PROCESSOR_ID });
        result.requeued++;
      } catch (error) {
        if (isErrorKind(error, 'RetryLimitExceeded')) {
          result.parked++;
        } else if (isLostClaim(error)) {
          result.skipped++;
        } else {
          throw error;
        }
      }
    }

    if (items.length > 0) {
      logger.info(result, 'Retry pass complete');
    }
    return result;
  }

  private async recordFailure(item: StagingItem, error: unknown): Promise<void> {
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ itemId: item.id, error }, 'AI processing failed');

    try {
      await this.store.update(
        item.id,
        {
          state: 'error',
          lastError: message,
          errorTrace: error instanceof Error ? (error.stack ?? null) : null,
        },
        { actor: 'automation', updatedBy: PROCESSOR_ID }
      );
    } catch (updateError) {
      // Left in processing_ai until reclaimStale times the claim out
      logger.error({ itemId: item.id, error: updateError }, 'Could not record AI failure');
    }
  }
}
