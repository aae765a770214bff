/**
 * AI Module
 *
 * OpenAI-powered editorial rewrite of staged articles
 */

export {
  AiProcessor,
  aiResponseSchema,
  buildUserPrompt,
  parseAiResponse,
  isAiProcessingAvailable,
  isRetryableAiError,
  type AiBatchResult,
  type AiProcessorOptions,
  type AiResponse,
  type CompleteFn,
  type CompletionResponse,
  type ProcessOutcome,
  type ReclaimResult,
  type RetryFailedResult,
} from './processor.js';
export { estimateCostUsd, priceFor, MODEL_PRICES, type ModelPrice } from './pricing.js';
