/**
 * Stats Aggregator
 *
 * Point-in-time counters for the admin surface. The repository reads
 * everything in one statement; this layer fills the gaps so every
 * pipeline state is present.
 */

import type { PipelineState, StagingStats } from '../types/index.js';
import type { StagingRepository } from '../staging/repository.js';

export class StatsAggregator {
  constructor(private readonly repo: StagingRepository) {}

  async snapshot(): Promise<StagingStats> {
    const raw = await this.repo.statsSnapshot();

    return {
      totalItems: raw.totalItems,
      byState: zeroFilled(raw.byState),
      bySourceMedia: { ...raw.bySourceMedia },
      avgAiTokens: raw.avgAiTokens === null ? null : Math.round(raw.avgAiTokens * 100) / 100,
      totalAiCostUsd: raw.totalAiCostUsd === null ? null : Math.round(raw.totalAiCostUsd * 1e6) / 1e6,
      itemsInError: raw.itemsInError,
      itemsWithErrors: raw.itemsWithErrors,
      itemsReadyForAi: raw.itemsReadyForAi,
      itemsReadyToPublish: raw.itemsReadyToPublish,
      generatedAt: raw.generatedAt,
    };
  }
}

function zeroFilled(counts: Partial<Record<PipelineState, number>>): Record<PipelineState, number> {
  return {
    scraped: counts.scraped ?? 0,
    ready_for_ai: counts.ready_for_ai ?? 0,
    processing_ai: counts.processing_ai ?? 0,
    ai_completed: counts.ai_completed ?? 0,
    error: counts.error ?? 0,
    ready_to_publish: counts.ready_to_publish ?? 0,
    published: counts.published ?? 0,
    discarded: counts.discarded ?? 0,
    duplicate: counts.duplicate ?? 0,
  };
}
