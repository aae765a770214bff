/**
 * Runtime narrowing helpers for values crossing the database boundary
 */

import { PIPELINE_STATES, SOURCE_MEDIA, type PipelineState, type SourceMedia } from '../types/index.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export function isPipelineState(value: unknown): value is PipelineState {
  return typeof value === 'string' && (PIPELINE_STATES as readonly string[]).includes(value);
}

export function isSourceMedia(value: unknown): value is SourceMedia {
  return typeof value === 'string' && (SOURCE_MEDIA as readonly string[]).includes(value);
}

export function toStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === 'string') : [];
}

/**
 * NUMERIC columns arrive as strings
 */
export function toNumberOrNull(value: unknown): number | null {
  if (value === null || value === undefined) return null;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toDateOrNull(value: unknown): Date | null {
  if (value === null || value === undefined) return null;
  const date = value instanceof Date ? value : new Date(String(value));
  return isNaN(date.getTime()) ? null : date;
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected value: ${String(value)}`);
}
