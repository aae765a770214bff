/**
 * Pipeline error taxonomy
 *
 * Every failure the core surfaces carries a `kind` so callers (admin
 * surface, workers) can tell programmer errors from transient
 * infrastructure failures.
 */

import type { PipelineState } from '../types/index.js';

export type PipelineErrorKind =
  | 'NotFound'
  | 'DuplicateUrl'
  | 'InvalidTransition'
  | 'InvalidState'
  | 'TerminalStateImmutable'
  | 'CannotDeletePublished'
  | 'AlreadyPublished'
  | 'SlugConflict'
  | 'RetryLimitExceeded'
  | 'ConcurrentModification'
  | 'ValidationError'
  | 'TransientStoreError';

/**
 * Base class for all pipeline errors
 */
export class PipelineError extends Error {
  constructor(
    public readonly kind: PipelineErrorKind,
    message: string,
    public readonly transient: boolean = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind.endsWith('Error') ? kind : `${kind}Error`;
  }
}

export class NotFoundError extends PipelineError {
  constructor(public readonly itemId: string) {
    super('NotFound', `Scraping item not found: ${itemId}`);
  }
}

export class DuplicateUrlError extends PipelineError {
  constructor(public readonly urlHash: string) {
    super('DuplicateUrl', `A scraping item already exists for url_hash ${urlHash}; use upsert`);
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(
    public readonly from: PipelineState,
    public readonly to: PipelineState,
    reason?: string
  ) {
    super('InvalidTransition', `Cannot transition from '${from}' to '${to}'${reason ? `: ${reason}` : ''}`);
  }
}

export class InvalidStateError extends PipelineError {
  constructor(
    public readonly state: PipelineState,
    message: string
  ) {
    super('InvalidState', message);
  }
}

export class TerminalStateImmutableError extends PipelineError {
  constructor(
    public readonly state: PipelineState,
    public readonly fields: string[]
  ) {
    super(
      'TerminalStateImmutable',
      `Item is in terminal state '${state}'; cannot modify ${fields.join(', ')}`
    );
  }
}

export class CannotDeletePublishedError extends PipelineError {
  constructor(public readonly itemId: string) {
    super('CannotDeletePublished', `Cannot delete published item ${itemId}; mark it as discarded instead`);
  }
}

export class AlreadyPublishedError extends PipelineError {
  constructor(
    public readonly itemId: string,
    public readonly publicationId: string | null
  ) {
    super(
      'AlreadyPublished',
      publicationId
        ? `Item ${itemId} already published. Publication ID: ${publicationId}`
        : `Item ${itemId} already published`
    );
  }
}

export class SlugConflictError extends PipelineError {
  constructor(
    public readonly itemId: string,
    public readonly attempts: number
  ) {
    super('SlugConflict', `No free slug for item ${itemId} after ${attempts} candidates`, true);
  }
}

export class RetryLimitExceededError extends PipelineError {
  constructor(
    public readonly itemId: string,
    public readonly retryCount: number,
    public readonly maxRetries: number
  ) {
    super(
      'RetryLimitExceeded',
      `Item ${itemId} reached its retry limit (${retryCount}/${maxRetries}); an operator must reset it`
    );
  }
}

export class ConcurrentModificationError extends PipelineError {
  constructor(public readonly itemId: string) {
    super('ConcurrentModification', `Item ${itemId} kept changing while being updated`, true);
  }
}

export class ValidationError extends PipelineError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super('ValidationError', message);
  }
}

export class TransientStoreError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('TransientStoreError', message, true, { cause });
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function isErrorKind<K extends PipelineErrorKind>(
  error: unknown,
  kind: K
): error is PipelineError & { kind: K } {
  return isPipelineError(error) && error.kind === kind;
}

/**
 * Whether retrying the whole operation may succeed
 */
export function isTransient(error: unknown): boolean {
  return isPipelineError(error) && error.transient;
}
