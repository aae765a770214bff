/**
 * Pipeline Error Tests
 */

import { describe, expect, it } from 'vitest';
import {
  ConcurrentModificationError,
  InvalidTransitionError,
  NotFoundError,
  TransientStoreError,
  ValidationError,
  isErrorKind,
  isTransient,
} from '../index.js';

describe('pipeline errors', () => {
  it('should name errors after their kind', () => {
    expect(new NotFoundError('abc').name).toBe('NotFoundError');
    expect(new ValidationError('bad input').name).toBe('ValidationError');
    expect(new TransientStoreError('down').name).toBe('TransientStoreError');
  });

  it('should flag only retryable kinds as transient', () => {
    expect(isTransient(new ConcurrentModificationError('abc'))).toBe(true);
    expect(isTransient(new TransientStoreError('down'))).toBe(true);
    expect(isTransient(new InvalidTransitionError('published', 'scraped'))).toBe(false);
    expect(isTransient(new Error('plain'))).toBe(false);
  });

  it('should narrow by kind', () => {
    const error: unknown = new NotFoundError('abc');

    expect(isErrorKind(error, 'NotFound')).toBe(true);
    expect(isErrorKind(error, 'DuplicateUrl')).toBe(false);
    expect(isErrorKind(new Error('plain'), 'NotFound')).toBe(false);
  });

  it('should keep the cause of a transient failure', () => {
    const cause = new Error('connect ECONNREFUSED');

    expect(new TransientStoreError('Database unavailable', cause).cause).toBe(cause);
  });
});
