import { describe, expect, it } from 'vitest';
import { slugify } from '../slugify.js';

describe('slugify', () => {
  it('should strip diacritics and punctuation', () => {
    expect(slugify('¿Cómo está el clima?')).toBe('como-esta-el-clima');
    expect(slugify('Ñandú: 100% récord')).toBe('nandu-100-record');
  });

  it('should collapse and trim hyphens', () => {
    expect(slugify('--Hola  --  mundo--')).toBe('hola-mundo');
  });

  it('should truncate on a hyphen boundary', () => {
    expect(slugify('uno dos tres cuatro', 10)).toBe('uno-dos');
  });

  it('should return an empty slug when nothing survives', () => {
    expect(slugify('¿?')).toBe('');
  });
});
