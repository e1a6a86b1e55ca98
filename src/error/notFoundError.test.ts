import { describe, expect, it } from 'vitest';
import { getNotFoundError, isNotFoundError, NotFoundError } from './notFoundError.js';

describe('NotFoundError', () => {
  it('builds a bare message without suggestion', () => {
    const err = new NotFoundError('camera', 'xyz');

    expect(err.message).toBe("error camera 'xyz' not found");
    expect(err.suggestion).toBeNull();
    expect(err.query).toBe('xyz');
    expect(err.family).toBe('camera');
  });

  it('appends the suggestion', () => {
    const err = new NotFoundError('fluorophore', 'mScrlet', 'mscarlet');

    expect(err.message).toBe("error fluorophore 'mScrlet' not found, did you mean 'mscarlet'?");
  });

  it('labels light sources', () => {
    expect(new NotFoundError('light', 'lamp').message).toBe("error light source 'lamp' not found");
  });

  it('is found through causes', () => {
    const inner = new NotFoundError('filter', 'et999');
    const err = new Error('wrapped', { cause: inner });

    expect(isNotFoundError(err)).toBe(true);
    expect(getNotFoundError(err)).toBe(inner);
    expect(getNotFoundError(new Error('other'))).toBeNull();
  });
});
