import { describe, expect, it } from 'vitest';
import { closestMatch, similarity } from './similarity.js';

describe('similarity', () => {
  it('is 1 for identical strings', () => {
    expect(similarity('egfp', 'egfp')).toBe(1);
    expect(similarity('', '')).toBe(1);
  });

  it('is 0 for disjoint strings', () => {
    expect(similarity('abc', 'xyz')).toBe(0);
    expect(similarity('abc', '')).toBe(0);
  });

  it('counts the longest block and what remains on either side', () => {
    // "bcd" matches, nothing left on either side
    expect(similarity('abcd', 'bcde')).toBe(0.75);
    // "rlet" then "msc" on the left: 7 of 15
    expect(similarity('mscarlet', 'mscrlet')).toBeCloseTo(14 / 15, 10);
  });

  it('does not count crossing matches', () => {
    // "ab" matches; "c" sits before it in b and after it in a
    expect(similarity('abc', 'cab')).toBeCloseTo(4 / 6, 10);
  });
});

describe('closestMatch', () => {
  const keys = ['egfp', 'mscarlet', 'mcherry', 'mturquoise2', 'alexa fluor 488'];

  it('suggests the nearest key', () => {
    expect(closestMatch('mscrlet', keys)).toBe('mscarlet');
    expect(closestMatch('egpf', keys)).toBe('egfp');
  });

  it('returns null below the cutoff', () => {
    expect(closestMatch('zzzz', keys)).toBeNull();
    expect(closestMatch('egfp', ['mcherry'], 0.5)).toBeNull();
  });

  it('breaks ties toward the greater candidate', () => {
    expect(closestMatch('ab', ['ax', 'ay'])).toBe('ay');
    expect(closestMatch('ab', ['ay', 'ax'])).toBe('ay');
  });

  it('rejects a cutoff outside [0, 1]', () => {
    expect(() => closestMatch('a', ['a'], 1.5)).toThrow(RangeError);
  });
});
