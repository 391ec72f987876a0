import { describe, expect, it } from 'vitest';

import { indelSimilarity, lcsLength, titleScore } from '../library/similarity.js';

describe('similarity', () => {
  it('should measure the longest common subsequence', () => {
    expect(lcsLength('abc', 'abc')).toBe(3);
    expect(lcsLength('abcde', 'ace')).toBe(3);
    expect(lcsLength('', 'abc')).toBe(0);
    expect(lcsLength('abc', 'xyz')).toBe(0);
  });

  it('should score one missing letter close to 1', () => {
    expect(indelSimilarity('incepton', 'inception')).toBeCloseTo(16 / 17, 10);
  });

  it('should score identical strings 1 and disjoint strings 0', () => {
    expect(indelSimilarity('', '')).toBe(1);
    expect(indelSimilarity('heat', 'heat')).toBe(1);
    expect(indelSimilarity('abc', 'xyz')).toBe(0);
  });

  it('should match a query against any single word of the title', () => {
    expect(titleScore('matrix', 'The Matrix')).toBe(1);
    expect(titleScore('MATRIX', 'the matrix')).toBe(1);
    expect(titleScore('godfater', 'The Godfather')).toBeCloseTo(16 / 17, 10);
  });
});
