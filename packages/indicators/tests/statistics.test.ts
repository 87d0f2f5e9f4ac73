/**
 * Rolling moment tests
 */

import { describe, it, expect } from 'vitest';
import { skew, kurtosis, sampleSkew, sampleKurtosis } from '../src/index.js';

const CLOSE = [1, 2, 3, 4, 10];

describe('sampleSkew', () => {
  it('should be zero for a symmetric window', () => {
    expect(sampleSkew([1, 2, 3])).toBe(0);
  });

  it('should apply the sample size correction', () => {
    expect(sampleSkew(CLOSE)).toBeCloseTo(1.2 * Math.SQRT2, 9);
  });

  it('should be NaN for zero variance or fewer than three values', () => {
    expect(sampleSkew([4, 4, 4])).toBeNaN();
    expect(sampleSkew([1, 2])).toBeNaN();
  });
});

describe('sampleKurtosis', () => {
  it('should compute bias-corrected excess kurtosis', () => {
    expect(sampleKurtosis(CLOSE)).toBeCloseTo(3.152, 9);
  });

  it('should be NaN for fewer than four values', () => {
    expect(sampleKurtosis([1, 2, 3])).toBeNaN();
  });
});

describe('skew', () => {
  it('should fill from the first full window', () => {
    const result = skew(CLOSE, { length: 5 });

    expect(result?.name).toBe('SKEW_5');
    expect(result?.category).toBe('statistics');
    expect(result?.values.slice(0, 4)).toEqual([NaN, NaN, NaN, NaN]);
    expect(result?.values[4]).toBeCloseTo(1.2 * Math.SQRT2, 9);
  });

  it('should start earlier with a smaller minPeriods', () => {
    const result = skew(CLOSE, { length: 5, minPeriods: 3 });

    expect(result?.values[2]).toBe(0);
    expect(result?.values[3]).toBe(0);
  });

  it('should return undefined when shorter than the window', () => {
    expect(skew([1, 2, 3, 4], { length: 5 })).toBeUndefined();
  });
});

describe('kurtosis', () => {
  it('should name and fill the rolling kurtosis', () => {
    const result = kurtosis(CLOSE, { length: 5 });

    expect(result?.name).toBe('KURT_5');
    expect(result?.values[4]).toBeCloseTo(3.152, 9);
  });
});
