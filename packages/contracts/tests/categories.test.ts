import { describe, it, expect } from 'vitest';
import {
  INDICATOR_CATEGORIES,
  categoryOf,
  indicatorsIn,
  isIndicatorCategory,
} from '../src/categories.js';

describe('category table', () => {
  it('should map zigzag and dpo to trend', () => {
    expect(categoryOf('zigzag')).toBe('trend');
    expect(categoryOf('dpo')).toBe('trend');
  });

  it('should map the supplementary indicators to their categories', () => {
    expect(categoryOf('ha')).toBe('candles');
    expect(categoryOf('ssf')).toBe('overlap');
    expect(categoryOf('log_return')).toBe('performance');
    expect(categoryOf('kurtosis')).toBe('statistics');
    expect(categoryOf('ifisher')).toBe('transform');
  });

  it('should be case-insensitive on lookup', () => {
    expect(categoryOf('ZIGZAG')).toBe('trend');
  });

  it('should return undefined for unknown indicators', () => {
    expect(categoryOf('not_an_indicator')).toBeUndefined();
  });

  it('should list indicators in table order', () => {
    expect(indicatorsIn('transform')).toEqual(['cube', 'ifisher', 'remap']);
    expect(indicatorsIn('performance')).toEqual(['log_return', 'percent_return']);
  });

  it('should expose frozen lists', () => {
    const names = indicatorsIn('trend');
    expect(Object.isFrozen(names)).toBe(true);
  });

  it('should have an entry for every category', () => {
    for (const category of INDICATOR_CATEGORIES) {
      expect(indicatorsIn(category).length).toBeGreaterThan(0);
    }
  });

  it('should recognise category names', () => {
    expect(isIndicatorCategory('trend')).toBe(true);
    expect(isIndicatorCategory('astrology')).toBe(false);
  });
});
