/**
 * Extremum scanner tests
 */

import { describe, it, expect } from 'vitest';
import { scanExtrema, scanWindow } from '../src/scanner.js';

describe('scanWindow', () => {
  it('should split legs into left and exclusive right reach', () => {
    expect(scanWindow(10)).toEqual({ left: 5, right: 6 });
    expect(scanWindow(5)).toEqual({ left: 2, right: 3 });
    expect(scanWindow(1)).toEqual({ left: 0, right: 1 });
  });
});

describe('scanExtrema', () => {
  it('should emit a LOW then a HIGH at every bar for a single-bar window', () => {
    const high = [1, 3, 2, 5, 1, 6, 2];
    const low = [0, 2, 1, 3, 0, 4, 1];

    expect(scanExtrema(high, low, 1)).toEqual([
      { position: 0, direction: -1, value: 0 },
      { position: 0, direction: 1, value: 1 },
      { position: 1, direction: -1, value: 2 },
      { position: 1, direction: 1, value: 3 },
      { position: 2, direction: -1, value: 1 },
      { position: 2, direction: 1, value: 2 },
      { position: 3, direction: -1, value: 3 },
      { position: 3, direction: 1, value: 5 },
      { position: 4, direction: -1, value: 0 },
      { position: 4, direction: 1, value: 1 },
      { position: 5, direction: -1, value: 4 },
      { position: 5, direction: 1, value: 6 },
    ]);
  });

  it('should find a centered peak', () => {
    expect(scanExtrema([1, 3, 2, 2], [0, 2, 1, 1], 2)).toEqual([
      { position: 1, direction: 1, value: 3 },
    ]);
  });

  it('should find a centered trough', () => {
    expect(scanExtrema([5, 4, 5, 6, 6], [3, 1, 2, 3, 3], 2)).toEqual([
      { position: 1, direction: -1, value: 1 },
    ]);
  });

  it('should emit an extremum at every bar of a plateau', () => {
    const high = [1, 2, 2, 1, 0];
    const low = [0, 1, 1, 0, 0];

    expect(scanExtrema(high, low, 2)).toEqual([
      { position: 1, direction: 1, value: 2 },
      { position: 2, direction: 1, value: 2 },
    ]);
  });

  it('should not qualify a window containing a missing value', () => {
    const high = [1, 3, NaN, 1, 0];
    const low = [5, 5, 5, 5, 5];

    expect(scanExtrema(high, low, 2)).toEqual([
      { position: 1, direction: -1, value: 5 },
      { position: 2, direction: -1, value: 5 },
    ]);
  });

  it('should return undefined when shorter than one full window', () => {
    const flat = new Array<number>(11).fill(1);

    expect(scanExtrema(flat, flat, 10)).toBeUndefined();
  });

  it('should scan a single center when exactly one window long', () => {
    const flat = new Array<number>(12).fill(1);

    expect(scanExtrema(flat, flat, 10)).toEqual([
      { position: 5, direction: -1, value: 1 },
      { position: 5, direction: 1, value: 1 },
    ]);
  });

  it('should find nothing on a steady trend', () => {
    const high = [1, 2, 3, 4, 5, 6, 7, 8];
    const low = [0, 1, 2, 3, 4, 5, 6, 7];

    expect(scanExtrema(high, low, 4)).toEqual([]);
  });
});
