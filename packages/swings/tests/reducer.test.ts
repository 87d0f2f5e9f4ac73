/**
 * Swing reducer tests
 */

import { describe, it, expect } from 'vitest';
import type { Extremum } from '@swingta/contracts';
import { reduceSwings } from '../src/reducer.js';

const low = (position: number, value: number): Extremum => ({ position, direction: -1, value });
const high = (position: number, value: number): Extremum => ({ position, direction: 1, value });

describe('reduceSwings', () => {
  it('should return no swings for no extrema', () => {
    expect(reduceSwings([], 5)).toEqual([]);
  });

  it('should stamp the confirming move on the newer swing', () => {
    const swings = reduceSwings([low(2, 90), high(5, 110)], 5);

    expect(swings).toHaveLength(2);
    expect(swings[0]).toEqual({ position: 2, direction: -1, value: 90, deviation: 0 });
    expect(swings[1]?.position).toBe(5);
    expect(swings[1]?.direction).toBe(1);
    expect(swings[1]?.deviation).toBeCloseTo(22.2222, 3);
  });

  it('should return no swings when no move beats the threshold', () => {
    expect(reduceSwings([low(1, 100), high(2, 102)], 5)).toEqual([]);
  });

  it('should require a move strictly above the threshold', () => {
    expect(reduceSwings([low(1, 100), high(2, 105)], 5)).toEqual([]);
  });

  it('should ignore a LOW sitting above the pending HIGH', () => {
    expect(reduceSwings([low(1, 6), high(2, 5)], 5)).toEqual([]);
  });

  it('should report an infinite move from a zero price', () => {
    expect(reduceSwings([low(1, 0), high(2, 3)], 10)).toEqual([
      { position: 1, direction: -1, value: 0, deviation: 0 },
      { position: 2, direction: 1, value: 3, deviation: Infinity },
    ]);
  });

  it('should skip a candidate on the pending swing bar', () => {
    expect(reduceSwings([low(1, 2), low(3, 1), high(3, 5)], 5)).toEqual([
      { position: 1, direction: -1, value: 2, deviation: 0 },
      { position: 3, direction: 1, value: 5, deviation: 150 },
    ]);
  });

  it('should drop a more extreme candidate while only one swing is finalized', () => {
    // The LOW at 7 is deeper than the pending LOW at 8 but is not taken
    expect(reduceSwings([low(7, 4), low(8, 5), high(9, 10)], 5)).toEqual([
      { position: 8, direction: -1, value: 5, deviation: 0 },
      { position: 9, direction: 1, value: 10, deviation: 100 },
    ]);
  });

  it('should amend the pending swing once two swings are finalized', () => {
    const swings = reduceSwings([high(6, 9), high(7, 8), low(8, 5), high(9, 10)], 5);

    expect(swings.map((s) => [s.position, s.direction, s.value])).toEqual([
      [6, 1, 9],
      [8, -1, 5],
      [9, 1, 10],
    ]);
    expect(swings[0]?.deviation).toBe(0);
    expect(swings[1]?.deviation).toBeCloseTo(44.4444, 3);
    expect(swings[2]?.deviation).toBe(100);
  });

  it('should drop a less extreme same-direction candidate', () => {
    expect(reduceSwings([low(4, 5), high(5, 8), high(6, 10)], 5)).toEqual([
      { position: 4, direction: -1, value: 5, deviation: 0 },
      { position: 6, direction: 1, value: 10, deviation: 100 },
    ]);
  });

  it('should return swings oldest first with alternating directions', () => {
    const swings = reduceSwings(
      [low(0, 90), high(3, 110), low(6, 95), high(9, 120), low(12, 100)],
      5
    );

    expect(swings.map((s) => s.position)).toEqual([0, 3, 6, 9, 12]);
    expect(swings.map((s) => s.direction)).toEqual([-1, 1, -1, 1, -1]);
  });
});
