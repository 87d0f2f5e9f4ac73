/**
 * Swing densifier tests
 */

import { describe, it, expect } from 'vitest';
import type { Swing } from '@swingta/contracts';
import { densifySwings } from '../src/densifier.js';

const swings: Swing[] = [
  { position: 1, direction: -1, value: 90, deviation: 0 },
  { position: 3, direction: 1, value: 110, deviation: 22.5 },
];

describe('densifySwings', () => {
  it('should place swings at their positions and NaN elsewhere', () => {
    const dense = densifySwings(swings, 5);

    expect(dense.swing).toEqual([NaN, -1, NaN, 1, NaN]);
    expect(dense.value).toEqual([NaN, 90, NaN, 110, NaN]);
    expect(dense.deviation).toEqual([NaN, 0, NaN, 22.5, NaN]);
  });

  it('should return all-NaN columns for no swings', () => {
    const dense = densifySwings([], 3);

    expect(dense.swing).toEqual([NaN, NaN, NaN]);
    expect(dense.value).toEqual([NaN, NaN, NaN]);
    expect(dense.deviation).toEqual([NaN, NaN, NaN]);
  });

  it('should ignore positions outside the series', () => {
    const dense = densifySwings([...swings, { position: 9, direction: 1, value: 1, deviation: 1 }], 4);

    expect(dense.swing).toEqual([NaN, -1, NaN, 1]);
  });

  it('should produce identical arrays on repeated runs', () => {
    const first = densifySwings(swings, 6);
    const second = densifySwings(swings, 6);

    expect(second).toEqual(first);
    expect(second.swing).not.toBe(first.swing);
  });
});
