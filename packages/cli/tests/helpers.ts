/**
 * Shared fixtures for CLI tests
 */

import type { BarFixture } from '../src/fixture.js';

const HIGH = [1, 3, 2, 5, 1, 6, 2];
const LOW = [0, 2, 1, 3, 0, 4, 1];

/**
 * Seven bars at timestamps 1000..7000 whose zigzag (legs 1, deviation 10)
 * confirms six alternating swings.
 */
export function scenarioFixture(): BarFixture {
  return {
    symbol: 'TEST',
    timeframe: '1m',
    bars: HIGH.map((high, i) => {
      const low = LOW[i] ?? 0;
      return {
        timestamp: 1000 * (i + 1),
        open: low,
        high,
        low,
        close: (high + low) / 2,
      };
    }),
  };
}
