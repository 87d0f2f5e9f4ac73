/**
 * Extremum scanner for zigzag swing detection
 *
 * Finds every bar whose low is the lowest (or whose high is the highest)
 * within a fixed window around it. The window reaches `floor(legs / 2)`
 * bars back and the same number forward, center included.
 *
 * @packageDocumentation
 */

import type { Extremum } from '@swingta/contracts';
import { SWING_HIGH, SWING_LOW } from '@swingta/contracts';

/**
 * Half-widths of the scan window for a given `legs` value.
 *
 * `right` is exclusive, so a window spans `[i - left, i + right)`.
 */
export function scanWindow(legs: number): { left: number; right: number } {
  const left = Math.floor(legs / 2);
  return { left, right: left + 1 };
}

/**
 * Scan high/low arrays for local extrema.
 *
 * For each center `i` in `[left, n - right)` a LOW is emitted when `low[i]`
 * is at or below every low in the window, then a HIGH when `high[i]` is at
 * or above every high in the window. Ties qualify, so a plateau yields an
 * extremum at every bar of it. A missing value never qualifies and
 * disqualifies any window containing it.
 *
 * @param high - High prices
 * @param low - Low prices, same length as `high`
 * @param legs - Window size
 * @returns Extrema ordered by position, or `undefined` when the series is
 *   shorter than one full window
 *
 * @example
 * ```typescript
 * scanExtrema([1, 3, 2, 2], [0, 2, 1, 1], 2);
 * // [{ position: 1, direction: 1, value: 3 }]
 * ```
 */
export function scanExtrema(
  high: readonly number[],
  low: readonly number[],
  legs: number
): Extremum[] | undefined {
  const n = Math.min(high.length, low.length);
  const { left, right } = scanWindow(legs);

  if (n < left + right + 1) {
    return undefined;
  }

  const extrema: Extremum[] = [];

  for (let i = left; i < n - right; i++) {
    const lowCenter = low[i] ?? Number.NaN;
    const highCenter = high[i] ?? Number.NaN;
    let isLow = !Number.isNaN(lowCenter);
    let isHigh = !Number.isNaN(highCenter);

    for (let j = i - left; j < i + right && (isLow || isHigh); j++) {
      // NaN comparisons are false, so a gap in the window fails the test
      if (isLow && !(lowCenter <= (low[j] ?? Number.NaN))) {
        isLow = false;
      }
      if (isHigh && !(highCenter >= (high[j] ?? Number.NaN))) {
        isHigh = false;
      }
    }

    if (isLow) {
      extrema.push({ position: i, direction: SWING_LOW, value: lowCenter });
    }
    if (isHigh) {
      extrema.push({ position: i, direction: SWING_HIGH, value: highCenter });
    }
  }

  return extrema;
}
