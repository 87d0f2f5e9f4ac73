/**
 * @fileoverview Trailing-window aggregation.
 *
 * @module @swingta/series/rolling
 */

/**
 * Reduce each trailing window of `length` values.
 *
 * Missing values inside a window are skipped. A window with fewer than
 * `minPeriods` present values yields `NaN`; otherwise the reducer receives
 * only the present values, oldest first.
 *
 * @example
 * ```typescript
 * rolling([1, 2, 3, 4], 2, mean); // [NaN, 1.5, 2.5, 3.5]
 * ```
 */
export function rolling(
  values: readonly number[],
  length: number,
  reducer: (window: readonly number[]) => number,
  minPeriods: number = length
): number[] {
  const out = new Array<number>(values.length).fill(Number.NaN);
  for (let i = 0; i < values.length; i++) {
    const window: number[] = [];
    for (let j = Math.max(0, i - length + 1); j <= i; j++) {
      const v = values[j];
      if (v !== undefined && !Number.isNaN(v)) {
        window.push(v);
      }
    }
    if (window.length >= minPeriods && window.length > 0) {
      out[i] = reducer(window);
    }
  }
  return out;
}

export function mean(window: readonly number[]): number {
  let sum = 0;
  for (const v of window) sum += v;
  return sum / window.length;
}
