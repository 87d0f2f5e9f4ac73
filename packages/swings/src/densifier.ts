/**
 * Swing densifier
 *
 * Spreads a sparse swing list over the full bar range.
 *
 * @packageDocumentation
 */

import type { Swing } from '@swingta/contracts';

/**
 * Dense per-bar swing columns. Bars without a swing hold `NaN` in all three.
 */
export interface DenseSwings {
  swing: number[];
  value: number[];
  deviation: number[];
}

/**
 * Write each swing's direction, value and deviation at its position in
 * three `NaN`-filled arrays of length `n`. Positions outside `[0, n)` are
 * ignored.
 */
export function densifySwings(swings: readonly Swing[], n: number): DenseSwings {
  const dense: DenseSwings = {
    swing: new Array<number>(n).fill(Number.NaN),
    value: new Array<number>(n).fill(Number.NaN),
    deviation: new Array<number>(n).fill(Number.NaN),
  };

  for (const s of swings) {
    if (!Number.isInteger(s.position) || s.position < 0 || s.position >= n) {
      continue;
    }
    dense.swing[s.position] = s.direction;
    dense.value[s.position] = s.value;
    dense.deviation[s.position] = s.deviation;
  }

  return dense;
}
