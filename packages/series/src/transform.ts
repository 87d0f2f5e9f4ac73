/**
 * @fileoverview Positional shifting and missing-value filling.
 *
 * All functions return new arrays and treat `NaN` as the missing marker.
 *
 * @module @swingta/series/transform
 */

import type { FillMethod, PostProcessOptions } from '@swingta/contracts';
import { vOffset } from './validate.js';

/**
 * Shift values forward by `k` positions, padding the front with `NaN`.
 *
 * Values pushed past the end are dropped, so the length is unchanged.
 *
 * @example
 * ```typescript
 * shift([1, 2, 3], 1); // [NaN, 1, 2]
 * ```
 */
export function shift(values: readonly number[], k: number): number[] {
  if (k <= 0) {
    return [...values];
  }
  const out = new Array<number>(values.length).fill(Number.NaN);
  for (let i = k; i < values.length; i++) {
    out[i] = values[i - k] ?? Number.NaN;
  }
  return out;
}

/**
 * Replace every missing entry with a constant.
 */
export function fillNa(values: readonly number[], fill: number): number[] {
  return values.map((v) => (Number.isNaN(v) ? fill : v));
}

/**
 * Carry the last present value forward over gaps. Leading gaps stay missing.
 */
export function fillForward(values: readonly number[]): number[] {
  const out = [...values];
  let last = Number.NaN;
  for (let i = 0; i < out.length; i++) {
    const v = out[i] ?? Number.NaN;
    if (Number.isNaN(v)) {
      out[i] = last;
    } else {
      last = v;
    }
  }
  return out;
}

/**
 * Carry the next present value backward over gaps. Trailing gaps stay missing.
 */
export function fillBackward(values: readonly number[]): number[] {
  const out = [...values];
  let next = Number.NaN;
  for (let i = out.length - 1; i >= 0; i--) {
    const v = out[i] ?? Number.NaN;
    if (Number.isNaN(v)) {
      out[i] = next;
    } else {
      next = v;
    }
  }
  return out;
}

export function fillWith(values: readonly number[], method: FillMethod): number[] {
  return method === 'ffill' ? fillForward(values) : fillBackward(values);
}

/**
 * Apply the shared output post-processing: offset, then constant fill,
 * then directional fill.
 *
 * @throws InvalidParameterError for a negative or fractional offset
 */
export function postProcess(values: readonly number[], options: PostProcessOptions = {}): number[] {
  let out = shift(values, vOffset(options.offset));
  if (options.fillna !== undefined) {
    out = fillNa(out, options.fillna);
  }
  if (options.fillMethod !== undefined) {
    out = fillWith(out, options.fillMethod);
  }
  return out;
}
