/**
 * Ehlers Super Smoother Filter
 *
 * Two-pole recursive filter. The first two values pass through unchanged
 * and seed the recursion.
 */

import type { IndicatorSeries, SeriesInput } from '@swingta/contracts';
import {
  vSeries,
  vPosIntDefault,
  vPosDefault,
  vBool,
  vOffset,
  postProcess,
  toIndicatorSeries,
} from '@swingta/series';
import type { LengthOptions } from '../types.js';

export interface SsfOptions extends LengthOptions {
  /** Use the TradingView coefficient form (default false) */
  everget?: boolean;
  /** Value used for pi (default 3.14159) */
  pi?: number;
  /** Value used for the square root of two (default 1.414) */
  sqrt2?: number;
}

export interface SsfCoefficients {
  a: number;
  b: number;
  c: number;
}

function ehlersCoefficients(length: number, pi: number, sqrt2: number): SsfCoefficients {
  const ratio = sqrt2 / length;
  const a = Math.exp(-pi * ratio);
  // The cosine argument is the published one: 180 * ratio, taken in radians
  const b = 2 * a * Math.cos(180 * ratio);
  return { a, b, c: a * a - b + 1 };
}

function evergetCoefficients(length: number, pi: number, sqrt2: number): SsfCoefficients {
  const arg = (pi * sqrt2) / length;
  const a = Math.exp(-arg);
  const b = 2 * a * Math.cos(arg);
  return { a, b, c: a * a - b + 1 };
}

export function ssfValues(values: readonly number[], { a, b, c }: SsfCoefficients): number[] {
  const out = [...values];
  for (let i = 2; i < out.length; i++) {
    const x0 = values[i] ?? Number.NaN;
    const x1 = values[i - 1] ?? Number.NaN;
    const y1 = out[i - 1] ?? Number.NaN;
    const y2 = out[i - 2] ?? Number.NaN;
    out[i] = 0.5 * c * (x0 + x1) + b * y1 - a * a * y2;
  }
  return out;
}

/**
 * Super Smoother Filter (`SSF_<length>` or `SSFe_<length>`, overlap).
 *
 * @returns `undefined` when `close` is shorter than `length`
 */
export function ssf(close: SeriesInput, options: SsfOptions = {}): IndicatorSeries | undefined {
  const length = vPosIntDefault(options.length, 20, 'length');
  const pi = vPosDefault(options.pi, 3.14159, 'pi');
  const sqrt2 = vPosDefault(options.sqrt2, 1.414, 'sqrt2');
  const everget = vBool(options.everget, false);
  vOffset(options.offset);

  const series = vSeries(close, length, 'close');
  if (series === undefined) {
    return undefined;
  }

  const coefficients = everget
    ? evergetCoefficients(length, pi, sqrt2)
    : ehlersCoefficients(length, pi, sqrt2);

  const values = postProcess(ssfValues(series.values, coefficients), options);
  return toIndicatorSeries(series.index, values, `SSF${everget ? 'e' : ''}_${length}`, 'overlap');
}
