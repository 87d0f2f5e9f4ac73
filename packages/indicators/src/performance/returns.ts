/**
 * Log and percent returns
 *
 * Both compare each bar with the bar `length` before it, or with the first
 * bar when cumulative. Only past bars are referenced.
 */

import type { IndicatorSeries, SeriesInput } from '@swingta/contracts';
import { vSeries, vPosIntDefault, vBool, vOffset, postProcess, toIndicatorSeries } from '@swingta/series';
import type { LengthOptions } from '../types.js';

export interface ReturnOptions extends LengthOptions {
  /** Measure against the first bar instead (default false) */
  cumulative?: boolean;
}

type RatioFn = (ratio: number) => number;

function computeReturns(
  close: SeriesInput,
  options: ReturnOptions,
  transform: RatioFn,
  label: string
): IndicatorSeries | undefined {
  const length = vPosIntDefault(options.length, 1, 'length');
  const cumulative = vBool(options.cumulative, false);
  vOffset(options.offset);

  const series = vSeries(close, length + 1, 'close');
  if (series === undefined) {
    return undefined;
  }

  const values = series.values;
  const first = values[0] ?? Number.NaN;
  const raw = values.map((v, i) => {
    if (cumulative) {
      return transform(v / first);
    }
    return i < length ? Number.NaN : transform(v / (values[i - length] ?? Number.NaN));
  });

  const name = `${cumulative ? 'CUM' : ''}${label}_${length}`;
  return toIndicatorSeries(series.index, postProcess(raw, options), name, 'performance');
}

/**
 * Log return (`LOGRET_<length>` or `CUMLOGRET_<length>`, performance).
 */
export function logReturn(close: SeriesInput, options: ReturnOptions = {}): IndicatorSeries | undefined {
  return computeReturns(close, options, Math.log, 'LOGRET');
}

/**
 * Percent return as a fraction (`PCTRET_<length>` or `CUMPCTRET_<length>`, performance).
 */
export function percentReturn(close: SeriesInput, options: ReturnOptions = {}): IndicatorSeries | undefined {
  return computeReturns(close, options, (ratio) => ratio - 1, 'PCTRET');
}
