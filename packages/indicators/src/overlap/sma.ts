/**
 * Simple moving average
 */

import type { IndicatorSeries, SeriesInput } from '@swingta/contracts';
import { vSeries, vPosIntDefault, vOffset, rolling, mean, postProcess, toIndicatorSeries } from '@swingta/series';
import type { LengthOptions } from '../types.js';

export interface SmaOptions extends LengthOptions {
  /** Present values required per window (default `length`) */
  minPeriods?: number;
}

/**
 * Raw trailing mean, `NaN` until `minPeriods` values are present.
 */
export function smaValues(values: readonly number[], length: number, minPeriods: number = length): number[] {
  return rolling(values, length, mean, minPeriods);
}

/**
 * Simple moving average (`SMA_<length>`, overlap).
 *
 * @returns `undefined` when `close` is shorter than `length`
 */
export function sma(close: SeriesInput, options: SmaOptions = {}): IndicatorSeries | undefined {
  const length = vPosIntDefault(options.length, 10, 'length');
  const minPeriods = vPosIntDefault(options.minPeriods, length, 'minPeriods');
  vOffset(options.offset);

  const series = vSeries(close, length, 'close');
  if (series === undefined) {
    return undefined;
  }

  const values = postProcess(smaValues(series.values, length, minPeriods), options);
  return toIndicatorSeries(series.index, values, `SMA_${length}`, 'overlap');
}
