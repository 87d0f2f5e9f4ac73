/**
 * Linear range remapping
 */

import type { IndicatorSeries, SeriesInput } from '@swingta/contracts';
import { vSeries, vFloat, vOffset, postProcess, formatFloat, toIndicatorSeries } from '@swingta/series';
import type { IndicatorOptions } from '../types.js';

export interface RemapOptions extends IndicatorOptions {
  /** Input range minimum (default 0) */
  fmin?: number;
  /** Input range maximum (default 100) */
  fmax?: number;
  /** Output range minimum (default -1) */
  tmin?: number;
  /** Output range maximum (default 1) */
  tmax?: number;
}

export interface RemapRange {
  fmin: number;
  fmax: number;
  tmin: number;
  tmax: number;
}

/**
 * Map values linearly from `[fmin, fmax]` onto `[tmin, tmax]`. Values
 * outside the input range map outside the output range.
 *
 * @returns `undefined` when either range is empty or inverted
 */
export function remapValues(values: readonly number[], range: RemapRange): number[] | undefined {
  const frange = range.fmax - range.fmin;
  const trange = range.tmax - range.tmin;
  if (frange <= 0 || trange <= 0) {
    return undefined;
  }
  return values.map((v) => range.tmin + (trange / frange) * (v - range.fmin));
}

/**
 * Remap (`REMAP_<fmin>_<fmax>_<tmin>_<tmax>`, transform). The defaults map
 * an oscillator on 0..100 onto -1..1.
 */
export function remap(close: SeriesInput, options: RemapOptions = {}): IndicatorSeries | undefined {
  const range: RemapRange = {
    fmin: vFloat(options.fmin, 0, 'fmin'),
    fmax: vFloat(options.fmax, 100, 'fmax'),
    tmin: vFloat(options.tmin, -1, 'tmin'),
    tmax: vFloat(options.tmax, 1, 'tmax'),
  };
  vOffset(options.offset);

  const series = vSeries(close, 1, 'close');
  if (series === undefined) {
    return undefined;
  }

  const raw = remapValues(series.values, range);
  if (raw === undefined) {
    return undefined;
  }

  const name = `REMAP_${[range.fmin, range.fmax, range.tmin, range.tmax].map(formatFloat).join('_')}`;
  return toIndicatorSeries(series.index, postProcess(raw, options), name, 'transform');
}
