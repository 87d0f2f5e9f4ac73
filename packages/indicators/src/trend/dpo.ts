/**
 * Detrended Price Oscillator
 *
 * Subtracts a displaced moving average from price to expose cycles. The
 * centered form compares each bar with the average `t` bars ahead, where
 * `t = floor(length / 2) + 1`, and so reads future data. Pass
 * `lookahead: false` to force the trailing form.
 */

import type { IndicatorSeries, SeriesInput } from '@swingta/contracts';
import { vSeries, vPosIntDefault, vBool, vOffset, postProcess, toIndicatorSeries } from '@swingta/series';
import { smaValues } from '../overlap/sma.js';
import type { LengthOptions } from '../types.js';

export interface DpoOptions extends LengthOptions {
  /** Compare against the average `t` bars ahead (default true) */
  centered?: boolean;
  /** Allow the centered form (default true) */
  lookahead?: boolean;
}

/**
 * Detrended Price Oscillator (`DPO_<length>`, trend).
 *
 * @returns `undefined` when `close` has `length` bars or fewer
 */
export function dpo(close: SeriesInput, options: DpoOptions = {}): IndicatorSeries | undefined {
  const length = vPosIntDefault(options.length, 20, 'length');
  const lookahead = vBool(options.lookahead, true);
  const centered = vBool(options.centered, true) && lookahead;
  vOffset(options.offset);

  const series = vSeries(close, length + 1, 'close');
  if (series === undefined) {
    return undefined;
  }

  const t = Math.floor(0.5 * length) + 1;
  const ma = smaValues(series.values, length);
  const n = series.values.length;
  const raw = new Array<number>(n).fill(Number.NaN);

  for (let i = 0; i < n; i++) {
    const ref = centered ? i + t : i - t;
    if (ref < 0 || ref >= n) {
      continue;
    }
    raw[i] = (series.values[i] ?? Number.NaN) - (ma[ref] ?? Number.NaN);
  }

  return toIndicatorSeries(series.index, postProcess(raw, options), `DPO_${length}`, 'trend');
}
