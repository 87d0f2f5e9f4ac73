/**
 * Main/signal frame assembly for the transform indicators.
 */

import type { IndicatorCategory, Series } from '@swingta/contracts';
import { postProcess, shift, toIndicatorSeries } from '@swingta/series';
import type { IndicatorOptions, SignalFrame } from '../types.js';

/**
 * Build a main/signal frame. Both lines are lagged by `signalOffset` bars on
 * top of the shared offset, so they stay equal; a negative signal offset
 * means no lag.
 */
export function signalFrame(
  series: Series,
  raw: readonly number[],
  signalOffset: number,
  options: IndicatorOptions,
  name: string,
  category: IndicatorCategory
): SignalFrame {
  const lagged = shift(raw, Math.max(signalOffset, 0));
  const main = postProcess(lagged, options);
  const signal = postProcess(lagged, options);

  const mainSeries = toIndicatorSeries(series.index, main, name, category);
  const signalSeries = toIndicatorSeries(series.index, signal, name.replace(/_/, 's_'), category);

  return {
    name,
    category,
    index: series.index,
    columns: [mainSeries, signalSeries],
    main: mainSeries,
    signal: signalSeries,
  };
}
