/**
 * Heikin-Ashi candles
 *
 * The HA close averages the bar's four prices; the HA open averages the
 * previous HA open and close, seeded from the first bar's open and close.
 */

import type { SeriesInput } from '@swingta/contracts';
import { vSeries, vSameLength, vOffset, postProcess, toIndicatorSeries } from '@swingta/series';
import type { HeikinAshiFrame, IndicatorOptions } from '../types.js';

export interface HaValues {
  open: number[];
  high: number[];
  low: number[];
  close: number[];
}

export function haValues(
  open: readonly number[],
  high: readonly number[],
  low: readonly number[],
  close: readonly number[]
): HaValues {
  const n = close.length;
  const haClose = close.map(
    (c, i) => 0.25 * ((open[i] ?? Number.NaN) + (high[i] ?? Number.NaN) + (low[i] ?? Number.NaN) + c)
  );
  const haOpen = new Array<number>(n).fill(Number.NaN);
  if (n > 0) {
    haOpen[0] = 0.5 * ((open[0] ?? Number.NaN) + (close[0] ?? Number.NaN));
  }
  for (let i = 1; i < n; i++) {
    haOpen[i] = 0.5 * ((haOpen[i - 1] ?? Number.NaN) + (haClose[i - 1] ?? Number.NaN));
  }

  return {
    open: haOpen,
    high: haOpen.map((o, i) => Math.max(o, haClose[i] ?? Number.NaN, high[i] ?? Number.NaN)),
    low: haOpen.map((o, i) => Math.min(o, haClose[i] ?? Number.NaN, low[i] ?? Number.NaN)),
    close: haClose,
  };
}

/**
 * Heikin-Ashi (`Heikin-Ashi` frame with `HA_open`, `HA_high`, `HA_low`,
 * `HA_close`, candles).
 *
 * @returns `undefined` when any input is empty
 */
export function ha(
  open: SeriesInput,
  high: SeriesInput,
  low: SeriesInput,
  close: SeriesInput,
  options: IndicatorOptions = {}
): HeikinAshiFrame | undefined {
  vOffset(options.offset);

  const o = vSeries(open, 1, 'open');
  const h = vSeries(high, 1, 'high');
  const l = vSeries(low, 1, 'low');
  const c = vSeries(close, 1, 'close');
  if (o === undefined || h === undefined || l === undefined || c === undefined) {
    return undefined;
  }
  vSameLength(c, { open: o, high: h, low: l });

  const raw = haValues(o.values, h.values, l.values, c.values);
  const column = (values: number[], name: string) =>
    toIndicatorSeries(c.index, postProcess(values, options), name, 'candles');

  const haOpen = column(raw.open, 'HA_open');
  const haHigh = column(raw.high, 'HA_high');
  const haLow = column(raw.low, 'HA_low');
  const haClose = column(raw.close, 'HA_close');

  return {
    name: 'Heikin-Ashi',
    category: 'candles',
    index: c.index,
    columns: [haOpen, haHigh, haLow, haClose],
    open: haOpen,
    high: haHigh,
    low: haLow,
    close: haClose,
  };
}
