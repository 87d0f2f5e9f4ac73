/**
 * Zigzag indicator
 *
 * Confirms swing highs and lows in hindsight: a bar is a swing once the
 * price has since moved at least `deviation` percent the other way. The
 * pipeline is scan, reduce, densify, then the shared offset and fill
 * post-processing.
 *
 * Zigzag looks ahead by construction, so the output may only be shifted
 * forward.
 *
 * @packageDocumentation
 */

import type { IndicatorLogFields, Logger } from '@swingta/logger';
import { startTimer } from '@swingta/logger';
import type { IndicatorSeries, SeriesInput, ZigzagParams, ZigzagResult } from '@swingta/contracts';
import { DEFAULT_ZIGZAG_CONFIG } from '@swingta/contracts';
import {
  vSeries,
  vSameLength,
  vPosDefault,
  vPosIntDefault,
  vOffset,
  postProcess,
  formatFloat,
  toIndicatorSeries,
  seriesLength,
} from '@swingta/series';
import { scanExtrema } from './scanner.js';
import { reduceSwings } from './reducer.js';
import { densifySwings } from './densifier.js';

const CATEGORY = 'trend';

/**
 * Zigzag options, plus an optional logger for debug output.
 */
export interface ZigzagOptions extends ZigzagParams {
  logger?: Logger;
}

/**
 * Column-name suffix for a parameter pair, e.g. `_5.0%_10`.
 */
export function zigzagSuffix(deviation: number, legs: number): string {
  return `_${formatFloat(deviation)}%_${legs}`;
}

/**
 * Compute zigzag swings over high/low prices.
 *
 * @param high - High prices
 * @param low - Low prices, same length as `high`
 * @param close - Optional close prices; validated, not used
 * @param options - `legs` (default 10), `deviation` in percent (default 5.0),
 *   `offset` (default 0), `fillna`, `fillMethod`, `logger`
 * @returns Three columns aligned to the input index, or `undefined` when the
 *   input is shorter than `legs + 1` bars or one scan window
 * @throws InvalidParameterError for an explicitly invalid parameter or
 *   mismatched series lengths
 *
 * @example
 * ```typescript
 * const result = zigzag(high, low, undefined, { legs: 4, deviation: 3 });
 * result?.swing.name; // "ZIGZAGs_3.0%_4"
 * ```
 */
export function zigzag(
  high: SeriesInput,
  low: SeriesInput,
  close?: SeriesInput,
  options: ZigzagOptions = {}
): ZigzagResult | undefined {
  const { logger } = options;

  const legs = vPosIntDefault(options.legs, DEFAULT_ZIGZAG_CONFIG.legs, 'legs');
  const deviation = vPosDefault(options.deviation, DEFAULT_ZIGZAG_CONFIG.deviation, 'deviation');
  const offset = vOffset(options.offset);
  const minLength = legs + 1;

  const highSeries = vSeries(high, minLength, 'high');
  const lowSeries = vSeries(low, minLength, 'low');
  const closeSeries = close === undefined ? undefined : vSeries(close, minLength, 'close');

  const closeMissing = close !== undefined && closeSeries === undefined;
  if (highSeries === undefined || lowSeries === undefined || closeMissing) {
    logger?.debug('Insufficient data for zigzag', {
      indicator: 'zigzag',
      required: minLength,
      received: Math.min(seriesLength(high), seriesLength(low)),
    });
    return undefined;
  }

  vSameLength(highSeries, { low: lowSeries, close: closeSeries });

  const timer = startTimer();
  const n = highSeries.values.length;

  const extrema = scanExtrema(highSeries.values, lowSeries.values, legs);
  if (extrema === undefined) {
    logger?.debug('Series shorter than one zigzag scan window', {
      indicator: 'zigzag',
      length: legs,
      bars: n,
    });
    return undefined;
  }

  const swings = reduceSwings(extrema, deviation);
  const dense = densifySwings(swings, n);

  const post = { offset, fillna: options.fillna, fillMethod: options.fillMethod };
  const suffix = zigzagSuffix(deviation, legs);
  const index = highSeries.index;

  const swing = toIndicatorSeries(index, postProcess(dense.swing, post), `ZIGZAGs${suffix}`, CATEGORY);
  const value = toIndicatorSeries(index, postProcess(dense.value, post), `ZIGZAGv${suffix}`, CATEGORY);
  const dev = toIndicatorSeries(index, postProcess(dense.deviation, post), `ZIGZAGd${suffix}`, CATEGORY);
  const columns: IndicatorSeries[] = [swing, value, dev];

  const fields: IndicatorLogFields = {
    component: 'swings',
    indicator: 'zigzag',
    length: legs,
    bars: n,
    extrema: extrema.length,
    swings: swings.length,
    duration_ms: timer.stop(),
  };
  logger?.debug('Zigzag computed', fields);

  return {
    name: `ZIGZAG${suffix}`,
    category: CATEGORY,
    index,
    columns,
    swing,
    value,
    deviation: dev,
  };
}
