/**
 * Cube transform (Ehlers): raises price to a power, with a trailing
 * signal line.
 */

import type { SeriesInput } from '@swingta/contracts';
import { vSeries, vFloat, vInt, vOffset, formatFloat, shift } from '@swingta/series';
import type { IndicatorOptions, SignalFrame } from '../types.js';
import { signalFrame } from './signal.js';

export interface CubeOptions extends IndicatorOptions {
  /** Exponent, at least 3 (default 3); smaller values fall back to 3 */
  pwr?: number;
  /** Signal line lag in bars (default -1, meaning no lag) */
  signalOffset?: number;
}

/**
 * Cube transform (`CUBE_<pwr>_<signalOffset>` with `CUBE…` and `CUBEs…`
 * columns, transform).
 *
 * @returns `undefined` for empty input or when every output is missing
 *   after the offset and signal lag
 */
export function cube(close: SeriesInput, options: CubeOptions = {}): SignalFrame | undefined {
  const requested = vFloat(options.pwr, 3, 'pwr');
  const pwr = requested < 3 ? 3 : requested;
  const signalOffset = vInt(options.signalOffset, -1, 'signalOffset');
  const offset = vOffset(options.offset);

  const series = vSeries(close, 1, 'close');
  if (series === undefined) {
    return undefined;
  }

  const raw = series.values.map((v) => Math.pow(v, pwr));
  const lag = offset + Math.max(signalOffset, 0);
  if (shift(raw, lag).every((v) => Number.isNaN(v))) {
    return undefined;
  }

  return signalFrame(series, raw, signalOffset, options, `CUBE_${formatFloat(pwr)}_${signalOffset}`, 'transform');
}
