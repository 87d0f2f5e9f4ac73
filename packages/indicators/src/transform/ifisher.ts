/**
 * Inverse Fisher transform (Ehlers)
 *
 * Squashes values on [-1, 1] through `(e^(amp*x) - 1) / (e^(amp*x) + 1)`.
 * Input with any value outside [-1, 1] is first remapped from its own
 * min/max onto that range.
 */

import type { SeriesInput } from '@swingta/contracts';
import { vSeries, vFloat, vInt, vOffset, formatFloat } from '@swingta/series';
import type { IndicatorOptions, SignalFrame } from '../types.js';
import { remapValues } from './remap.js';
import { signalFrame } from './signal.js';

export interface IfisherOptions extends IndicatorOptions {
  /** Amplification (default 1) */
  amp?: number;
  /** Signal line lag in bars (default -1, meaning no lag) */
  signalOffset?: number;
}

function toUnitRange(values: readonly number[]): number[] | undefined {
  if (values.every((v) => v >= -1 && v <= 1)) {
    return [...values];
  }
  const present = values.filter((v) => !Number.isNaN(v));
  if (present.length === 0) {
    return undefined;
  }
  let fmin = Infinity;
  let fmax = -Infinity;
  for (const v of present) {
    if (v < fmin) fmin = v;
    if (v > fmax) fmax = v;
  }
  return remapValues(values, { fmin, fmax, tmin: -1, tmax: 1 });
}

/**
 * Inverse Fisher transform (`INVFISHER_<amp>` with `INVFISHER…` and
 * `INVFISHERs…` columns, transform).
 *
 * @returns `undefined` for empty, all-missing or constant out-of-range input
 */
export function ifisher(close: SeriesInput, options: IfisherOptions = {}): SignalFrame | undefined {
  const amp = vFloat(options.amp, 1, 'amp');
  const signalOffset = vInt(options.signalOffset, -1, 'signalOffset');
  vOffset(options.offset);

  const series = vSeries(close, 1, 'close');
  if (series === undefined) {
    return undefined;
  }

  const unit = toUnitRange(series.values);
  if (unit === undefined) {
    return undefined;
  }

  const raw = unit.map((v) => {
    const amped = Math.exp(amp * v);
    return (amped - 1) / (amped + 1);
  });

  return signalFrame(series, raw, signalOffset, options, `INVFISHER_${formatFloat(amp)}`, 'transform');
}
