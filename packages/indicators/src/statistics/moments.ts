/**
 * Rolling skew and kurtosis
 *
 * Both use the bias-corrected sample estimators. A window with zero
 * variance, or with too few values for the estimator (3 for skew, 4 for
 * kurtosis), yields `NaN`.
 */

import type { IndicatorSeries, SeriesInput } from '@swingta/contracts';
import { vSeries, vPosIntDefault, vOffset, rolling, postProcess, toIndicatorSeries } from '@swingta/series';
import type { LengthOptions } from '../types.js';

export interface MomentOptions extends LengthOptions {
  /** Present values required per window (default `length`) */
  minPeriods?: number;
}

interface CentralMoments {
  n: number;
  m2: number;
  m3: number;
  m4: number;
}

function centralMoments(window: readonly number[]): CentralMoments {
  const n = window.length;
  let sum = 0;
  for (const v of window) sum += v;
  const mean = sum / n;

  let m2 = 0;
  let m3 = 0;
  let m4 = 0;
  for (const v of window) {
    const d = v - mean;
    const d2 = d * d;
    m2 += d2;
    m3 += d2 * d;
    m4 += d2 * d2;
  }
  return { n, m2: m2 / n, m3: m3 / n, m4: m4 / n };
}

/**
 * Adjusted Fisher-Pearson skewness of one window.
 */
export function sampleSkew(window: readonly number[]): number {
  const { n, m2, m3 } = centralMoments(window);
  if (n < 3 || m2 === 0) {
    return Number.NaN;
  }
  const g1 = m3 / Math.pow(m2, 1.5);
  return (Math.sqrt(n * (n - 1)) / (n - 2)) * g1;
}

/**
 * Bias-corrected excess kurtosis of one window.
 */
export function sampleKurtosis(window: readonly number[]): number {
  const { n, m2, m4 } = centralMoments(window);
  if (n < 4 || m2 === 0) {
    return Number.NaN;
  }
  const g2 = m4 / (m2 * m2) - 3;
  return ((n - 1) / ((n - 2) * (n - 3))) * ((n + 1) * g2 + 6);
}

function rollingMoment(
  close: SeriesInput,
  options: MomentOptions,
  estimator: (window: readonly number[]) => number,
  label: string
): IndicatorSeries | undefined {
  const length = vPosIntDefault(options.length, 30, 'length');
  const minPeriods = vPosIntDefault(options.minPeriods, length, 'minPeriods');
  vOffset(options.offset);

  const series = vSeries(close, Math.max(length, minPeriods), 'close');
  if (series === undefined) {
    return undefined;
  }

  const raw = rolling(series.values, length, estimator, minPeriods);
  return toIndicatorSeries(series.index, postProcess(raw, options), `${label}_${length}`, 'statistics');
}

/**
 * Rolling skew (`SKEW_<length>`, statistics).
 */
export function skew(close: SeriesInput, options: MomentOptions = {}): IndicatorSeries | undefined {
  return rollingMoment(close, options, sampleSkew, 'SKEW');
}

/**
 * Rolling excess kurtosis (`KURT_<length>`, statistics).
 */
export function kurtosis(close: SeriesInput, options: MomentOptions = {}): IndicatorSeries | undefined {
  return rollingMoment(close, options, sampleKurtosis, 'KURT');
}
