/**
 * @fileoverview Series and indicator output types.
 *
 * A series is a pair of equal-length arrays: an ordered index (integer positions
 * or epoch milliseconds, no duplicates) and numeric values. `NaN` is the missing
 * marker everywhere in swingta.
 *
 * @module @swingta/contracts/series
 */

import type { IndicatorCategory } from './categories.js';

/**
 * Ordered numeric series aligned to an index.
 */
export interface Series {
  /** Integer positions or epoch milliseconds, strictly ordered */
  readonly index: readonly number[];
  /** Values aligned to `index`; `NaN` marks a missing value */
  readonly values: readonly number[];
}

/**
 * Anything accepted where a series is expected. Plain arrays are placed on
 * the index `0..n-1`; `null` entries become `NaN`.
 */
export type SeriesInput = readonly (number | null)[] | Series;

/**
 * Named, categorized indicator output.
 */
export interface IndicatorSeries extends Series {
  readonly name: string;
  readonly category: IndicatorCategory;
}

/**
 * Several indicator columns sharing one index.
 */
export interface IndicatorFrame {
  readonly name: string;
  readonly category: IndicatorCategory;
  readonly index: readonly number[];
  readonly columns: readonly IndicatorSeries[];
}

/**
 * How missing values are filled after computation.
 */
export type FillMethod = 'ffill' | 'bfill';

/**
 * Post-processing options shared by every indicator.
 */
export interface PostProcessOptions {
  /** Non-negative shift applied to the output (default 0) */
  offset?: number;
  /** Constant written over missing values */
  fillna?: number;
  /** Propagate the nearest value into missing slots */
  fillMethod?: FillMethod;
}
