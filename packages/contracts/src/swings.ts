/**
 * @fileoverview Swing detection types for the zigzag pipeline.
 *
 * Defines extremum candidates, confirmed swings, zigzag parameters and the
 * densified output frame.
 *
 * @module @swingta/contracts/swings
 */

import type { IndicatorFrame, IndicatorSeries, PostProcessOptions } from './series.js';

/**
 * Direction code of a swing: `1` for a HIGH, `-1` for a LOW.
 */
export type SwingDirection = 1 | -1;

export const SWING_HIGH: SwingDirection = 1;
export const SWING_LOW: SwingDirection = -1;

/**
 * Raw local high/low found by the fixed-window scan, before deviation filtering.
 */
export interface Extremum {
  /** Position in the input series */
  readonly position: number;
  readonly direction: SwingDirection;
  /** `high[position]` for a HIGH, `low[position]` for a LOW */
  readonly value: number;
}

/**
 * Confirmed swing that survived deviation filtering.
 */
export interface Swing {
  readonly position: number;
  readonly direction: SwingDirection;
  readonly value: number;
  /**
   * Percentage move from the preceding (older) confirmed swing into this one.
   * The oldest swing carries 0.
   */
  readonly deviation: number;
}

/**
 * Zigzag tuning parameters.
 */
export interface ZigzagConfig {
  /** Scan window size; `floor(legs / 2)` bars each side of center */
  legs: number;
  /** Minimum percentage move between consecutive swings */
  deviation: number;
}

export const DEFAULT_ZIGZAG_CONFIG: Readonly<ZigzagConfig> = Object.freeze({
  legs: 10,
  deviation: 5.0,
});

/**
 * Options accepted by the zigzag entry point.
 */
export type ZigzagParams = Partial<ZigzagConfig> & PostProcessOptions;

/**
 * Densified zigzag output: three columns aligned to the input index.
 */
export interface ZigzagResult extends IndicatorFrame {
  /** Direction codes (`1`, `-1`, `NaN`) */
  readonly swing: IndicatorSeries;
  /** Swing prices or `NaN` */
  readonly value: IndicatorSeries;
  /** Swing deviations in percent or `NaN` */
  readonly deviation: IndicatorSeries;
}
