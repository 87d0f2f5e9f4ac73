/**
 * Option types shared by the supplementary indicators.
 */

import type { IndicatorFrame, IndicatorSeries, PostProcessOptions } from '@swingta/contracts';

export type IndicatorOptions = PostProcessOptions;

export interface LengthOptions extends IndicatorOptions {
  length?: number;
}

/**
 * Frame with a main line and a signal line.
 */
export interface SignalFrame extends IndicatorFrame {
  readonly main: IndicatorSeries;
  readonly signal: IndicatorSeries;
}

export interface HeikinAshiFrame extends IndicatorFrame {
  readonly open: IndicatorSeries;
  readonly high: IndicatorSeries;
  readonly low: IndicatorSeries;
  readonly close: IndicatorSeries;
}
