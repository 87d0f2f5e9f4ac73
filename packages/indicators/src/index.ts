/**
 * @swingta/indicators
 *
 * Companion indicators sharing the zigzag's validation and
 * post-processing: moving averages, returns, rolling moments, range
 * transforms and Heikin-Ashi candles.
 *
 * @packageDocumentation
 */

export type {
  IndicatorOptions,
  LengthOptions,
  SignalFrame,
  HeikinAshiFrame,
} from './types.js';

// Overlap
export { sma, smaValues } from './overlap/sma.js';
export type { SmaOptions } from './overlap/sma.js';
export { ssf, ssfValues } from './overlap/ssf.js';
export type { SsfOptions, SsfCoefficients } from './overlap/ssf.js';

// Trend
export { dpo } from './trend/dpo.js';
export type { DpoOptions } from './trend/dpo.js';

// Performance
export { logReturn, percentReturn } from './performance/returns.js';
export type { ReturnOptions } from './performance/returns.js';

// Statistics
export { skew, kurtosis, sampleSkew, sampleKurtosis } from './statistics/moments.js';
export type { MomentOptions } from './statistics/moments.js';

// Transform
export { remap, remapValues } from './transform/remap.js';
export type { RemapOptions, RemapRange } from './transform/remap.js';
export { cube } from './transform/cube.js';
export type { CubeOptions } from './transform/cube.js';
export { ifisher } from './transform/ifisher.js';
export type { IfisherOptions } from './transform/ifisher.js';

// Candles
export { ha, haValues } from './candles/ha.js';
export type { HaValues } from './candles/ha.js';
