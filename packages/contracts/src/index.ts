/**
 * @fileoverview Main entry point for @swingta/contracts package.
 *
 * Exports shared types, the error taxonomy and the indicator category table.
 *
 * @module @swingta/contracts
 */

// Series and indicator outputs
export type {
  Series,
  SeriesInput,
  IndicatorSeries,
  IndicatorFrame,
  FillMethod,
  PostProcessOptions,
} from './series.js';

// Swing detection types
export type {
  SwingDirection,
  Extremum,
  Swing,
  ZigzagConfig,
  ZigzagParams,
  ZigzagResult,
} from './swings.js';

export { SWING_HIGH, SWING_LOW, DEFAULT_ZIGZAG_CONFIG } from './swings.js';

// Categories
export type { IndicatorCategory } from './categories.js';

export {
  INDICATOR_CATEGORIES,
  categoryOf,
  indicatorsIn,
  isIndicatorCategory,
} from './categories.js';

// Error classes and guards
export {
  SwingtaError,
  InvalidParameterError,
  InsufficientDataError,
  ConfigurationError,
  isSwingtaError,
  isInvalidParameterError,
  isInsufficientDataError,
  isConfigurationError,
} from './errors.js';
