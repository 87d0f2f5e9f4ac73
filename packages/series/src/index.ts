/**
 * @fileoverview Public API exports for @swingta/series
 * Series coercion, parameter validation and output post-processing
 */

// Validation
export {
  isSeries,
  seriesLength,
  vSeries,
  vSameLength,
  vPosDefault,
  vPosIntDefault,
  vInt,
  vFloat,
  vOffset,
  vBool,
  requireResult,
} from './validate.js';

// Shifting and filling
export {
  shift,
  fillNa,
  fillForward,
  fillBackward,
  fillWith,
  postProcess,
} from './transform.js';

// Windows
export { rolling, mean } from './rolling.js';

// Naming
export { formatFloat, toIndicatorSeries } from './naming.js';
