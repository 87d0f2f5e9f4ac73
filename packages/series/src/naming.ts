/**
 * @fileoverview Column naming and output wrapping.
 *
 * @module @swingta/series/naming
 */

import type { IndicatorCategory, IndicatorSeries } from '@swingta/contracts';

/**
 * Render a float parameter for a column name. Whole numbers keep one
 * decimal place so `5` and `5.0` name the same column.
 *
 * @example
 * ```typescript
 * formatFloat(5);    // "5.0"
 * formatFloat(2.5);  // "2.5"
 * ```
 */
export function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

export function toIndicatorSeries(
  index: readonly number[],
  values: readonly number[],
  name: string,
  category: IndicatorCategory
): IndicatorSeries {
  return { name, category, index, values };
}
