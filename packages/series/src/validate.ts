/**
 * @fileoverview Series coercion and parameter validation.
 *
 * Absent parameters fall back to their defaults. Explicitly supplied values
 * outside their domain raise InvalidParameterError. A series shorter than
 * the required length is not an error: vSeries returns `undefined`.
 *
 * @module @swingta/series/validate
 */

import { InsufficientDataError, InvalidParameterError } from '@swingta/contracts';
import type { Series, SeriesInput } from '@swingta/contracts';

/**
 * Distinguish an indexed series from a plain array. Arrays carry a
 * `values()` method, so only `index` is conclusive.
 */
export function isSeries(input: SeriesInput): input is Series {
  return 'index' in input;
}

/**
 * Row count of any series input.
 */
export function seriesLength(input: SeriesInput): number {
  return isSeries(input) ? input.values.length : input.length;
}

/**
 * Coerce input into an owned, index-aligned series.
 *
 * Plain arrays are placed on the index `0..n-1` and `null` entries become
 * `NaN`. The returned arrays are copies; callers may not mutate the input
 * through them.
 *
 * @param input - Array of numbers or an indexed series
 * @param minLength - Minimum number of rows required
 * @param name - Parameter name used in error messages
 * @returns The coerced series, or `undefined` when absent or shorter than `minLength`
 * @throws InvalidParameterError if an indexed series has mismatched lengths or an unordered index
 *
 * @example
 * ```typescript
 * vSeries([1, null, 3]);      // { index: [0, 1, 2], values: [1, NaN, 3] }
 * vSeries([1, 2, 3], 5);      // undefined
 * ```
 */
export function vSeries(
  input: SeriesInput | undefined,
  minLength = 0,
  name = 'series'
): Series | undefined {
  if (input === undefined) {
    return undefined;
  }

  let series: Series;
  if (isSeries(input)) {
    if (input.index.length !== input.values.length) {
      throw new InvalidParameterError(`${name} index and values differ in length`, {
        parameter: name,
        value: { index: input.index.length, values: input.values.length },
        constraint: 'index.length === values.length',
      });
    }
    for (let i = 1; i < input.index.length; i++) {
      const prev = input.index[i - 1];
      const curr = input.index[i];
      if (prev === undefined || curr === undefined || !(curr > prev)) {
        throw new InvalidParameterError(`${name} index must be strictly increasing`, {
          parameter: name,
          value: { position: i, previous: prev, current: curr },
          constraint: 'index[i] > index[i - 1]',
        });
      }
    }
    series = { index: [...input.index], values: input.values.map(toNumber) };
  } else {
    series = {
      index: input.map((_, i) => i),
      values: input.map(toNumber),
    };
  }

  if (series.values.length < minLength) {
    return undefined;
  }

  return series;
}

function toNumber(value: number | null): number {
  return value === null ? Number.NaN : value;
}

/**
 * Require several series to share one length.
 *
 * @throws InvalidParameterError naming the first series that differs
 */
export function vSameLength(reference: Series, others: Record<string, Series | undefined>): void {
  for (const [name, other] of Object.entries(others)) {
    if (other !== undefined && other.values.length !== reference.values.length) {
      throw new InvalidParameterError(`${name} must have the same length as the reference series`, {
        parameter: name,
        value: other.values.length,
        constraint: `length === ${reference.values.length}`,
      });
    }
  }
}

/**
 * Positive number with a default.
 *
 * @throws InvalidParameterError for zero, negative or non-finite values
 */
export function vPosDefault(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidParameterError(`${name} must be a positive number`, {
      parameter: name,
      value,
      constraint: '> 0',
    });
  }
  return value;
}

/**
 * Positive integer with a default (window lengths).
 *
 * @throws InvalidParameterError for non-integers and values below 1
 */
export function vPosIntDefault(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(`${name} must be a positive integer`, {
      parameter: name,
      value,
      constraint: 'integer > 0',
    });
  }
  return value;
}

/**
 * Integer of either sign with a default.
 */
export function vInt(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isInteger(value)) {
    throw new InvalidParameterError(`${name} must be an integer`, {
      parameter: name,
      value,
      constraint: 'integer',
    });
  }
  return value;
}

/**
 * Finite number with a default.
 */
export function vFloat(value: number | undefined, fallback: number, name: string): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isFinite(value)) {
    throw new InvalidParameterError(`${name} must be a finite number`, {
      parameter: name,
      value,
      constraint: 'finite',
    });
  }
  return value;
}

/**
 * Output offset. Results may only move forward in time, never backward,
 * so negative offsets are rejected.
 *
 * @throws InvalidParameterError for negative or non-integer offsets
 */
export function vOffset(value: number | undefined): number {
  if (value === undefined) {
    return 0;
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidParameterError('offset must be a non-negative integer', {
      parameter: 'offset',
      value,
      constraint: 'integer >= 0',
    });
  }
  return value;
}

export function vBool(value: boolean | undefined, fallback: boolean): boolean {
  return value ?? fallback;
}

/**
 * Turn an `undefined` indicator result into a hard failure, for callers
 * that cannot continue without one.
 *
 * @throws InsufficientDataError when `result` is undefined
 *
 * @example
 * ```typescript
 * const zz = requireResult(zigzag(high, low), 'zigzag', 11, high.length);
 * ```
 */
export function requireResult<T>(
  result: T | undefined,
  indicator: string,
  required: number,
  received: number
): T {
  if (result === undefined) {
    throw new InsufficientDataError(`${indicator} needs at least ${required} bars, got ${received}`, {
      indicator,
      required,
      received,
    });
  }
  return result;
}
