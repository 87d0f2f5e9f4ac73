/**
 * @fileoverview Bar fixture loading
 *
 * FIXTURE FORMAT:
 * {
 *   "symbol": "ES",
 *   "timeframe": "5m",
 *   "bars": [
 *     { "timestamp": 1727789400000, "open": 100, "high": 105, "low": 99, "close": 104, "volume": 15000 },
 *     ...
 *   ]
 * }
 *
 * Timestamps are epoch milliseconds and must increase strictly.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { InvalidParameterError } from '@swingta/contracts';
import type { Series } from '@swingta/contracts';

const barSchema = z.object({
  timestamp: z.number().int(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nonnegative().optional(),
});

export const fixtureSchema = z.object({
  symbol: z.string().min(1).optional(),
  timeframe: z.string().min(1).optional(),
  bars: z.array(barSchema).min(1, 'fixture must contain at least one bar'),
});

export type Bar = z.infer<typeof barSchema>;
export type BarFixture = z.infer<typeof fixtureSchema>;

/**
 * OHLC columns of a fixture, indexed by timestamp.
 */
export interface BarColumns {
  open: Series;
  high: Series;
  low: Series;
  close: Series;
}

/**
 * Validate parsed JSON as a bar fixture.
 *
 * @throws InvalidParameterError describing every schema violation
 */
export function parseFixture(raw: unknown, source: string): BarFixture {
  const result = fixtureSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new InvalidParameterError(`Invalid fixture ${source}:\n${issues.join('\n')}`, {
      parameter: 'fixture',
      value: source,
      constraint: 'bar fixture schema',
      issues,
    });
  }

  return result.data;
}

/**
 * Read and validate a fixture file.
 *
 * @param readFile - File reader, replaceable in tests
 * @throws InvalidParameterError when the file is missing, not JSON or not a fixture
 */
export function loadFixture(
  fixturePath: string,
  readFile: (path: string) => string = (path) => readFileSync(path, 'utf-8')
): BarFixture {
  let raw: unknown;
  try {
    raw = JSON.parse(readFile(fixturePath));
  } catch (error) {
    throw new InvalidParameterError(
      `Failed to read fixture ${fixturePath}: ${error instanceof Error ? error.message : String(error)}`,
      { parameter: 'fixture', value: fixturePath, constraint: 'readable JSON file' }
    );
  }

  return parseFixture(raw, fixturePath);
}

/**
 * Split fixture bars into timestamp-indexed OHLC series.
 */
export function toColumns(fixture: BarFixture): BarColumns {
  const index = fixture.bars.map((bar) => bar.timestamp);
  const column = (pick: (bar: Bar) => number): Series => ({
    index,
    values: fixture.bars.map(pick),
  });

  return {
    open: column((bar) => bar.open),
    high: column((bar) => bar.high),
    low: column((bar) => bar.low),
    close: column((bar) => bar.close),
  };
}
