/**
 * zigzag command: confirm swing highs and lows over a bar fixture
 *
 * EXAMPLE OUTPUT (JSON):
 * {
 *   "success": true,
 *   "command": "zigzag",
 *   "timestamp": "2025-01-06T12:34:56.789Z",
 *   "data": {
 *     "fixture": "fixtures/sample-bars.json",
 *     "symbol": "ES",
 *     "bars": 40,
 *     "name": "ZIGZAG_5.0%_10",
 *     "params": { "legs": 10, "deviation": 5, "offset": 0 },
 *     "swings": [
 *       { "timestamp": 1727789400000, "direction": "low", "value": 99.5, "deviation": 0 },
 *       ...
 *     ]
 *   }
 * }
 */

import type { IndicatorLogFields, Logger } from '@swingta/logger';
import { startTimer } from '@swingta/logger';
import { isSwingtaError } from '@swingta/contracts';
import type { ZigzagResult } from '@swingta/contracts';
import { requireResult } from '@swingta/series';
import { zigzag } from '@swingta/swings';
import { createResult, toJsonNumber } from '../cli-utils.js';
import type { CliResult } from '../cli-utils.js';
import { toColumns } from '../fixture.js';
import type { BarFixture } from '../fixture.js';

export interface ZigzagCommandInput {
  fixturePath: string;
  fixture: BarFixture;
  legs: number;
  deviation: number;
  offset?: number;
}

/**
 * A confirmed swing as reported by the CLI
 */
export interface SwingRow {
  timestamp: number;
  direction: 'high' | 'low';
  value: number | null;
  deviation: number | null;
}

export interface ZigzagCommandData {
  fixture: string;
  symbol?: string;
  timeframe?: string;
  bars: number;
  name: string;
  params: { legs: number; deviation: number; offset: number };
  swings: SwingRow[];
}

export interface ZigzagOutcome {
  result: CliResult<ZigzagCommandData | null>;
  frame?: ZigzagResult;
}

/**
 * Rows for every bar that carries a swing
 */
export function swingRows(frame: ZigzagResult): SwingRow[] {
  const rows: SwingRow[] = [];
  frame.swing.values.forEach((direction, row) => {
    if (direction !== 1 && direction !== -1) {
      return;
    }
    rows.push({
      timestamp: frame.index[row] ?? row,
      direction: direction === 1 ? 'high' : 'low',
      value: toJsonNumber(frame.value.values[row] ?? Number.NaN),
      deviation: toJsonNumber(frame.deviation.values[row] ?? Number.NaN),
    });
  });
  return rows;
}

/**
 * Run zigzag over a loaded fixture.
 *
 * Library errors (invalid parameters, too few bars) become a failed result;
 * anything else propagates.
 */
export function runZigzagCommand(input: ZigzagCommandInput, logger?: Logger): ZigzagOutcome {
  const { fixture, fixturePath, legs, deviation } = input;
  const offset = input.offset ?? 0;
  const bars = fixture.bars.length;

  try {
    const timer = startTimer();
    const columns = toColumns(fixture);
    const frame = requireResult(
      zigzag(columns.high, columns.low, columns.close, { legs, deviation, offset, logger }),
      'zigzag',
      legs + 1,
      bars
    );
    const swings = swingRows(frame);

    const fields: IndicatorLogFields = {
      component: 'cli',
      indicator: 'zigzag',
      symbol: fixture.symbol,
      length: legs,
      bars,
      swings: swings.length,
      duration_ms: timer.stop(),
    };
    logger?.info('Zigzag command completed', fields);

    const data: ZigzagCommandData = {
      fixture: fixturePath,
      symbol: fixture.symbol,
      timeframe: fixture.timeframe,
      bars,
      name: frame.name,
      params: { legs, deviation, offset },
      swings,
    };
    const warnings = swings.length === 0 ? ['No swings confirmed'] : undefined;

    return { result: createResult('zigzag', true, data, { warnings }), frame };
  } catch (error) {
    if (!isSwingtaError(error)) {
      throw error;
    }
    logger?.error('Zigzag command failed', { code: error.code, error: error.message, data: error.data });
    return {
      result: createResult('zigzag', false, null, { errors: [error.message] }),
    };
  }
}
