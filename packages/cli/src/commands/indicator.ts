/**
 * indicator command: run one companion indicator over a bar fixture
 */

import type { IndicatorLogFields, Logger } from '@swingta/logger';
import { isSwingtaError, categoryOf, InsufficientDataError, InvalidParameterError } from '@swingta/contracts';
import type { IndicatorFrame, IndicatorSeries } from '@swingta/contracts';
import {
  sma,
  ssf,
  dpo,
  logReturn,
  percentReturn,
  skew,
  kurtosis,
  remap,
  cube,
  ifisher,
  ha,
} from '@swingta/indicators';
import { createResult, toJsonNumber } from '../cli-utils.js';
import type { CliResult } from '../cli-utils.js';
import { toColumns } from '../fixture.js';
import type { BarColumns, BarFixture } from '../fixture.js';

export interface IndicatorParams {
  length?: number;
  offset?: number;
}

export interface IndicatorRunner {
  /** Whether `--length` means anything to this indicator */
  takesLength: boolean;
  run(bars: BarColumns, params: IndicatorParams): IndicatorFrame | undefined;
}

function windowed(run: IndicatorRunner['run']): IndicatorRunner {
  return { takesLength: true, run };
}

function fixed(run: IndicatorRunner['run']): IndicatorRunner {
  return { takesLength: false, run };
}

function asFrame(series: IndicatorSeries | undefined): IndicatorFrame | undefined {
  if (series === undefined) {
    return undefined;
  }
  return { name: series.name, category: series.category, index: series.index, columns: [series] };
}

/**
 * Indicators reachable from the command line, keyed by registry name
 */
export const INDICATOR_RUNNERS: ReadonlyMap<string, IndicatorRunner> = new Map<string, IndicatorRunner>([
  ['sma', windowed((b, p) => asFrame(sma(b.close, p)))],
  ['ssf', windowed((b, p) => asFrame(ssf(b.close, p)))],
  ['dpo', windowed((b, p) => asFrame(dpo(b.close, p)))],
  ['log_return', windowed((b, p) => asFrame(logReturn(b.close, p)))],
  ['percent_return', windowed((b, p) => asFrame(percentReturn(b.close, p)))],
  ['skew', windowed((b, p) => asFrame(skew(b.close, p)))],
  ['kurtosis', windowed((b, p) => asFrame(kurtosis(b.close, p)))],
  ['remap', fixed((b, p) => asFrame(remap(b.close, { offset: p.offset })))],
  ['cube', fixed((b, p) => cube(b.close, { offset: p.offset }))],
  ['ifisher', fixed((b, p) => ifisher(b.close, { offset: p.offset }))],
  ['ha', fixed((b, p) => ha(b.open, b.high, b.low, b.close, { offset: p.offset }))],
]);

export interface IndicatorCommandInput extends IndicatorParams {
  indicator: string;
  fixturePath: string;
  fixture: BarFixture;
}

export interface IndicatorCommandData {
  fixture: string;
  symbol?: string;
  indicator: string;
  category?: string;
  name: string;
  bars: number;
  columns: Record<string, (number | null)[]>;
}

export interface IndicatorOutcome {
  result: CliResult<IndicatorCommandData | null>;
  frame?: IndicatorFrame;
}

/**
 * Run a named indicator over a loaded fixture.
 *
 * Unknown names, invalid parameters and too-short fixtures become a failed
 * result; anything else propagates.
 */
export function runIndicatorCommand(input: IndicatorCommandInput, logger?: Logger): IndicatorOutcome {
  const { fixture, fixturePath } = input;
  const indicator = input.indicator.toLowerCase();
  const bars = fixture.bars.length;

  try {
    const runner = INDICATOR_RUNNERS.get(indicator);
    if (runner === undefined) {
      throw new InvalidParameterError(`Unknown indicator: ${input.indicator}`, {
        parameter: 'indicator',
        value: input.indicator,
        constraint: `one of ${[...INDICATOR_RUNNERS.keys()].join(', ')}`,
      });
    }

    if (input.length !== undefined && !runner.takesLength) {
      throw new InvalidParameterError(`${indicator} does not take a length`, {
        parameter: 'length',
        value: input.length,
        constraint: 'omit for this indicator',
      });
    }

    const frame = runner.run(toColumns(fixture), { length: input.length, offset: input.offset });
    if (frame === undefined) {
      throw new InsufficientDataError(`${indicator} produced no result for ${bars} bars`, {
        indicator,
        required: input.length ?? 1,
        received: bars,
      });
    }

    const fields: IndicatorLogFields = { component: 'cli', indicator, symbol: fixture.symbol, length: input.length, bars };
    logger?.info('Indicator command completed', fields);

    const data: IndicatorCommandData = {
      fixture: fixturePath,
      symbol: fixture.symbol,
      indicator,
      category: categoryOf(indicator),
      name: frame.name,
      bars,
      columns: Object.fromEntries(frame.columns.map((c) => [c.name, c.values.map(toJsonNumber)])),
    };

    return { result: createResult('indicator', true, data), frame };
  } catch (error) {
    if (!isSwingtaError(error)) {
      throw error;
    }
    logger?.error('Indicator command failed', { indicator, code: error.code, error: error.message });
    return { result: createResult('indicator', false, null, { errors: [error.message] }) };
  }
}
