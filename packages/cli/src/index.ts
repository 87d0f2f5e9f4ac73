/**
 * @swingta/cli
 *
 * Command line front end: fixture loading, configuration and the zigzag
 * and indicator commands.
 *
 * @packageDocumentation
 */

export { buildProgram, defaultIO, reportCrash, VERSION } from './program.js';
export type { ProgramIO } from './program.js';

export { loadConfig, configSchema, envMapping } from './config.js';
export type { Config } from './config.js';

export { loadFixture, parseFixture, fixtureSchema, toColumns } from './fixture.js';
export type { Bar, BarFixture, BarColumns } from './fixture.js';

export { createResult, formatResult, exitCodeFor, toJsonNumber, EXIT_SUCCESS, EXIT_ERROR, EXIT_CRASH } from './cli-utils.js';
export type { CliResult } from './cli-utils.js';

export { formatFrameCsv } from './formatters/index.js';

export { runZigzagCommand, swingRows } from './commands/zigzag.js';
export type { ZigzagCommandInput, ZigzagCommandData, ZigzagOutcome, SwingRow } from './commands/zigzag.js';
export { runIndicatorCommand, INDICATOR_RUNNERS } from './commands/indicator.js';
export type {
  IndicatorCommandInput,
  IndicatorCommandData,
  IndicatorOutcome,
  IndicatorParams,
  IndicatorRunner,
} from './commands/indicator.js';
