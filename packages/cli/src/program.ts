/**
 * swingta command line
 *
 * USAGE:
 *   swingta zigzag --fixture <path> [--legs n] [--deviation pct] [--offset k] [--format json|csv] [--pretty]
 *   swingta indicator <name> --fixture <path> [--length n] [--offset k] [--format json|csv] [--pretty]
 *
 * Defaults for legs, deviation and output come from SWINGTA_* environment
 * variables (see config.ts); flags override them.
 *
 * EXIT CODES:
 *   0 - Command completed successfully
 *   1 - Unexpected crash (reported by reportCrash)
 *   2 - Fatal error (bad flags, unreadable fixture, invalid parameters, too few bars)
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { z } from 'zod';
import { ConfigurationError, isSwingtaError } from '@swingta/contracts';
import type { IndicatorFrame } from '@swingta/contracts';
import { createLogger } from '@swingta/logger';
import type { Logger } from '@swingta/logger';
import { loadConfig } from './config.js';
import type { Config } from './config.js';
import { loadFixture } from './fixture.js';
import { createResult, exitCodeFor, formatResult, EXIT_ERROR } from './cli-utils.js';
import type { CliResult } from './cli-utils.js';
import { formatFrameCsv } from './formatters/index.js';
import { runZigzagCommand } from './commands/zigzag.js';
import { runIndicatorCommand } from './commands/indicator.js';

export const VERSION = '0.1.0';

/**
 * Process hooks the program runs against, replaceable in tests
 */
export interface ProgramIO {
  /** Write one block of command output (stdout) */
  write(text: string): void;
  /** Report the exit code once a command finishes */
  exit(code: number): void;
  env: NodeJS.ProcessEnv;
  readFile(path: string): string;
  /** Use this logger instead of one built from configuration */
  logger?: Logger;
}

export function defaultIO(): ProgramIO {
  return {
    write: (text) => {
      process.stdout.write(`${text}\n`);
    },
    exit: (code) => {
      process.exitCode = code;
    },
    env: process.env,
    readFile: (path) => readFileSync(path, 'utf-8'),
  };
}

const outputFlags = {
  fixture: z.string().min(1),
  format: z.enum(['json', 'csv']).optional(),
  pretty: z.boolean().optional(),
  offset: z.coerce.number().optional(),
};

const zigzagFlagsSchema = z.object({
  ...outputFlags,
  legs: z.coerce.number().optional(),
  deviation: z.coerce.number().optional(),
});

const indicatorFlagsSchema = z.object({
  ...outputFlags,
  length: z.coerce.number().optional(),
});

/**
 * Validate commander's option bag
 *
 * @throws ConfigurationError listing every bad flag
 */
function parseFlags<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `--${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid options:\n${issues.join('\n')}`, { issues });
  }
  return result.data;
}

function buildLogger(io: ProgramIO, config: Config): Logger {
  return (
    io.logger ??
    createLogger({
      level: config.logging.level,
      json: config.logging.format === 'json',
      filePath: config.logging.filePath,
    })
  );
}

interface Emission {
  result: CliResult;
  frame?: IndicatorFrame;
}

function emit(io: ProgramIO, { result, frame }: Emission, format: 'json' | 'csv', pretty: boolean): void {
  if (format === 'csv' && result.success && frame !== undefined) {
    io.write(formatFrameCsv(frame));
  } else {
    io.write(formatResult(result, pretty));
  }
  io.exit(exitCodeFor(result));
}

/**
 * Run an action, turning swingta errors raised outside the command itself
 * (configuration, flags, fixture loading) into a failed result.
 */
function guard(io: ProgramIO, command: string, action: () => void): void {
  try {
    action();
  } catch (error) {
    if (!isSwingtaError(error)) {
      throw error;
    }
    io.logger?.error(`${command} failed`, { code: error.code, error: error.message });
    io.write(formatResult(createResult(command, false, null, { errors: [error.message] }), false));
    io.exit(EXIT_ERROR);
  }
}

/**
 * Print a failed result for an error that escaped every command. Wired to
 * the logger's crash handlers by the bin entry.
 */
export function reportCrash(io: ProgramIO, error: Error): void {
  io.write(formatResult(createResult('swingta', false, null, { errors: [`Unexpected error: ${error.message}`] }), false));
}

/**
 * Build the swingta program
 *
 * @example
 * buildProgram().parse(process.argv);
 */
export function buildProgram(io: ProgramIO = defaultIO()): Command {
  const program = new Command();

  program
    .name('swingta')
    .description('Zigzag swing detection and companion indicators over OHLC bar fixtures')
    .version(VERSION);

  program
    .command('zigzag')
    .description('Confirm swing highs and lows that reverse by at least a percentage')
    .requiredOption('-f, --fixture <path>', 'Path to a bar fixture (JSON)')
    .option('-l, --legs <n>', 'Scan window size (default: SWINGTA_ZIGZAG_LEGS or 10)')
    .option('-d, --deviation <pct>', 'Minimum reversal in percent (default: SWINGTA_ZIGZAG_DEVIATION or 5)')
    .option('-o, --offset <k>', 'Shift output forward by k bars', '0')
    .option('--format <format>', 'Output format: json or csv')
    .option('--pretty', 'Human-readable JSON output')
    .action((rawFlags: unknown) => {
      guard(io, 'zigzag', () => {
        const flags = parseFlags(zigzagFlagsSchema, rawFlags);
        const config = loadConfig(io.env);
        const logger = buildLogger(io, config);
        const fixture = loadFixture(flags.fixture, io.readFile);

        const outcome = runZigzagCommand(
          {
            fixturePath: flags.fixture,
            fixture,
            legs: flags.legs ?? config.zigzag.legs,
            deviation: flags.deviation ?? config.zigzag.deviation,
            offset: flags.offset,
          },
          logger
        );

        emit(io, outcome, flags.format ?? config.output.format, flags.pretty ?? config.output.pretty);
      });
    });

  program
    .command('indicator')
    .description('Run one companion indicator (sma, ssf, dpo, log_return, percent_return, skew, kurtosis, remap, cube, ifisher, ha)')
    .argument('<name>', 'Indicator name')
    .requiredOption('-f, --fixture <path>', 'Path to a bar fixture (JSON)')
    .option('-n, --length <n>', 'Window length, where the indicator takes one')
    .option('-o, --offset <k>', 'Shift output forward by k bars', '0')
    .option('--format <format>', 'Output format: json or csv')
    .option('--pretty', 'Human-readable JSON output')
    .action((name: string, rawFlags: unknown) => {
      guard(io, 'indicator', () => {
        const flags = parseFlags(indicatorFlagsSchema, rawFlags);
        const config = loadConfig(io.env);
        const logger = buildLogger(io, config);
        const fixture = loadFixture(flags.fixture, io.readFile);

        const outcome = runIndicatorCommand(
          {
            indicator: name,
            fixturePath: flags.fixture,
            fixture,
            length: flags.length,
            offset: flags.offset,
          },
          logger
        );

        emit(io, outcome, flags.format ?? config.output.format, flags.pretty ?? config.output.pretty);
      });
    });

  return program;
}
