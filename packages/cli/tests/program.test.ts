/**
 * End-to-end tests for the swingta command line
 */

import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '@swingta/logger';
import { buildProgram, reportCrash } from '../src/program.js';
import type { ProgramIO } from '../src/program.js';
import { scenarioFixture } from './helpers.js';

interface CapturedIO extends ProgramIO {
  output: string[];
  codes: number[];
}

function captureIO(env: NodeJS.ProcessEnv = {}): CapturedIO {
  const output: string[] = [];
  const codes: number[] = [];
  const fixture = JSON.stringify(scenarioFixture());
  return {
    output,
    codes,
    write: (text) => {
      output.push(text);
    },
    exit: (code) => {
      codes.push(code);
    },
    env,
    readFile: (path) => {
      if (path !== 'bars.json') {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return fixture;
    },
    logger: createLogger({ level: 'error', console: false }),
  };
}

function run(io: ProgramIO, ...args: string[]): void {
  const program = buildProgram(io);
  program.exitOverride();
  program.parse(['node', 'swingta', ...args]);
}

function parsed(text: string | undefined): Record<string, unknown> {
  const value: unknown = JSON.parse(text ?? 'null');
  if (typeof value !== 'object' || value === null) {
    throw new Error('expected a JSON object');
  }
  return { ...value };
}

describe('swingta zigzag', () => {
  it('should print a JSON result and exit 0', () => {
    const io = captureIO();

    run(io, 'zigzag', '--fixture', 'bars.json', '--legs', '1', '--deviation', '10');

    expect(io.codes).toEqual([0]);
    expect(io.output).toHaveLength(1);
    const result = parsed(io.output[0]);
    expect(result['success']).toBe(true);
    expect(result['command']).toBe('zigzag');
  });

  it('should print CSV when asked', () => {
    const io = captureIO();

    run(io, 'zigzag', '-f', 'bars.json', '-l', '1', '-d', '10', '--format', 'csv');

    const lines = (io.output[0] ?? '').split('\n');
    expect(lines).toHaveLength(8);
    expect(lines[0]).toBe('timestamp,ZIGZAGs_10.0%_1,ZIGZAGv_10.0%_1,ZIGZAGd_10.0%_1');
    expect(lines[1]).toBe('1000,-1,0,0');
    expect(lines[2]).toBe('2000,1,3,Infinity');
    expect(lines[4]).toBe('4000,1,5,400');
    expect(lines[7]).toBe('7000,,,');
    expect(io.codes).toEqual([0]);
  });

  it('should take defaults from the environment', () => {
    const io = captureIO({ SWINGTA_ZIGZAG_LEGS: '1', SWINGTA_ZIGZAG_DEVIATION: '10', SWINGTA_OUTPUT_FORMAT: 'csv' });

    run(io, 'zigzag', '--fixture', 'bars.json');

    expect((io.output[0] ?? '').split('\n')[0]).toBe(
      'timestamp,ZIGZAGs_10.0%_1,ZIGZAGv_10.0%_1,ZIGZAGd_10.0%_1'
    );
  });

  it('should fall back to JSON when the command fails', () => {
    const io = captureIO();

    run(io, 'zigzag', '--fixture', 'bars.json', '--format', 'csv');

    const result = parsed(io.output[0]);
    expect(result['success']).toBe(false);
    expect(result['errors']).toEqual(['zigzag needs at least 11 bars, got 7']);
    expect(io.codes).toEqual([2]);
  });

  it('should reject a non-numeric flag', () => {
    const io = captureIO();

    run(io, 'zigzag', '--fixture', 'bars.json', '--legs', 'abc');

    const result = parsed(io.output[0]);
    expect(result['success']).toBe(false);
    expect(io.codes).toEqual([2]);
    const errors = result['errors'];
    expect(Array.isArray(errors) ? errors[0] : undefined).toMatch(/^Invalid options:\n--legs: /);
  });

  it('should report an unreadable fixture', () => {
    const io = captureIO();

    run(io, 'zigzag', '--fixture', 'missing.json');

    expect(parsed(io.output[0])['errors']).toEqual([
      "Failed to read fixture missing.json: ENOENT: no such file or directory, open 'missing.json'",
    ]);
    expect(io.codes).toEqual([2]);
  });

  it('should report invalid configuration', () => {
    const logger = createLogger({ level: 'error', console: false });
    const error = vi.spyOn(logger, 'error');
    const io = { ...captureIO({ SWINGTA_LOG_LEVEL: 'loud' }), logger };

    run(io, 'zigzag', '--fixture', 'bars.json');

    expect(io.codes).toEqual([2]);
    expect(error).toHaveBeenCalledWith(
      'zigzag failed',
      expect.objectContaining({ code: 'CONFIGURATION_INVALID' })
    );
  });
});

describe('reportCrash', () => {
  it('should print a failed swingta result', () => {
    const io = captureIO();

    reportCrash(io, new Error('boom'));

    const result = parsed(io.output[0]);
    expect(result['success']).toBe(false);
    expect(result['command']).toBe('swingta');
    expect(result['errors']).toEqual(['Unexpected error: boom']);
    expect(io.codes).toEqual([]);
  });
});

describe('swingta indicator', () => {
  it('should run a named indicator', () => {
    const io = captureIO();

    run(io, 'indicator', 'sma', '--fixture', 'bars.json', '--length', '2', '--format', 'csv');

    expect((io.output[0] ?? '').split('\n').slice(0, 3)).toEqual(['timestamp,SMA_2', '1000,', '2000,1.5']);
    expect(io.codes).toEqual([0]);
  });

  it('should reject --length for a fixed indicator', () => {
    const io = captureIO();

    run(io, 'indicator', 'ha', '--fixture', 'bars.json', '--length', '3');

    expect(parsed(io.output[0])['errors']).toEqual(['ha does not take a length']);
    expect(io.codes).toEqual([2]);
  });

  it('should fail on an unknown indicator', () => {
    const io = captureIO();

    run(io, 'indicator', 'macd', '--fixture', 'bars.json');

    expect(parsed(io.output[0])['errors']).toEqual(['Unknown indicator: macd']);
    expect(io.codes).toEqual([2]);
  });
});
