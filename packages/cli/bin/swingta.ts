#!/usr/bin/env -S node --import tsx
/**
 * swingta - zigzag swings and companion indicators from the command line
 *
 * See src/program.ts for usage and exit codes.
 */

// Load SWINGTA_* settings from a .env file, if present
import 'dotenv/config';

import { attachGlobalHandlers, createLogger } from '@swingta/logger';
import { buildProgram, defaultIO, reportCrash } from '../src/program.js';
import { EXIT_CRASH } from '../src/cli-utils.js';

const io = defaultIO();

attachGlobalHandlers(createLogger({ level: 'error' }), {
  exitCode: EXIT_CRASH,
  report: (error) => reportCrash(io, error),
});

buildProgram(io).parse(process.argv);
