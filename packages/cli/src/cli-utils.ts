/**
 * Shared CLI utilities for @swingta/cli
 *
 * - Standard result envelope for every command
 * - Unified JSON/pretty output
 *
 * Design Philosophy:
 * - Commands output JSON by default (machine-readable)
 * - --pretty enables human-readable output
 * - Exit codes: 0 = success, 1 = crash, 2 = error
 */

/**
 * Standard result object structure returned by all commands
 */
export interface CliResult<T = unknown> {
  success: boolean;        // Overall operation success status
  command: string;         // Name of the command that ran
  timestamp: string;       // ISO 8601 timestamp of execution
  data: T;                 // Command-specific data
  warnings?: string[];     // Non-fatal warnings
  errors?: string[];       // Fatal errors
}

export const EXIT_SUCCESS = 0;
export const EXIT_ERROR = 2;
export const EXIT_CRASH = 1;

/**
 * Create a standard result object
 *
 * @example
 * const result = createResult('zigzag', true, { swings: [] }, {
 *   warnings: ['No swings confirmed'],
 * });
 */
export function createResult<T>(
  command: string,
  success: boolean,
  data: T,
  options: {
    warnings?: string[];
    errors?: string[];
  } = {}
): CliResult<T> {
  return {
    success,
    command,
    timestamp: new Date().toISOString(),
    data,
    warnings: options.warnings,
    errors: options.errors,
  };
}

/**
 * Render a result as single-line JSON or as a multi-line report
 */
export function formatResult(result: CliResult, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(result);
  }

  const lines = [
    '='.repeat(60),
    `Command: ${result.command}`,
    `Status: ${result.success ? 'SUCCESS' : 'FAILED'}`,
    `Timestamp: ${result.timestamp}`,
    '='.repeat(60),
    '',
    'Data:',
    JSON.stringify(result.data, null, 2),
  ];

  if (result.warnings && result.warnings.length > 0) {
    lines.push('', 'Warnings:', ...result.warnings.map((w) => `  - ${w}`));
  }

  if (result.errors && result.errors.length > 0) {
    lines.push('', 'Errors:', ...result.errors.map((e) => `  - ${e}`));
  }

  return lines.join('\n');
}

/**
 * Exit code for a finished command
 */
export function exitCodeFor(result: CliResult): number {
  return result.success ? EXIT_SUCCESS : EXIT_ERROR;
}

/**
 * Replace values JSON cannot carry (NaN, ±Infinity) with null
 */
export function toJsonNumber(value: number): number | null {
  return Number.isFinite(value) ? value : null;
}
