/**
 * Output formatters for CLI commands
 *
 * @module @swingta/cli/formatters
 */

export { formatFrameCsv } from './csv.js';
