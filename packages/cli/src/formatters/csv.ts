/**
 * CSV output formatter for indicator frames
 *
 * One row per bar: the bar timestamp followed by every column in frame
 * order. Missing values are empty fields; infinite values are written as
 * `Infinity` / `-Infinity`.
 *
 * @module @swingta/cli/formatters/csv
 */

import type { IndicatorFrame } from '@swingta/contracts';

/**
 * Format a frame as CSV with a header row
 *
 * @example
 * formatFrameCsv(zigzag(high, low));
 * // timestamp,ZIGZAGs_5.0%_10,ZIGZAGv_5.0%_10,ZIGZAGd_5.0%_10
 * // 1727789400000,,,
 * // 1727789700000,-1,99.5,0
 */
export function formatFrameCsv(frame: IndicatorFrame): string {
  const header = ['timestamp', ...frame.columns.map((c) => escapeCsvField(c.name))].join(',');

  const rows = frame.index.map((timestamp, row) =>
    [String(timestamp), ...frame.columns.map((c) => formatCell(c.values[row]))].join(',')
  );

  return [header, ...rows].join('\n');
}

function formatCell(value: number | undefined): string {
  if (value === undefined || Number.isNaN(value)) {
    return '';
  }
  return String(value);
}

/**
 * Escape CSV field (handle commas, quotes, newlines)
 */
function escapeCsvField(field: string): string {
  if (field.includes(',') || field.includes('"') || field.includes('\n')) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}
