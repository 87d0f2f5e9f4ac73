/**
 * Result envelope and CSV formatter tests
 */

import { describe, it, expect } from 'vitest';
import type { IndicatorFrame } from '@swingta/contracts';
import { createResult, formatResult, exitCodeFor, toJsonNumber } from '../src/cli-utils.js';
import { formatFrameCsv } from '../src/formatters/csv.js';

describe('createResult', () => {
  it('should build the standard envelope', () => {
    const result = createResult('zigzag', true, { swings: [] }, { warnings: ['No swings confirmed'] });

    expect(result.success).toBe(true);
    expect(result.command).toBe('zigzag');
    expect(result.data).toEqual({ swings: [] });
    expect(result.warnings).toEqual(['No swings confirmed']);
    expect(result.errors).toBeUndefined();
    expect(Number.isNaN(Date.parse(result.timestamp))).toBe(false);
  });
});

describe('formatResult', () => {
  const result = {
    success: false,
    command: 'indicator',
    timestamp: '2025-01-06T00:00:00.000Z',
    data: null,
    errors: ['Unknown indicator: macd'],
  };

  it('should print single-line JSON by default', () => {
    expect(formatResult(result, false)).toBe(JSON.stringify(result));
  });

  it('should print a report when pretty', () => {
    const lines = formatResult(result, true).split('\n');

    expect(lines[1]).toBe('Command: indicator');
    expect(lines[2]).toBe('Status: FAILED');
    expect(lines.slice(-2)).toEqual(['Errors:', '  - Unknown indicator: macd']);
  });
});

describe('exitCodeFor', () => {
  it('should map success to 0 and failure to 2', () => {
    expect(exitCodeFor(createResult('zigzag', true, null))).toBe(0);
    expect(exitCodeFor(createResult('zigzag', false, null))).toBe(2);
  });
});

describe('toJsonNumber', () => {
  it('should keep finite numbers and null the rest', () => {
    expect(toJsonNumber(1.5)).toBe(1.5);
    expect(toJsonNumber(NaN)).toBeNull();
    expect(toJsonNumber(Infinity)).toBeNull();
  });
});

describe('formatFrameCsv', () => {
  it('should write a header and one row per bar', () => {
    const frame: IndicatorFrame = {
      name: 'TEST',
      category: 'trend',
      index: [1000, 2000, 3000],
      columns: [
        { name: 'A', category: 'trend', index: [1000, 2000, 3000], values: [1, NaN, -2.5] },
        { name: 'B,C', category: 'trend', index: [1000, 2000, 3000], values: [Infinity, 0, NaN] },
      ],
    };

    expect(formatFrameCsv(frame)).toBe(
      ['timestamp,A,"B,C"', '1000,1,Infinity', '2000,,0', '3000,-2.5,'].join('\n')
    );
  });
});
