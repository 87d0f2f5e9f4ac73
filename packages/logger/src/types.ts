/**
 * @fileoverview Type definitions for the swingta logger
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Severities a logger accepts, most severe first.
 */
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Configuration options for creating a logger instance.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/swingta.log'
 * };
 * ```
 */
export interface LoggerConfig {
  level: LogLevel;

  /**
   * Output JSON lines instead of pretty-printed text.
   * @default true in production, false otherwise
   */
  json?: boolean;

  /**
   * Optional file path; the file transport always writes JSON lines.
   */
  filePath?: string;

  /**
   * Write to the console (stderr).
   * @default true
   */
  console?: boolean;
}

/**
 * Fields commonly attached to indicator log entries.
 */
export interface IndicatorLogFields {
  /** Component or package (e.g., 'swings', 'cli') */
  component?: string;
  /** Indicator name (e.g., 'zigzag', 'dpo') */
  indicator?: string;
  /** Trading symbol from the input fixture */
  symbol?: string;
  /** Primary window length */
  length?: number;
  /** Number of input bars */
  bars?: number;
  /** Operation duration in milliseconds */
  duration_ms?: number;
  [key: string]: unknown;
}

/**
 * Re-export of Winston's Logger type.
 */
export type Logger = WinstonLogger;
