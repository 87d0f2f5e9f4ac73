/**
 * @fileoverview Custom Winston formats for the swingta logger
 */

import { format } from 'winston';

/**
 * Timestamp and error serialization shared by every output format.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true })
);

/**
 * Fields printed first, in this order, by the pretty format.
 */
const LEADING_FIELDS = ['component', 'indicator', 'symbol', 'length'] as const;

const INTERNAL_FIELDS = new Set(['level', 'message', 'timestamp', 'stack', 'splat']);

/**
 * Human-readable output for development.
 *
 * @example
 * ```
 * [2026-01-05T10:00:00.000+00:00] debug: Zigzag computed component=swings indicator=zigzag swings=7
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const { timestamp, level, message } = info;

    const context: string[] = [];
    for (const key of LEADING_FIELDS) {
      const value = info[key];
      if (value !== undefined) context.push(`${key}=${String(value)}`);
    }

    for (const [key, value] of Object.entries(info)) {
      if (INTERNAL_FIELDS.has(key) || LEADING_FIELDS.some((field) => field === key)) {
        continue;
      }
      context.push(`${key}=${JSON.stringify(value)}`);
    }

    const contextStr = context.length > 0 ? ` ${context.join(' ')}` : '';
    const baseMsg = `[${String(timestamp)}] ${level}: ${String(message)}${contextStr}`;

    const stack = info['stack'];
    if (typeof stack === 'string') {
      return `${baseMsg}\n${stack}`;
    }

    return baseMsg;
  })
);
