/**
 * @fileoverview Main logger factory for swingta
 * Creates configured Winston logger instances with structured fields and
 * console/file transports.
 */

import winston, { format } from 'winston';
import type { LoggerConfig, Logger } from './types.js';
import { standardFields, prettyPrint } from './formats.js';

/**
 * Creates a configured logger instance.
 *
 * - Structured logging with standard fields (timestamp, level, message)
 * - Console and optional file transport
 * - JSON in production, pretty-print otherwise
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', json: false });
 *
 * const zzLogger = logger.child({ component: 'swings', indicator: 'zigzag' });
 * zzLogger.debug('Swings reduced', { extrema: 42, swings: 7, duration_ms: 1 });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const {
    level,
    json = process.env['NODE_ENV'] === 'production',
    filePath,
    console: enableConsole = true,
  } = config;

  const logFormat = format.combine(standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (enableConsole) {
    transports.push(
      new winston.transports.Console({
        level,
        format: logFormat,
        // Keep stdout free for command output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    // File output is always JSON lines
    transports.push(
      new winston.transports.File({
        filename: filePath,
        level,
        format: format.combine(standardFields, format.json()),
      })
    );
  }

  // A logger with no transport still needs a sink, otherwise winston warns on every write
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ level, silent: true }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Uncaught errors are handled in errorHandler.ts
    exitOnError: false,
  });
}

/**
 * Creates a child logger whose entries always include `context`.
 *
 * @example
 * ```typescript
 * const cliLogger = createChildLogger(logger, { component: 'cli', command: 'zigzag' });
 * cliLogger.info('Fixture loaded', { bars: 500 });
 * ```
 */
export function createChildLogger(logger: Logger, context: Record<string, unknown>): Logger {
  return logger.child(context);
}
