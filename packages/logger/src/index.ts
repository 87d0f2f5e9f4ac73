/**
 * @fileoverview Public API exports for @swingta/logger
 * Structured logging and process error handling for swingta
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Crash handling
export { attachGlobalHandlers } from './errorHandler.js';
export type { CrashEvent, CrashHandlerOptions } from './errorHandler.js';

// Performance timing utilities
export { startTimer, measureSync } from './perf-timer.js';

// Formats
export { standardFields, prettyPrint } from './formats.js';

export { LOG_LEVELS } from './types.js';

// Type exports
export type { Logger, LoggerConfig, LogLevel, IndicatorLogFields } from './types.js';
export type { PerfTimer } from './perf-timer.js';
