/**
 * @fileoverview Crash handling for the swingta CLI
 *
 * An uncaught exception or unhandled rejection is logged, handed to an
 * optional reporter (the CLI prints a failed result there) and recorded as
 * the process exit code. The process then exits on its own once the event
 * loop drains, which lets file transports flush.
 */

import type { Logger } from './types.js';

export type CrashEvent = 'uncaughtException' | 'unhandledRejection';

export interface CrashHandlerOptions {
  /** Called after the crash is logged */
  report?: (error: Error, event: CrashEvent) => void;
  /** Exit code recorded on a crash (default 1) */
  exitCode?: number;
}

let detachCurrent: (() => void) | undefined;

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

/**
 * Install crash handlers on the process, replacing any installed earlier.
 *
 * @returns A function that removes the handlers again
 *
 * @example
 * ```typescript
 * attachGlobalHandlers(logger, {
 *   report: (error) => process.stdout.write(`${error.message}\n`),
 * });
 * ```
 */
export function attachGlobalHandlers(logger: Logger, options: CrashHandlerOptions = {}): () => void {
  detachCurrent?.();

  const { report, exitCode = 1 } = options;

  const crash = (event: CrashEvent) => (reason: unknown) => {
    const error = toError(reason);
    logger.error('swingta crashed', {
      event,
      error: { name: error.name, message: error.message, stack: error.stack },
    });
    report?.(error, event);
    process.exitCode = exitCode;
  };

  const onException = crash('uncaughtException');
  const onRejection = crash('unhandledRejection');

  process.on('uncaughtException', onException);
  process.on('unhandledRejection', onRejection);

  const detach = () => {
    process.off('uncaughtException', onException);
    process.off('unhandledRejection', onRejection);
    if (detachCurrent === detach) {
      detachCurrent = undefined;
    }
  };
  detachCurrent = detach;
  return detach;
}
