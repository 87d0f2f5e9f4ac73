/**
 * @fileoverview Performance timing utilities for measuring indicator runs
 * Uses high-resolution timers (performance.now())
 */

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds since start, or the final duration once stopped */
  elapsed(): number;

  /** Stop the timer and return the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * Create a new performance timer.
 *
 * Durations are rounded to 0.001 ms so sub-millisecond indicator runs
 * still report something other than zero.
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const result = zigzag(high, low);
 * logger.debug('Zigzag computed', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return roundMs(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return roundMs(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}

/**
 * Measure the duration of a synchronous function
 *
 * @example
 * ```typescript
 * const { result, duration_ms } = measureSync(() => scanExtrema(high, low, 10));
 * ```
 */
export function measureSync<T>(fn: () => T): { result: T; duration_ms: number } {
  const timer = startTimer();
  const result = fn();
  const duration_ms = timer.stop();
  return { result, duration_ms };
}

function roundMs(ms: number): number {
  return Math.round(ms * 1000) / 1000;
}
