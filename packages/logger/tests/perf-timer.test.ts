/**
 * @fileoverview Tests for performance timing utilities
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { startTimer, measureSync } from '../src/perf-timer.js';

describe('Performance Timers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('startTimer', () => {
    it('should report elapsed time from performance.now()', () => {
      const now = vi.spyOn(performance, 'now');
      now.mockReturnValueOnce(100);
      const timer = startTimer();

      now.mockReturnValueOnce(112.5);
      expect(timer.elapsed()).toBe(12.5);
      expect(timer.startTime).toBe(100);
    });

    it('should freeze the duration once stopped', () => {
      const now = vi.spyOn(performance, 'now');
      now.mockReturnValueOnce(10);
      const timer = startTimer();

      now.mockReturnValueOnce(15);
      expect(timer.stop()).toBe(5);
      expect(timer.isRunning()).toBe(false);

      now.mockReturnValue(99);
      expect(timer.elapsed()).toBe(5);
      expect(timer.stop()).toBe(5);
    });

    it('should round to microseconds', () => {
      const now = vi.spyOn(performance, 'now');
      now.mockReturnValueOnce(0);
      const timer = startTimer();

      now.mockReturnValueOnce(0.1234567);
      expect(timer.stop()).toBe(0.123);
    });

    it('should be running until stopped', () => {
      const timer = startTimer();
      expect(timer.isRunning()).toBe(true);
    });
  });

  describe('measureSync', () => {
    it('should return the function result and a duration', () => {
      const { result, duration_ms } = measureSync(() => [1, 2, 3].reduce((a, b) => a + b, 0));

      expect(result).toBe(6);
      expect(duration_ms).toBeGreaterThanOrEqual(0);
    });

    it('should propagate errors thrown by the function', () => {
      expect(() =>
        measureSync(() => {
          throw new Error('boom');
        })
      ).toThrow('boom');
    });
  });
});
