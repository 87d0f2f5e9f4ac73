/**
 * Swing reducer for zigzag swing detection
 *
 * Filters scanner extrema down to alternating swings whose moves exceed a
 * percentage threshold. Extrema are walked newest to oldest with a single
 * pending swing:
 *
 * - A same-direction candidate that is more extreme amends the pending swing,
 *   once more than one swing has been finalized; otherwise it is dropped.
 * - An opposite-direction candidate whose move beats the threshold finalizes
 *   the pending swing and becomes the new pending one. A candidate on the
 *   pending swing's own bar is skipped.
 * - Anything else is noise and is dropped.
 *
 * Swings are held newest first in a buffer sized to the extremum count
 * (an upper bound on swings) and returned oldest first. When no move ever
 * beats the threshold the newest extremum is never confirmed, and there are
 * no swings at all.
 *
 * @packageDocumentation
 */

import type { Extremum, Swing, SwingDirection } from '@swingta/contracts';
import { SWING_HIGH } from '@swingta/contracts';

/**
 * Signed move between a HIGH and a LOW, relative to the candidate's price.
 *
 * Positive when the HIGH sits above the LOW. A zero candidate price yields
 * an infinite (or NaN) move.
 */
function relativeMove(highValue: number, lowValue: number, candidateValue: number): number {
  return (highValue - lowValue) / candidateValue;
}

/**
 * Pending-swing state machine over a fixed-capacity buffer.
 */
class SwingBuffer {
  private readonly positions: number[];
  private readonly directions: SwingDirection[];
  private readonly values: number[];
  private readonly deviations: number[];

  /** Slot of the pending swing; also the number of finalized swings */
  private cursor = 0;

  constructor(capacity: number, seed: Extremum) {
    this.positions = new Array<number>(capacity).fill(0);
    this.directions = new Array<SwingDirection>(capacity).fill(SWING_HIGH);
    this.values = new Array<number>(capacity).fill(0);
    this.deviations = new Array<number>(capacity).fill(0);
    this.write(0, seed);
  }

  get finalizedCount(): number {
    return this.cursor;
  }

  get pendingPosition(): number {
    return this.positions[this.cursor] ?? Number.NaN;
  }

  get pendingDirection(): SwingDirection {
    return this.directions[this.cursor] ?? SWING_HIGH;
  }

  get pendingValue(): number {
    return this.values[this.cursor] ?? Number.NaN;
  }

  /** Value of the most recently finalized (newer) swing */
  get finalizedValue(): number {
    return this.values[this.cursor - 1] ?? Number.NaN;
  }

  /**
   * Replace the pending swing with a more extreme candidate and restamp the
   * move into the most recently finalized swing.
   */
  amend(candidate: Extremum, move: number): void {
    this.write(this.cursor, candidate);
    this.deviations[this.cursor - 1] = 100 * move;
  }

  /**
   * Finalize the pending swing and start a new one at the candidate.
   */
  commitAndStart(candidate: Extremum, move: number): void {
    this.cursor++;
    this.write(this.cursor, candidate);
    this.deviations[this.cursor - 1] = 100 * move;
  }

  /**
   * Finalize the pending swing and return every swing, oldest first.
   */
  drain(): Swing[] {
    const swings: Swing[] = [];
    for (let k = this.cursor; k >= 0; k--) {
      swings.push({
        position: this.positions[k] ?? Number.NaN,
        direction: this.directions[k] ?? SWING_HIGH,
        value: this.values[k] ?? Number.NaN,
        deviation: this.deviations[k] ?? 0,
      });
    }
    return swings;
  }

  private write(slot: number, extremum: Extremum): void {
    this.positions[slot] = extremum.position;
    this.directions[slot] = extremum.direction;
    this.values[slot] = extremum.value;
    this.deviations[slot] = 0;
  }
}

/**
 * Reduce chronological extrema to confirmed, alternating swings.
 *
 * A swing's deviation is the percentage move that confirmed it, measured
 * against the older swing before it, and is written once that older swing
 * is found. The oldest swing carries 0.
 *
 * @param extrema - Scanner output, ordered by position
 * @param deviation - Threshold in percent
 * @returns Swings ordered oldest first; empty when there are no extrema or
 *   no move beats the threshold
 *
 * @example
 * ```typescript
 * reduceSwings(
 *   [
 *     { position: 2, direction: -1, value: 90 },
 *     { position: 5, direction: 1, value: 110 },
 *   ],
 *   5
 * );
 * // [
 * //   { position: 2, direction: -1, value: 90, deviation: 0 },
 * //   { position: 5, direction: 1, value: 110, deviation: 22.22... },
 * // ]
 * ```
 */
export function reduceSwings(extrema: readonly Extremum[], deviation: number): Swing[] {
  const newest = extrema[extrema.length - 1];
  if (newest === undefined) {
    return [];
  }

  const threshold = deviation / 100;
  const buffer = new SwingBuffer(extrema.length, newest);

  for (let i = extrema.length - 2; i >= 0; i--) {
    const candidate = extrema[i];
    if (candidate === undefined) {
      continue;
    }

    const pendingIsHigh = buffer.pendingDirection === SWING_HIGH;

    if (candidate.direction === buffer.pendingDirection) {
      const moreExtreme = pendingIsHigh
        ? buffer.pendingValue < candidate.value
        : buffer.pendingValue > candidate.value;

      // Amendment waits until two swings are finalized
      if (moreExtreme && buffer.finalizedCount > 1) {
        const move = pendingIsHigh
          ? relativeMove(candidate.value, buffer.finalizedValue, candidate.value)
          : relativeMove(buffer.finalizedValue, candidate.value, candidate.value);
        buffer.amend(candidate, move);
      }
      continue;
    }

    const move = pendingIsHigh
      ? relativeMove(buffer.pendingValue, candidate.value, candidate.value)
      : relativeMove(candidate.value, buffer.pendingValue, candidate.value);

    if (move > threshold) {
      if (candidate.position === buffer.pendingPosition) {
        continue;
      }
      buffer.commitAndStart(candidate, move);
    }
  }

  if (buffer.finalizedCount === 0) {
    return [];
  }

  return buffer.drain();
}
