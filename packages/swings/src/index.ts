/**
 * @swingta/swings - Zigzag swing detection
 *
 * Scans high/low prices for local extrema, filters them into alternating
 * swings by percentage move and spreads the result over the bar range.
 */

export { zigzag, zigzagSuffix } from './zigzag.js';
export type { ZigzagOptions } from './zigzag.js';

export { scanExtrema, scanWindow } from './scanner.js';
export { reduceSwings } from './reducer.js';
export { densifySwings } from './densifier.js';
export type { DenseSwings } from './densifier.js';
