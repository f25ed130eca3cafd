import { invariant } from '../errors.js';
import type { Range } from '../types/range.js';

export const EMPTY_RANGE: Range = Object.freeze({ end: 0, start: 0 });

/**
 * Creates a range, rejecting `end < start`.
 *
 * @example
 * rangeOf(0, 5) // → { start: 0, end: 5 }
 */
export const rangeOf = (start: number, end: number): Range => {
    invariant(start <= end, () => `Range end ${end} is before start ${start}`);
    return { end, start };
};

export const rangeLength = (range: Range) => range.end - range.start;

export const isEmptyRange = (range: Range) => range.end === range.start;
