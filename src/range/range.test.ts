import { describe, expect, it } from 'vitest';
import { InvariantError } from '../errors.js';
import { EMPTY_RANGE, isEmptyRange, rangeLength, rangeOf } from './range.js';

describe('range', () => {
    describe('rangeOf', () => {
        it('should create an ordered range', () => {
            expect(rangeOf(1, 3)).toEqual({ end: 3, start: 1 });
        });

        it('should allow empty ranges', () => {
            expect(isEmptyRange(rangeOf(4, 4))).toBe(true);
        });

        it('should reject an end before the start', () => {
            expect(() => rangeOf(3, 1)).toThrow(InvariantError);
            expect(() => rangeOf(3, 1)).toThrow('Range end 1 is before start 3');
        });
    });

    describe('rangeLength', () => {
        it('should measure the range', () => {
            expect(rangeLength(rangeOf(2, 9))).toBe(7);
            expect(rangeLength(EMPTY_RANGE)).toBe(0);
        });
    });
});
