import { describe, expect, it } from 'vitest';
import { IndexOutOfRangeError } from '../errors.js';
import { createBaseText } from './base-text.js';
import { NULL_SEQUENCE } from './null-sequence.js';

describe('base-text', () => {
    describe('createBaseText', () => {
        const base = createBaseText('hello');

        it('should map indices to identical offsets', () => {
            expect(base.charAt(1)).toBe('e');
            expect(base.getIndexOffset(1)).toBe(1);
            expect(base.getIndexOffset(5)).toBe(5);
            expect(base.getSourceRange()).toEqual({ end: 5, start: 0 });
        });

        it('should be its own base', () => {
            expect(base.getBase()).toBe(base);
            expect(base.getBaseSequence()).toBe(base);
        });

        it('should give equal texts distinct identities', () => {
            expect(createBaseText('hello').getBase()).not.toBe(base.getBase());
        });

        it('should return itself for the full window', () => {
            expect(base.subSequence(0, 5)).toBe(base);
        });

        it('should throw with the offending index', () => {
            try {
                base.charAt(7);
                expect.unreachable();
            } catch (error) {
                expect(error).toBeInstanceOf(IndexOutOfRangeError);
                expect(error).toMatchObject({ index: 7, length: 5, message: 'Index 7 out of range: 0, 5' });
            }
        });
    });

    describe('SubSequence', () => {
        const base = createBaseText('hello');
        const ell = base.subSequence(1, 4);

        it('should window the base text', () => {
            expect(ell.toString()).toBe('ell');
            expect(ell.getStartOffset()).toBe(1);
            expect(ell.getEndOffset()).toBe(4);
            expect(ell.getIndexOffset(2)).toBe(3);
            expect(ell.getIndexOffset(3)).toBe(4);
            expect(ell.isReplaced).toBe(false);
        });

        it('should throw outside its own bounds', () => {
            expect(() => ell.getIndexOffset(4)).toThrow(IndexOutOfRangeError);
            expect(() => ell.charAt(3)).toThrow(IndexOutOfRangeError);
        });

        it('should window relative to its own start', () => {
            const l = ell.subSequence(1, 2);

            expect(l.toString()).toBe('l');
            expect(l.getStartOffset()).toBe(2);
        });

        it('should map base offsets back to clamped indices', () => {
            expect(ell.getIndexRange(2, 4)).toEqual({ end: 3, start: 1 });
            expect(ell.getIndexRange(0, 10)).toEqual({ end: 3, start: 0 });
        });

        it('should slice the base in base offsets', () => {
            expect(ell.baseSubSequence(0, 5)).toBe(base);
            expect(ell.getBase()).toBe(base);
        });

        it('should describe itself as one range', () => {
            const ranges: Array<[number, number]> = [];
            const emitted = ell.addSegments({
                appendRange: (start, end) => ranges.push([start, end]),
                appendText: () => {},
            });

            expect(emitted).toBe(true);
            expect(ranges).toEqual([[1, 4]]);
        });
    });

    describe('NULL_SEQUENCE', () => {
        it('should be empty and absent', () => {
            expect(NULL_SEQUENCE.isNull()).toBe(true);
            expect(NULL_SEQUENCE.isEmpty()).toBe(true);
            expect(NULL_SEQUENCE.length).toBe(0);
            expect(NULL_SEQUENCE.toString()).toBe('');
        });

        it('should only accept the empty window', () => {
            expect(NULL_SEQUENCE.subSequence(0, 0)).toBe(NULL_SEQUENCE);
            expect(NULL_SEQUENCE.getIndexOffset(0)).toBe(0);
            expect(() => NULL_SEQUENCE.charAt(0)).toThrow(IndexOutOfRangeError);
            expect(() => NULL_SEQUENCE.subSequence(0, 1)).toThrow(IndexOutOfRangeError);
        });

        it('should emit nothing', () => {
            expect(NULL_SEQUENCE.addSegments({ appendRange: () => {}, appendText: () => {} })).toBe(false);
        });

        it('should not share a base with real text', () => {
            expect(NULL_SEQUENCE.getBase()).not.toBe(createBaseText('').getBase());
        });
    });
});
