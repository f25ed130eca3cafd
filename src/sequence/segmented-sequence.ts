import { checkIndex, checkIndexInclusive, checkWindow, IndexOutOfRangeError } from '../errors.js';
import { rangeOf } from '../range/range.js';
import { emitSegments } from '../segments/emit-segments.js';
import type { Range } from '../types/range.js';
import type { OffsetSlot } from '../types/segments.js';
import type { BasedSequence, SegmentConsumer } from '../types/sequence.js';
import { AbstractBasedSequence } from './based-sequence.js';

/**
 * Backing storage shared by every window of one merged sequence.
 *
 * - `offsets[i] >= 0` is the base offset of character `i`
 * - `offsets[i] < 0` refers to `synthetic[-offsets[i] - 1]`
 *
 * Written once by the merge builder, never mutated afterwards.
 */
export type OffsetTable = {
    readonly offsets: Int32Array;
    readonly synthetic: string;
};

/** Encodes a synthetic buffer index as a negative table value. */
export const encodeSynthetic = (index: number) => -index - 1;

const decodeSynthetic = (value: number) => -value - 1;

/**
 * Start/end base offsets of a window, skipping synthetic characters at its
 * boundaries. When the window holds no real character the start is taken from
 * the first real offset after it, or the base end when there is none.
 */
const computeWindowBounds = (
    base: BasedSequence,
    { offsets, synthetic }: OffsetTable,
    windowStart: number,
    length: number,
): Range => {
    const tableLength = offsets.length;

    if (!synthetic.length) {
        const start = windowStart < tableLength ? offsets[windowStart] : base.getEndOffset();
        const end = length === 0 ? start : offsets[windowStart + length - 1] + 1;
        return { end, start };
    }

    for (let i = windowStart; i < tableLength; i++) {
        if (offsets[i] < 0) {
            continue;
        }

        const start = offsets[i];
        for (let j = windowStart + length - 1; j >= i; j--) {
            if (offsets[j] >= 0) {
                return { end: offsets[j] + 1, start };
            }
        }
        return { end: start, start };
    }

    const end = base.getEndOffset();
    return { end, start: end };
};

/**
 * Immutable window over an offset table: the result of merging several
 * segments of one base text.
 *
 * Sub-sequences share the table and synthetic buffer and only move the
 * window, so `subSequence` is O(1) and never copies characters.
 */
export class SegmentedSequence extends AbstractBasedSequence {
    readonly isReplaced = true;
    private readonly startOffset: number;
    private readonly endOffset: number;

    /**
     * @param base root base sequence every table offset refers to
     * @param bounds overall start/end offsets; computed from the window when omitted
     */
    constructor(
        private readonly base: BasedSequence,
        private readonly table: OffsetTable,
        private readonly windowStart: number,
        readonly length: number,
        bounds?: Range,
    ) {
        super();
        const { end, start } = bounds ?? computeWindowBounds(base, table, windowStart, length);
        this.startOffset = start;
        this.endOffset = end;
    }

    charAt(index: number) {
        checkIndex(index, this.length);
        const value = this.table.offsets[this.windowStart + index];
        return value < 0 ? this.table.synthetic.charAt(decodeSynthetic(value)) : this.base.charAt(value);
    }

    getStartOffset() {
        return this.startOffset;
    }

    getEndOffset() {
        return this.endOffset;
    }

    /**
     * `index === length` maps to the offset after the last character, but an
     * empty window has no last character and rejects index 0.
     */
    getIndexOffset(index: number) {
        checkIndexInclusive(index, this.length);
        const { offsets } = this.table;

        if (index === this.length) {
            if (this.length === 0) {
                throw new IndexOutOfRangeError(index, this.length);
            }
            const last = offsets[this.windowStart + index - 1];
            return last < 0 ? -1 : last + 1;
        }

        const value = offsets[this.windowStart + index];
        return value < 0 ? -1 : value;
    }

    /**
     * Linear scan for the first index holding `startOffset` and the first
     * index holding `endOffset`. When no slot holds `endOffset`, the end is the
     * index following the first character at `endOffset - 1`. A missing start
     * maps to 0; an end before the start is clamped to the start.
     */
    getIndexRange(startOffset: number, endOffset: number): Range {
        const { offsets } = this.table;
        let start = -1;
        let end = -1;
        let endAfter = -1;

        for (let i = 0; i < this.length && (start < 0 || end < 0); i++) {
            const value = offsets[this.windowStart + i];
            if (value < 0) {
                continue;
            }
            if (start < 0 && value === startOffset) {
                start = i;
            }
            if (end < 0 && value === endOffset) {
                end = i;
            }
            if (endAfter < 0 && value + 1 === endOffset) {
                endAfter = i + 1;
            }
        }

        start = Math.max(start, 0);
        return rangeOf(start, Math.max(end < 0 ? endAfter : end, start));
    }

    subSequence(start: number, end: number): BasedSequence {
        checkWindow(start, end, this.length);
        if (start === 0 && end === this.length) {
            return this;
        }
        return new SegmentedSequence(this.base, this.table, this.windowStart + start, end - start);
    }

    /** Slice of the base text in base offsets, regardless of this window. */
    baseSubSequence(startOffset: number, endOffset: number): BasedSequence {
        checkIndexInclusive(startOffset, this.base.length);
        checkIndexInclusive(endOffset, this.base.length);
        return this.base.baseSubSequence(startOffset, endOffset);
    }

    getBaseSequence() {
        return this.base;
    }

    /** Decoded table slot for the character at `index`. */
    getSlot(index: number): OffsetSlot {
        checkIndex(index, this.length);
        const value = this.table.offsets[this.windowStart + index];
        return value < 0 ? { index: decodeSynthetic(value), kind: 'synthetic' } : { kind: 'base', offset: value };
    }

    /** Number of synthetic characters in the buffer shared by all windows of this table. */
    get syntheticLength() {
        return this.table.synthetic.length;
    }

    addSegments(consumer: SegmentConsumer) {
        return emitSegments(this, consumer);
    }

    toString() {
        const { offsets, synthetic } = this.table;
        const text = this.base.toString();
        const chars: string[] = new Array(this.length);
        for (let i = 0; i < this.length; i++) {
            const value = offsets[this.windowStart + i];
            chars[i] = value < 0 ? synthetic.charAt(decodeSynthetic(value)) : text.charAt(value);
        }
        return chars.join('');
    }
}
