import { rangeOf } from '../range/range.js';
import type { Range } from '../types/range.js';
import type { BasedSequence, SegmentConsumer } from '../types/sequence.js';

/**
 * Behaviour shared by every sequence implementation. Subclasses provide the
 * storage and the index/offset mapping.
 */
export abstract class AbstractBasedSequence implements BasedSequence {
    abstract readonly length: number;
    abstract readonly isReplaced: boolean;

    abstract charAt(index: number): string;
    abstract getStartOffset(): number;
    abstract getEndOffset(): number;
    abstract getIndexOffset(index: number): number;
    abstract getIndexRange(startOffset: number, endOffset: number): Range;
    abstract subSequence(start: number, end: number): BasedSequence;
    abstract baseSubSequence(startOffset: number, endOffset: number): BasedSequence;
    abstract getBaseSequence(): BasedSequence;
    abstract addSegments(consumer: SegmentConsumer): boolean;

    getBase(): object {
        return this.getBaseSequence().getBase();
    }

    getSourceRange(): Range {
        return rangeOf(this.getStartOffset(), this.getEndOffset());
    }

    isEmpty() {
        return this.length === 0;
    }

    isNull() {
        return false;
    }

    toString() {
        let text = '';
        for (let i = 0; i < this.length; i++) {
            text += this.charAt(i);
        }
        return text;
    }
}

/**
 * Maps base offsets to local indices for a contiguous sequence starting at
 * `sequenceStart`, clamping both ends into `[0, length]` and the end to the start.
 */
export const contiguousIndexRange = (
    startOffset: number,
    endOffset: number,
    sequenceStart: number,
    length: number,
): Range => {
    const start = Math.min(Math.max(startOffset - sequenceStart, 0), length);
    const end = Math.min(Math.max(endOffset - sequenceStart, start), length);
    return rangeOf(start, end);
};
