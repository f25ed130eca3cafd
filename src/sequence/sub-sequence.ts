import { checkIndex, checkIndexInclusive, checkWindow } from '../errors.js';
import type { Range } from '../types/range.js';
import type { BasedSequence, SegmentConsumer } from '../types/sequence.js';
import type { BaseText } from './base-text.js';
import { AbstractBasedSequence, contiguousIndexRange } from './based-sequence.js';

/**
 * Contiguous window `[startOffset, endOffset)` of a base text.
 */
export class SubSequence extends AbstractBasedSequence {
    readonly isReplaced = false;
    readonly length: number;

    constructor(
        private readonly base: BaseText,
        private readonly startOffset: number,
        private readonly endOffset: number,
    ) {
        super();
        this.length = endOffset - startOffset;
    }

    charAt(index: number) {
        checkIndex(index, this.length);
        return this.base.text.charAt(this.startOffset + index);
    }

    getStartOffset() {
        return this.startOffset;
    }

    getEndOffset() {
        return this.endOffset;
    }

    getIndexOffset(index: number) {
        checkIndexInclusive(index, this.length);
        return this.startOffset + index;
    }

    getIndexRange(startOffset: number, endOffset: number): Range {
        return contiguousIndexRange(startOffset, endOffset, this.startOffset, this.length);
    }

    subSequence(start: number, end: number): BasedSequence {
        checkWindow(start, end, this.length);
        if (start === 0 && end === this.length) {
            return this;
        }
        return new SubSequence(this.base, this.startOffset + start, this.startOffset + end);
    }

    baseSubSequence(startOffset: number, endOffset: number): BasedSequence {
        return this.base.baseSubSequence(startOffset, endOffset);
    }

    getBaseSequence(): BasedSequence {
        return this.base;
    }

    addSegments(consumer: SegmentConsumer) {
        consumer.appendRange(this.startOffset, this.endOffset);
        return true;
    }

    toString() {
        return this.base.text.slice(this.startOffset, this.endOffset);
    }
}
