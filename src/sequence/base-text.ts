import { checkIndex, checkIndexInclusive, checkWindow } from '../errors.js';
import type { Range } from '../types/range.js';
import type { BasedSequence, SegmentConsumer } from '../types/sequence.js';
import { AbstractBasedSequence, contiguousIndexRange } from './based-sequence.js';
import { SubSequence } from './sub-sequence.js';

/**
 * Root sequence over the original source text. Offsets equal indices.
 *
 * Identity matters: two base texts with the same content are different bases,
 * and sequences drawn from them cannot be merged together.
 */
export class BaseText extends AbstractBasedSequence {
    readonly isReplaced = false;
    readonly length: number;

    constructor(readonly text: string) {
        super();
        this.length = text.length;
    }

    charAt(index: number) {
        checkIndex(index, this.length);
        return this.text.charAt(index);
    }

    getStartOffset() {
        return 0;
    }

    getEndOffset() {
        return this.length;
    }

    getIndexOffset(index: number) {
        checkIndexInclusive(index, this.length);
        return index;
    }

    getIndexRange(startOffset: number, endOffset: number): Range {
        return contiguousIndexRange(startOffset, endOffset, 0, this.length);
    }

    subSequence(start: number, end: number): BasedSequence {
        return this.baseSubSequence(start, end);
    }

    baseSubSequence(startOffset: number, endOffset: number): BasedSequence {
        checkWindow(startOffset, endOffset, this.length);
        if (startOffset === 0 && endOffset === this.length) {
            return this;
        }
        return new SubSequence(this, startOffset, endOffset);
    }

    getBaseSequence(): BasedSequence {
        return this;
    }

    getBase(): object {
        return this;
    }

    addSegments(consumer: SegmentConsumer) {
        consumer.appendRange(0, this.length);
        return true;
    }

    toString() {
        return this.text;
    }
}

/**
 * Wraps source text as the base all derived sequences map back to.
 *
 * @example
 * const base = createBaseText('hello world');
 * base.subSequence(6, 11).toString(); // 'world'
 */
export const createBaseText = (text: string) => new BaseText(text);
