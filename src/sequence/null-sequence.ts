import { checkIndexInclusive, checkWindow, IndexOutOfRangeError } from '../errors.js';
import { EMPTY_RANGE } from '../range/range.js';
import type { BasedSequence } from '../types/sequence.js';
import { AbstractBasedSequence } from './based-sequence.js';

/**
 * The absent sequence. Distinct from a zero-length view of real text: it has
 * no position in any base and is its own base.
 */
class NullSequence extends AbstractBasedSequence {
    readonly isReplaced = false;
    readonly length = 0;

    charAt(index: number): string {
        throw new IndexOutOfRangeError(index, 0);
    }

    getStartOffset() {
        return 0;
    }

    getEndOffset() {
        return 0;
    }

    getIndexOffset(index: number) {
        checkIndexInclusive(index, 0);
        return 0;
    }

    getIndexRange() {
        return EMPTY_RANGE;
    }

    subSequence(start: number, end: number): BasedSequence {
        checkWindow(start, end, 0);
        return this;
    }

    baseSubSequence(startOffset: number, endOffset: number): BasedSequence {
        checkWindow(startOffset, endOffset, 0);
        return this;
    }

    getBaseSequence(): BasedSequence {
        return this;
    }

    getBase(): object {
        return this;
    }

    isNull() {
        return true;
    }

    addSegments() {
        return false;
    }

    toString() {
        return '';
    }
}

export const NULL_SEQUENCE: BasedSequence = new NullSequence();

