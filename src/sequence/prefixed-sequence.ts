import { checkIndex, checkIndexInclusive, checkWindow } from '../errors.js';
import { rangeOf } from '../range/range.js';
import { emitSegments } from '../segments/emit-segments.js';
import type { Range } from '../types/range.js';
import type { BasedSequence, SegmentConsumer } from '../types/sequence.js';
import { AbstractBasedSequence } from './based-sequence.js';

/**
 * Synthetic text followed by a contiguous span of the base text.
 *
 * The prefix characters have no source position (`getIndexOffset` is `-1`);
 * start and end offsets are those of the span.
 */
export class PrefixedSequence extends AbstractBasedSequence {
    readonly isReplaced = true;
    readonly length: number;

    constructor(
        private readonly prefix: string,
        private readonly span: BasedSequence,
    ) {
        super();
        this.length = prefix.length + span.length;
    }

    charAt(index: number) {
        checkIndex(index, this.length);
        return index < this.prefix.length
            ? this.prefix.charAt(index)
            : this.span.charAt(index - this.prefix.length);
    }

    getStartOffset() {
        return this.span.getStartOffset();
    }

    getEndOffset() {
        return this.span.getEndOffset();
    }

    getIndexOffset(index: number) {
        checkIndexInclusive(index, this.length);
        if (index < this.prefix.length) {
            return -1;
        }
        // one past the end of a prefix-only sequence follows a synthetic character
        if (this.span.length === 0) {
            return -1;
        }
        return this.span.getIndexOffset(index - this.prefix.length);
    }

    getIndexRange(startOffset: number, endOffset: number): Range {
        const { end, start } = this.span.getIndexRange(startOffset, endOffset);
        return rangeOf(start + this.prefix.length, end + this.prefix.length);
    }

    subSequence(start: number, end: number): BasedSequence {
        checkWindow(start, end, this.length);
        if (start === 0 && end === this.length) {
            return this;
        }

        const prefixLength = this.prefix.length;
        if (start >= prefixLength) {
            return this.span.subSequence(start - prefixLength, end - prefixLength);
        }
        if (start === end) {
            return this.span.subSequence(0, 0);
        }
        return new PrefixedSequence(
            this.prefix.slice(start, Math.min(end, prefixLength)),
            this.span.subSequence(0, Math.max(end - prefixLength, 0)),
        );
    }

    baseSubSequence(startOffset: number, endOffset: number): BasedSequence {
        return this.span.baseSubSequence(startOffset, endOffset);
    }

    getBaseSequence(): BasedSequence {
        return this.span.getBaseSequence();
    }

    addSegments(consumer: SegmentConsumer) {
        return emitSegments(this, consumer);
    }

    toString() {
        return this.prefix + this.span.toString();
    }
}

/**
 * Prepends synthetic `prefix` to the base span covered by `sequence`.
 * An empty prefix returns the span itself.
 *
 * @example
 * const base = createBaseText('item');
 * const bullet = prefixOf('- ', base);
 * bullet.toString(); // '- item'
 * bullet.getIndexOffset(0); // -1
 * bullet.getIndexOffset(2); // 0
 */
export const prefixOf = (prefix: string, sequence: BasedSequence): BasedSequence => {
    const span = sequence.baseSubSequence(sequence.getStartOffset(), sequence.getEndOffset());
    return prefix ? new PrefixedSequence(prefix, span) : span;
};

/**
 * Synthetic `text` anchored at base `offset`, for splicing manufactured
 * characters between real segments.
 */
export const literalAt = (text: string, base: BasedSequence, offset: number): BasedSequence =>
    prefixOf(text, base.baseSubSequence(offset, offset));
