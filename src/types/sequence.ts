import type { Range } from './range.js';

/**
 * Receives the description of a sequence as an ordered list of runs.
 *
 * A run is either a span of the base text (`appendRange`) or literal text that
 * has no position in the base text (`appendText`).
 */
export interface SegmentConsumer {
    /** A run of characters copied from base text offsets `[start, end)`. */
    appendRange: (start: number, end: number) => void;
    /** A run of characters with no source mapping. */
    appendText: (text: string) => void;
}

/**
 * A character sequence whose characters can be traced back to offsets in an
 * ultimate base text.
 *
 * Indices are local to the sequence (`0..length`); offsets are absolute
 * positions in the base text. Characters manufactured during processing
 * report an offset of `-1`.
 *
 * @example
 * const base = createBaseText('hello world');
 * const word = base.subSequence(6, 11);
 * word.charAt(0); // 'w'
 * word.getIndexOffset(0); // 6
 */
export interface BasedSequence {
    /** Number of characters in the sequence. */
    readonly length: number;

    /**
     * `true` when the sequence was assembled from non-contiguous pieces or
     * contains synthetic characters. Replaced sequences are never fused with
     * their neighbours by the merge builder.
     */
    readonly isReplaced: boolean;

    /** Single UTF-16 code unit at `index`; throws when `index` is outside `[0, length)`. */
    charAt(index: number): string;

    /** First base offset covered by the sequence, skipping synthetic boundary characters. */
    getStartOffset(): number;

    /** Base offset after the last real character, skipping synthetic boundary characters. */
    getEndOffset(): number;

    /**
     * Base offset of the character at `index`, or `-1` when the character has
     * no source position. `index === length` maps to the offset after the last
     * character.
     */
    getIndexOffset(index: number): number;

    /** Maps base offsets back to a local index range. */
    getIndexRange(startOffset: number, endOffset: number): Range;

    /** `{ start: getStartOffset(), end: getEndOffset() }` */
    getSourceRange(): Range;

    /** Local window `[start, end)` of this sequence. */
    subSequence(start: number, end: number): BasedSequence;

    /** Contiguous slice of the base text, in base text offsets. */
    baseSubSequence(startOffset: number, endOffset: number): BasedSequence;

    /** The root sequence all offsets are relative to. */
    getBaseSequence(): BasedSequence;

    /**
     * Identity of the base text. Two sequences share a base only when their
     * `getBase()` values are the same object.
     */
    getBase(): object;

    isEmpty(): boolean;

    /** `true` only for the distinguished absent sequence. */
    isNull(): boolean;

    /**
     * Describes this sequence to `consumer` as base ranges and literal text.
     * @returns whether anything was emitted
     */
    addSegments(consumer: SegmentConsumer): boolean;

    toString(): string;
}
