import type { BasedSequence, SegmentConsumer } from '../types/sequence.js';

/**
 * Describes `sequence` to `consumer` as maximal runs: consecutive characters
 * with contiguous base offsets become one `appendRange`, consecutive
 * characters without a base offset become one `appendText`.
 *
 * @returns `false` when the sequence is empty and nothing was emitted
 *
 * @example
 * // 'ab' + '-' + 'cd' over base 'abcd'
 * emitSegments(view, consumer);
 * // appendRange(0, 2), appendText('-'), appendRange(2, 4)
 */
export const emitSegments = (sequence: BasedSequence, consumer: SegmentConsumer): boolean => {
    const { length } = sequence;
    if (length === 0) {
        return false;
    }

    let runStart = 0;
    // base offsets of the current run; rangeStart is -1 while in a text run
    let rangeStart = sequence.getIndexOffset(0);
    let rangeEnd = rangeStart + 1;

    const flush = (runEnd: number) => {
        if (rangeStart < 0) {
            consumer.appendText(sequence.subSequence(runStart, runEnd).toString());
        } else {
            consumer.appendRange(rangeStart, rangeEnd);
        }
    };

    for (let i = 1; i < length; i++) {
        const offset = sequence.getIndexOffset(i);
        if (offset < 0 ? rangeStart < 0 : rangeStart >= 0 && offset === rangeEnd) {
            rangeEnd++;
            continue;
        }

        flush(i);
        runStart = i;
        rangeStart = offset;
        rangeEnd = offset + 1;
    }

    flush(length);
    return true;
};
