import { rangeOf } from '../range/range.js';
import { mergeSegments } from '../sequence/merge.js';
import { literalAt } from '../sequence/prefixed-sequence.js';
import type { MergeOptions } from '../types/options.js';
import type { SequenceSegment } from '../types/segments.js';
import type { BasedSequence, SegmentConsumer } from '../types/sequence.js';

export type SegmentCollector = SegmentConsumer & {
    /** Segments collected so far, in emission order. */
    readonly segments: readonly SequenceSegment[];
};

/**
 * Creates a consumer that records emitted runs as `SequenceSegment`s.
 *
 * Empty runs are dropped, a range starting where the previous range ended
 * extends it, and consecutive texts are concatenated.
 */
export const createSegmentCollector = (): SegmentCollector => {
    const segments: SequenceSegment[] = [];

    return {
        appendRange: (start, end) => {
            if (start === end) {
                return;
            }
            const last = segments.at(-1);
            if (last?.type === 'base' && last.range.end === start) {
                segments[segments.length - 1] = { range: rangeOf(last.range.start, end), type: 'base' };
                return;
            }
            segments.push({ range: rangeOf(start, end), type: 'base' });
        },
        appendText: (text) => {
            if (!text) {
                return;
            }
            const last = segments.at(-1);
            if (last?.type === 'text') {
                segments[segments.length - 1] = { text: last.text + text, type: 'text' };
                return;
            }
            segments.push({ text, type: 'text' });
        },
        segments,
    };
};

/**
 * Flattens a sequence into its base ranges and literal texts.
 *
 * @example
 * collectSegments(mergeSegments([base.subSequence(0, 5), base.subSequence(6, 11)]));
 * // [{ range: { end: 5, start: 0 }, type: 'base' }, { range: { end: 11, start: 6 }, type: 'base' }]
 */
export const collectSegments = (sequence: BasedSequence): SequenceSegment[] => {
    const collector = createSegmentCollector();
    sequence.addSegments(collector);
    return [...collector.segments];
};

/**
 * Rebuilds a sequence over `base` from a flattened description.
 *
 * Literal texts are anchored at the end of the preceding base range; leading
 * texts at the start of the first base range.
 */
export const buildFromSegments = (
    base: BasedSequence,
    segments: readonly SequenceSegment[],
    options: MergeOptions = {},
): BasedSequence => {
    const firstRange = segments.find((segment) => segment.type === 'base');
    let anchor = firstRange?.type === 'base' ? firstRange.range.start : base.getStartOffset();

    const pieces = segments.map((segment) => {
        if (segment.type === 'text') {
            return literalAt(segment.text, base, anchor);
        }
        anchor = segment.range.end;
        return base.baseSubSequence(segment.range.start, segment.range.end);
    });

    return mergeSegments(pieces, options);
};
