import { invariant } from '../errors.js';
import type { MergeOptions } from '../types/options.js';
import type { Range } from '../types/range.js';
import type { BasedSequence } from '../types/sequence.js';
import { NULL_SEQUENCE } from './null-sequence.js';
import { encodeSynthetic, SegmentedSequence } from './segmented-sequence.js';

type SegmentInput = BasedSequence | null | undefined;

/**
 * Validates unit order and fills one offset table for their concatenation.
 * Characters without a base offset are moved into the synthetic buffer.
 */
const buildSegmentedSequence = (base: BasedSequence, units: BasedSequence[], bounds: Range) => {
    let length = 0;
    let lastEnd = base.getStartOffset();

    units.forEach((unit, index) => {
        invariant(
            unit.getBase() === base.getBase(),
            () => `all segments must come from the same base sequence, segments[${index}], length so far: ${length}`,
        );
        invariant(
            unit.getStartOffset() >= lastEnd,
            () =>
                `segments must be in increasing offset order: start=${unit.getStartOffset()} lastEnd=${lastEnd}, length=${length} at index ${index}`,
        );
        lastEnd = unit.getEndOffset();
        length += unit.length;
    });

    const offsets = new Int32Array(length);
    const synthetic: string[] = [];
    let position = 0;

    for (const unit of units) {
        for (let i = 0; i < unit.length; i++) {
            const offset = unit.getIndexOffset(i);
            if (offset < 0) {
                synthetic.push(unit.charAt(i));
                offsets[position++] = encodeSynthetic(synthetic.length - 1);
            } else {
                offsets[position++] = offset;
            }
        }
    }

    return new SegmentedSequence(base, { offsets, synthetic: synthetic.join('') }, 0, length, bounds);
};

/**
 * Concatenates segments of one base text into a single sequence that still
 * maps every character back to its base offset.
 *
 * - `null`, `undefined` and `NULL_SEQUENCE` entries are skipped
 * - adjacent non-replaced segments (`previous.end === next.start`) are fused
 *   into one contiguous span
 * - replaced segments are kept as separate units
 * - a single remaining unit is returned as is
 * - no remaining units yields `NULL_SEQUENCE`
 *
 * @throws {InvariantError} when segments come from different base texts or are
 * not in increasing offset order
 *
 * @example
 * const base = createBaseText('hello world');
 * const view = mergeSegments([base.subSequence(0, 5), base.subSequence(6, 11)]);
 * view.toString(); // 'helloworld'
 * view.getIndexOffset(5); // 6
 */
export const mergeSegments = (segments: Iterable<SegmentInput>, options: MergeOptions = {}): BasedSequence => {
    const { logger } = options;
    const units: BasedSequence[] = [];
    let base: BasedSequence | undefined;
    let pending: BasedSequence | undefined;
    let startOffset = -1;
    let endOffset = -1;
    let inputCount = 0;

    const pushUnit = (unit: BasedSequence) => {
        logger?.trace?.('[merge] unit', {
            end: unit.getEndOffset(),
            length: unit.length,
            replaced: unit.isReplaced,
            start: unit.getStartOffset(),
        });
        units.push(unit);
    };

    const flushPending = () => {
        if (pending) {
            pushUnit(pending);
            pending = undefined;
        }
    };

    for (const segment of segments) {
        if (segment == null || segment.isNull()) {
            continue;
        }

        inputCount++;
        base ??= segment.getBaseSequence();
        invariant(segment.getBase() === base.getBase(), 'all segments must come from the same base sequence');

        if (startOffset === -1) {
            startOffset = segment.getStartOffset();
        }
        endOffset = segment.getEndOffset();

        if (segment.isEmpty()) {
            continue;
        }

        if (segment.isReplaced) {
            flushPending();
            pushUnit(segment);
        } else if (!pending) {
            pending = segment;
        } else if (pending.getEndOffset() !== segment.getStartOffset()) {
            flushPending();
            pending = segment;
        } else {
            pending = pending.baseSubSequence(pending.getStartOffset(), segment.getEndOffset());
        }
    }

    flushPending();
    logger?.debug?.('[merge] coalesced', { inputCount, unitCount: units.length });

    if (!base || units.length === 0) {
        return NULL_SEQUENCE;
    }
    if (units.length === 1) {
        return units[0];
    }
    return buildSegmentedSequence(base, units, { end: endOffset, start: startOffset });
};

/**
 * Variadic form of `mergeSegments()`.
 *
 * @example
 * segmentedOf(heading, literalAt('\n', base, heading.getEndOffset()), body);
 */
export const segmentedOf = (...segments: SegmentInput[]) => mergeSegments(segments);
