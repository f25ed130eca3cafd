/**
 * traceable-text - Provenance-preserving text views.
 *
 * Assembles new strings from ranges of an original source text while keeping,
 * for every character of the result, the offset it came from in the source.
 * Characters manufactured during processing are carried in a synthetic
 * buffer and report an offset of `-1`.
 *
 * @packageDocumentation
 *
 * @example
 * import { createBaseText, literalAt, mergeSegments } from 'traceable-text';
 *
 * const base = createBaseText('hello world');
 * const view = mergeSegments([
 *   base.subSequence(0, 5),
 *   literalAt(', ', base, 5),
 *   base.subSequence(6, 11),
 * ]);
 *
 * view.toString(); // 'hello, world'
 * view.getIndexOffset(5); // -1
 * view.getIndexOffset(7); // 6
 */

// ─────────────────────────────────────────────────────────────
// Sequences
// ─────────────────────────────────────────────────────────────

export { AbstractBasedSequence } from './sequence/based-sequence.js';
export { BaseText, createBaseText } from './sequence/base-text.js';
export { NULL_SEQUENCE } from './sequence/null-sequence.js';
export { literalAt, PrefixedSequence, prefixOf } from './sequence/prefixed-sequence.js';
export type { OffsetTable } from './sequence/segmented-sequence.js';
export { SegmentedSequence } from './sequence/segmented-sequence.js';
export { SubSequence } from './sequence/sub-sequence.js';

// ─────────────────────────────────────────────────────────────
// Merging
// ─────────────────────────────────────────────────────────────

export { mergeSegments, segmentedOf } from './sequence/merge.js';

// ─────────────────────────────────────────────────────────────
// Segment descriptions
// ─────────────────────────────────────────────────────────────

export { emitSegments } from './segments/emit-segments.js';
export type { SegmentCollector } from './segments/segment-collector.js';
export { buildFromSegments, collectSegments, createSegmentCollector } from './segments/segment-collector.js';

// ─────────────────────────────────────────────────────────────
// Ranges & errors
// ─────────────────────────────────────────────────────────────

export { EMPTY_RANGE, isEmptyRange, rangeLength, rangeOf } from './range/range.js';
export { IndexOutOfRangeError, InvariantError } from './errors.js';

// Type definitions
export type {
    BasedSequence,
    Logger,
    MergeOptions,
    OffsetSlot,
    Range,
    SegmentConsumer,
    SequenceSegment,
} from './types/index.js';
