export type { Logger, MergeOptions } from './options.js';
export type { Range } from './range.js';
export type { OffsetSlot, SequenceSegment } from './segments.js';
export type { BasedSequence, SegmentConsumer } from './sequence.js';
