import type { Range } from './range.js';

/**
 * One entry of a flattened sequence description.
 *
 * - `base`: characters copied from the base text at `range`
 * - `text`: characters with no source mapping
 *
 * @example
 * // 'ab' + '-' + 'cd' over the base text 'abcd'
 * [
 *   { range: { end: 2, start: 0 }, type: 'base' },
 *   { text: '-', type: 'text' },
 *   { range: { end: 4, start: 2 }, type: 'base' },
 * ]
 */
export type SequenceSegment = { type: 'base'; range: Range } | { type: 'text'; text: string };

/**
 * Decoded offset table slot of a segmented sequence.
 *
 * `base` slots carry the base text offset of the character, `synthetic` slots
 * the index of the character in the shared synthetic buffer.
 */
export type OffsetSlot = { kind: 'base'; offset: number } | { kind: 'synthetic'; index: number };
