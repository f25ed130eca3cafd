import { describe, expect, it } from 'vitest';
import { createBaseText } from '../sequence/base-text.js';
import { mergeSegments } from '../sequence/merge.js';
import { literalAt, prefixOf } from '../sequence/prefixed-sequence.js';
import type { SegmentConsumer } from '../types/sequence.js';
import { emitSegments } from './emit-segments.js';

type Call = ['range', number, number] | ['text', string];

const createRecorder = () => {
    const calls: Call[] = [];
    const consumer: SegmentConsumer = {
        appendRange: (start, end) => {
            calls.push(['range', start, end]);
        },
        appendText: (text) => {
            calls.push(['text', text]);
        },
    };
    return { calls, consumer };
};

describe('emitSegments', () => {
    const base = createBaseText('hello world');

    it('should emit one range per contiguous run', () => {
        const { calls, consumer } = createRecorder();
        const view = mergeSegments([base.subSequence(0, 5), base.subSequence(6, 11)]);

        expect(emitSegments(view, consumer)).toBe(true);
        expect(calls).toEqual([
            ['range', 0, 5],
            ['range', 6, 11],
        ]);
    });

    it('should emit synthetic runs as text', () => {
        const { calls, consumer } = createRecorder();
        const abcd = createBaseText('abcd');
        const view = mergeSegments([abcd.subSequence(0, 2), literalAt('-', abcd, 2), abcd.subSequence(2, 4)]);

        emitSegments(view, consumer);

        expect(calls).toEqual([
            ['range', 0, 2],
            ['text', '-'],
            ['range', 2, 4],
        ]);
    });

    it('should group consecutive synthetic characters', () => {
        const { calls, consumer } = createRecorder();
        const view = mergeSegments([literalAt('> ', base, 0), base.subSequence(0, 5)]);

        expect(view.toString()).toBe('> hello');
        emitSegments(view, consumer);

        expect(calls).toEqual([
            ['text', '> '],
            ['range', 0, 5],
        ]);
    });

    it('should emit nothing for an empty sequence', () => {
        const { calls, consumer } = createRecorder();
        const view = mergeSegments([base.subSequence(0, 5), base.subSequence(6, 11)]);

        expect(emitSegments(view.subSequence(3, 3), consumer)).toBe(false);
        expect(calls).toEqual([]);
    });

    it('should back addSegments of prefixed sequences', () => {
        const { calls, consumer } = createRecorder();

        expect(prefixOf('- ', base.subSequence(6, 11)).addSegments(consumer)).toBe(true);
        expect(calls).toEqual([
            ['text', '- '],
            ['range', 6, 11],
        ]);
    });

    it('should split a window of a merged sequence at the gap', () => {
        const { calls, consumer } = createRecorder();
        const view = mergeSegments([base.subSequence(0, 5), base.subSequence(6, 11)]);

        view.subSequence(3, 7).addSegments(consumer);

        expect(calls).toEqual([
            ['range', 3, 5],
            ['range', 6, 8],
        ]);
    });
});
