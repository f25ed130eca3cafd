/**
 * Thrown when an index or offset argument is outside its documented bounds.
 */
export class IndexOutOfRangeError extends RangeError {
    constructor(
        public readonly index: number,
        public readonly length: number,
        message = `Index ${index} out of range: 0, ${length}`,
    ) {
        super(message);
        this.name = 'IndexOutOfRangeError';
    }
}

/**
 * Thrown when a caller breaks a construction contract (segments from different
 * base texts, segments out of source order, inverted ranges).
 *
 * Signals a bug in the calling code; there is nothing to retry.
 */
export class InvariantError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvariantError';
    }
}

/** Requires an integer `0 <= index < length`. */
export const checkIndex = (index: number, length: number) => {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
        throw new IndexOutOfRangeError(index, length);
    }
};

/** Requires an integer `0 <= index <= length`. */
export const checkIndexInclusive = (index: number, length: number) => {
    if (!Number.isInteger(index) || index < 0 || index > length) {
        throw new IndexOutOfRangeError(index, length);
    }
};

/** Requires `0 <= start <= end <= length`. */
export const checkWindow = (start: number, end: number, length: number) => {
    checkIndexInclusive(start, length);
    checkIndexInclusive(end, length);
    if (end < start) {
        throw new IndexOutOfRangeError(end, length, `Window end ${end} is before start ${start}`);
    }
};

export function invariant(condition: boolean, message: string | (() => string)): asserts condition {
    if (!condition) {
        throw new InvariantError(typeof message === 'string' ? message : message());
    }
}
