/**
 * Ordered pair of integer bounds, `start <= end`.
 *
 * Used both for base text offsets and for local index ranges.
 */
export type Range = {
    readonly start: number;
    readonly end: number;
};
