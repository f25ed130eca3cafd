/**
 * Logger interface for custom logging implementations.
 *
 * All methods are optional - only implement the verbosity levels you need.
 * When no logger is provided, no logging overhead is incurred.
 *
 * @example
 * // Simple console logger
 * const logger: Logger = {
 *   debug: console.debug,
 *   info: console.info,
 *   warn: console.warn,
 *   error: console.error,
 * };
 *
 * @example
 * // Only per-unit tracing while debugging a merge
 * const tracer: Logger = {
 *   trace: (msg, ...args) => myLoggingService.trace(msg, args),
 * };
 */
export interface Logger {
    /** Log a debug message (verbose debugging output) */
    debug?: (message: string, ...args: unknown[]) => void;
    /** Log an error message (critical failures) */
    error?: (message: string, ...args: unknown[]) => void;
    /** Log an informational message (key progress points) */
    info?: (message: string, ...args: unknown[]) => void;
    /** Log a trace message (extremely verbose, per-iteration details) */
    trace?: (message: string, ...args: unknown[]) => void;
    /** Log a warning message (potential issues) */
    warn?: (message: string, ...args: unknown[]) => void;
}

/**
 * Options accepted by `mergeSegments()` and `buildFromSegments()`.
 *
 * @example
 * const view = mergeSegments([heading, body], { logger: { debug: console.debug } });
 */
export type MergeOptions = {
    /**
     * Optional logger receiving the coalescing outcome (`debug`) and every
     * flushed unit (`trace`).
     */
    logger?: Logger;
};
