/** Log severity levels. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Logging callback accepted by every builder and store.
 *
 * `meta` carries structured fields, such as the event a line describes.
 */
export type Logger = (level: LogLevel, message: string, meta?: Record<string, unknown>) => void;

/** Writes to `console` under a `[rowfeed]` prefix. Structured fields are not printed. */
export const defaultLogger: Logger = (level, message) => console[level](`[rowfeed] ${message}`);

/** Discards everything. */
export const noopLogger: Logger = () => {};
