import type { RowfeedError } from "./errors";

/**
 * Outcome of an operation that can fail in an expected way. Callers branch
 * on `ok` instead of catching.
 */
export type Result<T, E = RowfeedError> =
	| { ok: true; value: T }
	| { ok: false; error: E };

/** Wrap a success value. */
export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

/** Wrap a failure. */
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });
