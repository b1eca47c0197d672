/** Base error class for all rowfeed errors */
export class RowfeedError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** A configured primary-key column is absent from the row (or holds null) */
export class MissingPrimaryKeyError extends RowfeedError {
	/** Configured key column that could not be resolved. */
	readonly column: string;

	constructor(column: string, message?: string, cause?: Error) {
		super(message ?? `Primary key column "${column}" is missing from the row`, "MISSING_PRIMARY_KEY", cause);
		this.column = column;
	}
}

/** Row cannot be canonically serialised (unsupported value type, missing URL value, ...) */
export class SerializationError extends RowfeedError {
	constructor(message: string, cause?: Error) {
		super(message, "SERIALIZATION_FAILED", cause);
	}
}

/** Large-object content could not be opened or read */
export class ContentAcquisitionError extends RowfeedError {
	constructor(message: string, cause?: Error) {
		super(message, "CONTENT_ACQUISITION_FAILED", cause);
	}
}

/**
 * The fixed two-field snapshot could not be encoded.
 *
 * Never returned in a Result: it signals a broken internal invariant and is thrown.
 */
export class EncodingInvariantError extends RowfeedError {
	constructor(message: string, cause?: Error) {
		super(message, "ENCODING_INVARIANT", cause);
	}
}

/** Feed configuration failed structural validation */
export class ConfigValidationError extends RowfeedError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIG_INVALID", cause);
	}
}

/** Source adapter operation failure */
export class AdapterError extends RowfeedError {
	constructor(message: string, cause?: Error) {
		super(message, "ADAPTER_ERROR", cause);
	}
}

/** Any error a row can fail with while its snapshot or handle is built. */
export type DocumentError = MissingPrimaryKeyError | SerializationError | ContentAcquisitionError;

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
