import type { LobReference, RowValue, ScalarValue } from "../types";

/** Type guard: true for values that may appear in metadata and primary keys. */
export function isScalarValue(value: unknown): value is ScalarValue {
	return (
		value === null ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "bigint" ||
		typeof value === "boolean" ||
		value instanceof Date
	);
}

/** Type guard for {@link LobReference}. */
export function isLobReference(value: unknown): value is LobReference {
	return (
		typeof value === "object" &&
		value !== null &&
		"kind" in value &&
		value.kind === "lob-reference" &&
		"open" in value &&
		typeof value.open === "function"
	);
}

/** Type guard: true for every value a row may hold. */
export function isRowValue(value: unknown): value is RowValue {
	return isScalarValue(value) || value instanceof Uint8Array || isLobReference(value);
}

/**
 * Canonical string form of a scalar value.
 *
 * Dates render as ISO-8601 UTC so the text (and every checksum over it)
 * does not depend on the process time zone. `null` renders as "".
 */
export function stringifyValue(value: ScalarValue): string {
	if (value === null) return "";
	if (value instanceof Date) return value.toISOString();
	return String(value);
}
