import { Err, Ok, type Result, SerializationError } from "@rowfeed/core";
import type { Row, RowValue } from "../types";
import { defineColumn } from "./columns";
import { isRowValue } from "./values";

function copyValue(value: RowValue): RowValue {
	if (value instanceof Date) return new Date(value.getTime());
	if (value instanceof Uint8Array) return new Uint8Array(value);
	return value;
}

function describeType(value: unknown): string {
	if (value === null) return "null";
	if (typeof value === "object") return value.constructor?.name ?? "object";
	return typeof value;
}

/**
 * Copy a row handed over by the query layer into a frozen {@link Row}.
 *
 * Later mutation of the source object (or of its Date and byte values)
 * cannot change a row whose checksum has already been computed.
 * `undefined` values become `null`. Invalid dates and any other
 * unsupported value fail.
 */
export function freezeRow(input: Readonly<Record<string, unknown>>): Result<Row, SerializationError> {
	const row: Record<string, RowValue> = {};

	for (const [column, value] of Object.entries(input)) {
		if (value === undefined) {
			defineColumn(row, column, null);
			continue;
		}
		if (!isRowValue(value)) {
			return Err(
				new SerializationError(`Column "${column}" has unsupported value type ${describeType(value)}`),
			);
		}
		if (value instanceof Date && Number.isNaN(value.getTime())) {
			return Err(new SerializationError(`Column "${column}" holds an invalid date`));
		}
		defineColumn(row, column, copyValue(value));
	}

	return Ok(Object.freeze(row));
}
