import { Err, MissingPrimaryKeyError, Ok, type Result } from "@rowfeed/core";
import type { Row, ScalarValue } from "../types";
import { findColumn } from "./columns";
import { isScalarValue } from "./values";

/** Primary-key columns as spelled in the row, with their values in key order. */
export interface ResolvedPrimaryKey {
	readonly columns: readonly string[];
	readonly values: readonly ScalarValue[];
}

/**
 * Resolve the configured primary key against a row.
 *
 * Fails when a configured column is absent, null, or holds a large object.
 */
export function resolvePrimaryKey(
	configured: readonly string[],
	row: Row,
): Result<ResolvedPrimaryKey, MissingPrimaryKeyError> {
	if (configured.length === 0) {
		return Err(new MissingPrimaryKeyError("", "No primary key columns are configured"));
	}

	const columns: string[] = [];
	const values: ScalarValue[] = [];

	for (const name of configured) {
		const column = findColumn(row, name);
		if (column === undefined) {
			return Err(new MissingPrimaryKeyError(name));
		}
		const value = row[column];
		if (value === null || value === undefined) {
			return Err(new MissingPrimaryKeyError(name, `Primary key column "${name}" is null`));
		}
		if (!isScalarValue(value)) {
			return Err(
				new MissingPrimaryKeyError(name, `Primary key column "${name}" holds a large object`),
			);
		}
		columns.push(column);
		values.push(value);
	}

	return Ok({ columns, values });
}
