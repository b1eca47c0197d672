import {
	type EventSink,
	Err,
	type FeedConfig,
	Ok,
	type Result,
	SerializationError,
	toError,
} from "@rowfeed/core";
import { columnSet, defineColumn, findColumn } from "../row/columns";
import { isScalarValue, stringifyValue } from "../row/values";
import type { RowSerializer } from "../serializer";
import type { ContentContext, Row, ScalarValue } from "../types";

/** What every strategy is built from. */
export interface StrategyDeps {
	readonly config: FeedConfig;
	readonly serializer: RowSerializer;
	readonly events: EventSink;
}

/** Scheme of synthesised display URLs. */
export const DISPLAY_URL_SCHEME = "dbconnector";

/** `dbconnector://<connectorName>.localhost/<docId>` */
export function displayUrlFor(connectorName: string, docId: string): string {
	return `${DISPLAY_URL_SCHEME}://${connectorName}.localhost/${docId}`;
}

/**
 * Columns kept out of the serialised row and the document properties:
 * the configured skip list, the last-modified column and the LOB column.
 */
export function excludedColumns(config: FeedConfig): Set<string> {
	return columnSet([...(config.skipColumns ?? []), config.lastModifiedField, config.lobField]);
}

/**
 * Scalar columns that take part in change detection, in row order.
 * Byte values and LOB references never do.
 */
export function metadataColumns(row: Row, excluded: Set<string>): Array<[string, ScalarValue]> {
	const columns: Array<[string, ScalarValue]> = [];
	for (const [column, value] of Object.entries(row)) {
		if (excluded.has(column.toLowerCase())) continue;
		if (!isScalarValue(value)) continue;
		columns.push([column, value]);
	}
	return columns;
}

/** Non-null metadata columns, stringified, for the document properties. */
export function metadataProperties(row: Row, excluded: Set<string>): Record<string, string> {
	const properties: Record<string, string> = {};
	for (const [column, value] of metadataColumns(row, excluded)) {
		if (value === null) continue;
		defineColumn(properties, column, stringifyValue(value));
	}
	return properties;
}

/** Copy of the configured last-modified column's value, when it holds a timestamp. */
export function lastModifiedOf(row: Row, config: FeedConfig): Date | undefined {
	if (!config.lastModifiedField) return undefined;
	const column = findColumn(row, config.lastModifiedField);
	if (column === undefined) return undefined;
	const value = row[column];
	return value instanceof Date ? new Date(value.getTime()) : undefined;
}

/** Non-null scalar value of a configured column, or undefined. */
export function scalarColumn(row: Row, name: string | undefined): ScalarValue | undefined {
	if (!name) return undefined;
	const column = findColumn(row, name);
	if (column === undefined) return undefined;
	const value = row[column];
	return isScalarValue(value) && value !== null ? value : undefined;
}

/** Render the row's change-detection text with the configured serializer. */
export function serializeRow(
	deps: StrategyDeps,
	context: ContentContext,
	excluded: Set<string>,
): Result<string, SerializationError> {
	const { row, primaryKey } = context;

	const keyPairs: Array<[string, ScalarValue]> = [];
	for (const column of primaryKey) {
		const value = row[column];
		if (!isScalarValue(value)) {
			return Err(new SerializationError(`Primary key column "${column}" is not a scalar value`));
		}
		keyPairs.push([column, value]);
	}

	try {
		return Ok(
			deps.serializer.serialize({
				connectorName: deps.config.connectorName,
				primaryKey: keyPairs,
				columns: metadataColumns(row, excluded),
			}),
		);
	} catch (error) {
		return Err(new SerializationError(`Failed to serialise row ${context.docId}`, toError(error)));
	}
}
