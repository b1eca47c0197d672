import { stringifyValue } from "./row/values";
import type { ScalarValue } from "./types";

/** What a serializer is given for one row. */
export interface SerializerInput {
	readonly connectorName: string;
	/** Primary-key columns and values, in key order. */
	readonly primaryKey: ReadonlyArray<readonly [column: string, value: ScalarValue]>;
	/** Columns that take part in change detection, in row order. */
	readonly columns: ReadonlyArray<readonly [column: string, value: ScalarValue]>;
}

/**
 * Renders a row into the canonical text its checksum is computed over.
 *
 * Must be deterministic: the same input always yields the same text.
 */
export interface RowSerializer {
	serialize(input: SerializerInput): string;
}

const HTML_ESCAPES: Record<string, string> = {
	"&": "&amp;",
	"<": "&lt;",
	">": "&gt;",
	'"': "&quot;",
};

function escapeHtml(text: string): string {
	return text.replace(/[&<>"]/g, (char) => HTML_ESCAPES[char] ?? char);
}

function pair([column, value]: readonly [string, ScalarValue]): string {
	return `${escapeHtml(column)}=${escapeHtml(stringifyValue(value))}`;
}

/**
 * Default serializer: a small HTML page with the primary key in the title
 * and one `column=value` paragraph per column.
 *
 * ```html
 * <html>
 * <head><title>orders id=1</title></head>
 * <body>
 * <p>id=1</p>
 * <p>status=open</p>
 * </body>
 * </html>
 * ```
 */
export const htmlRowSerializer: RowSerializer = {
	serialize({ connectorName, primaryKey, columns }) {
		const title = [escapeHtml(connectorName), ...primaryKey.map(pair)].join(" ");
		return [
			"<html>",
			`<head><title>${title}</title></head>`,
			"<body>",
			...columns.map((column) => `<p>${pair(column)}</p>`),
			"</body>",
			"</html>",
		].join("\n");
	},
};
