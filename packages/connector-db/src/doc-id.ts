import { Err, Ok, type Result, SerializationError } from "@rowfeed/core";
import { stringifyValue } from "./row/values";
import type { ScalarValue } from "./types";

const DELIMITER = ",";
const ESCAPE = "\\";
const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

function escapeKeyValue(value: string): string {
	return value.replaceAll(ESCAPE, ESCAPE + ESCAPE).replaceAll(DELIMITER, ESCAPE + DELIMITER);
}

/**
 * Derive a document ID from primary-key values.
 *
 * The values are joined with `,` and base64-encoded. Commas and backslashes
 * inside a value are backslash-escaped first, so `["a,b", "c"]` and
 * `["a", "b,c"]` get different IDs; values without them encode as the
 * plain join (`[1, "last_01"]` → base64 of `1,last_01`).
 */
export function generateDocId(values: readonly ScalarValue[]): string {
	const joined = values.map((value) => escapeKeyValue(stringifyValue(value))).join(DELIMITER);
	return Buffer.from(joined, "utf8").toString("base64");
}

/** Recover the stringified primary-key values from a document ID. */
export function parseDocId(docId: string): Result<string[], SerializationError> {
	if (!BASE64_RE.test(docId)) {
		return Err(new SerializationError(`Document ID "${docId}" is not valid base64`));
	}

	const decoded = Buffer.from(docId, "base64").toString("utf8");
	const values: string[] = [];
	let current = "";

	for (let i = 0; i < decoded.length; i++) {
		const char = decoded.charAt(i);
		if (char === ESCAPE) {
			if (i + 1 >= decoded.length) {
				return Err(new SerializationError(`Document ID "${docId}" ends in a dangling escape`));
			}
			current += decoded.charAt(i + 1);
			i++;
		} else if (char === DELIMITER) {
			values.push(current);
			current = "";
		} else {
			current += char;
		}
	}
	values.push(current);

	return Ok(values);
}
