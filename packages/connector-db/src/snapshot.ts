import { EncodingInvariantError, Err, Ok, type Result, SerializationError, toError } from "@rowfeed/core";
import stableStringify from "fast-json-stable-stringify";
import type { FeedDocument, Handle, Snapshot } from "./types";

/** Snapshot key holding the document ID. */
export const DOCID_FIELD = "google:docid";

/** Snapshot key holding the row checksum. */
export const CHECKSUM_FIELD = "google:sum";

const CHECKSUM_RE = /^[0-9a-f]{40}$/;

/**
 * Build the change-detection record for a row.
 *
 * The JSON form always has exactly two keys. Keys are written in sorted
 * order, which puts the document ID first.
 *
 * @throws EncodingInvariantError if the two-field object cannot be encoded
 */
export function createSnapshot(docId: string, checksum: string): Snapshot {
	let json: string;
	try {
		json = stableStringify({ [CHECKSUM_FIELD]: checksum, [DOCID_FIELD]: docId });
	} catch (error) {
		throw new EncodingInvariantError(`Failed to encode snapshot for ${docId}`, toError(error));
	}
	return Object.freeze({ docId, checksum, json });
}

/**
 * Read a persisted snapshot back.
 *
 * Accepts only the canonical two-key object with a 40-character hex checksum.
 */
export function parseSnapshot(json: string): Result<Snapshot, SerializationError> {
	let parsed: unknown;
	try {
		parsed = JSON.parse(json);
	} catch (error) {
		return Err(new SerializationError("Snapshot is not valid JSON", toError(error)));
	}

	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
		return Err(new SerializationError("Snapshot must be a JSON object"));
	}

	const keys = Object.keys(parsed);
	if (keys.length !== 2 || keys[0] !== DOCID_FIELD || keys[1] !== CHECKSUM_FIELD) {
		return Err(
			new SerializationError(`Snapshot must contain exactly "${DOCID_FIELD}" and "${CHECKSUM_FIELD}"`),
		);
	}

	const fields = new Map<string, unknown>(Object.entries(parsed));
	const docId = fields.get(DOCID_FIELD);
	const checksum = fields.get(CHECKSUM_FIELD);
	if (typeof docId !== "string" || docId.length === 0) {
		return Err(new SerializationError("Snapshot document ID must be a non-empty string"));
	}
	if (typeof checksum !== "string" || !CHECKSUM_RE.test(checksum)) {
		return Err(new SerializationError("Snapshot checksum must be 40 lowercase hex characters"));
	}

	return Ok(createSnapshot(docId, checksum));
}

/** Wrap a strategy-built document. */
export function createHandle(document: FeedDocument): Handle {
	return Object.freeze({ docId: document.docId, document });
}
