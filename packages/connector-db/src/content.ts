import { ContentAcquisitionError, Err, Ok, type Result, toError } from "@rowfeed/core";
import type { FeedDocument } from "./types";

/**
 * Collect a document body into memory.
 *
 * Meant for small bodies and tests; indexers should consume the stream.
 * Returns an empty buffer for documents without a body.
 */
export async function readContent(
	document: FeedDocument,
): Promise<Result<Buffer, ContentAcquisitionError>> {
	const content = document.content;
	if (content === undefined) return Ok(Buffer.alloc(0));
	if (content.kind === "text") return Ok(Buffer.from(content.text, "utf8"));

	const chunks: Buffer[] = [];
	try {
		const stream: AsyncIterable<unknown> = content.stream;
		for await (const chunk of stream) {
			if (typeof chunk === "string") chunks.push(Buffer.from(chunk, "utf8"));
			else if (chunk instanceof Uint8Array) chunks.push(Buffer.from(chunk));
		}
	} catch (error) {
		return Err(
			new ContentAcquisitionError(`Failed to read content of ${document.docId}`, toError(error)),
		);
	}
	return Ok(Buffer.concat(chunks));
}
