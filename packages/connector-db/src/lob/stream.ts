import type { Hash } from "node:crypto";
import type { Readable } from "node:stream";
import { ContentAcquisitionError, Err, Ok, type Result, toError } from "@rowfeed/core";
import type { LobReference } from "../types";
import { SNIFF_BYTES } from "./sniff";

/** Result of reading a LOB stream through a hash. */
export interface HashedStream {
	/** Total bytes read. */
	sizeBytes: number;
	/** First bytes of the content, for MIME sniffing. */
	head: Uint8Array;
}

function toChunk(chunk: unknown): Uint8Array | undefined {
	if (typeof chunk === "string") return Buffer.from(chunk, "utf8");
	if (chunk instanceof Uint8Array) return chunk;
	return undefined;
}

/**
 * Open a LOB reference, feed every byte to `hash`, and close the stream.
 *
 * The stream is destroyed on every exit path, including read and hash
 * failures. Nothing but the first {@link SNIFF_BYTES} bytes is kept.
 */
export async function hashLobReference(
	reference: LobReference,
	hash: Hash,
	label: string,
): Promise<Result<HashedStream, ContentAcquisitionError>> {
	let stream: Readable;
	try {
		stream = await reference.open();
	} catch (error) {
		return Err(new ContentAcquisitionError(`Failed to open LOB for ${label}`, toError(error)));
	}

	const headChunks: Uint8Array[] = [];
	let headBytes = 0;
	let sizeBytes = 0;

	try {
		const chunks: AsyncIterable<unknown> = stream;
		for await (const raw of chunks) {
			const chunk = toChunk(raw);
			if (chunk === undefined) {
				return Err(new ContentAcquisitionError(`LOB stream for ${label} produced a non-byte chunk`));
			}
			hash.update(chunk);
			sizeBytes += chunk.byteLength;
			if (headBytes < SNIFF_BYTES) {
				const take = chunk.subarray(0, SNIFF_BYTES - headBytes);
				headChunks.push(take);
				headBytes += take.byteLength;
			}
		}
	} catch (error) {
		return Err(new ContentAcquisitionError(`Failed to read LOB for ${label}`, toError(error)));
	} finally {
		stream.destroy();
	}

	return Ok({ sizeBytes, head: Buffer.concat(headChunks) });
}

/** Re-open a LOB reference for delivery. */
export async function openLobReference(
	reference: LobReference,
	label: string,
): Promise<Result<Readable, ContentAcquisitionError>> {
	try {
		return Ok(await reference.open());
	} catch (error) {
		return Err(new ContentAcquisitionError(`Failed to open LOB for ${label}`, toError(error)));
	}
}
