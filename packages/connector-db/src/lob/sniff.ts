import { fileTypeFromBuffer } from "file-type";

/** Bytes of content needed to recognise every format `file-type` knows. */
export const SNIFF_BYTES = 4100;

/** MIME type for character LOBs when nothing better is known. */
export const CLOB_MIME_TYPE = "text/plain";

/** MIME type for binary LOBs when nothing better is known. */
export const BLOB_MIME_TYPE = "application/octet-stream";

/**
 * Determine the MIME type of LOB content.
 *
 * Order: the magic bytes at the start of the content, then the configured
 * override, then a text or binary default.
 */
export async function detectMimeType(
	head: Uint8Array,
	options: { override?: string; character: boolean },
): Promise<string> {
	if (head.byteLength > 0) {
		const detected = await fileTypeFromBuffer(head.subarray(0, SNIFF_BYTES));
		if (detected) return detected.mime;
	}
	return options.override ?? (options.character ? CLOB_MIME_TYPE : BLOB_MIME_TYPE);
}
