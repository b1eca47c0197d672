import { createHash, type Hash } from "node:crypto";

/** Digest used for every checksum: 160-bit SHA-1, rendered as 40 lowercase hex characters. */
export const CHECKSUM_ALGORITHM = "sha1";

/** Start an incremental checksum. */
export function createChecksum(): Hash {
	return createHash(CHECKSUM_ALGORITHM);
}

/** Checksum of the given byte or text parts, hashed in order. Text is UTF-8 encoded. */
export function checksumOf(...parts: Array<Uint8Array | string>): string {
	const hash = createChecksum();
	for (const part of parts) {
		hash.update(part);
	}
	return hash.digest("hex");
}
