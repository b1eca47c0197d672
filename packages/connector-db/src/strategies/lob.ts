import { Readable } from "node:stream";
import { type DocumentError, Ok, type Result } from "@rowfeed/core";
import { createChecksum } from "../checksum";
import { detectMimeType } from "../lob/sniff";
import { hashLobReference, openLobReference } from "../lob/stream";
import { findColumn } from "../row/columns";
import { isLobReference, stringifyValue } from "../row/values";
import type {
	ContentContext,
	ContentHolder,
	DocumentContent,
	DocumentHolder,
	DocumentStrategy,
	FeedDocument,
	HolderContent,
	LobReference,
	Row,
} from "../types";
import {
	displayUrlFor,
	excludedColumns,
	lastModifiedOf,
	metadataProperties,
	type StrategyDeps,
	scalarColumn,
	serializeRow,
} from "./shared";

/**
 * Content feed for BLOB/CLOB columns.
 *
 * The checksum covers the LOB bytes followed by the serialised metadata, so
 * a change to either re-sends the document.
 *
 * Byte and string values arrive fully materialised and are kept in the
 * holder. {@link LobReference} values are streamed through the hash while
 * the snapshot is built and re-opened when the handle is built.
 */
export class LobStrategy implements DocumentStrategy {
	readonly kind = "lob" as const;
	private readonly excluded: Set<string>;

	constructor(private readonly deps: StrategyDeps) {
		this.excluded = excludedColumns(deps.config);
	}

	async buildContent(context: ContentContext): Promise<Result<ContentHolder, DocumentError>> {
		const text = serializeRow(this.deps, context, this.excluded);
		if (!text.ok) return text;

		const { lobMimeType } = this.deps.config;
		const value = this.lobValue(context.row);
		const hash = createChecksum();

		if (value === null) {
			hash.update(text.value);
			return Ok({ checksum: hash.digest("hex") });
		}

		if (isLobReference(value)) {
			const hashed = await hashLobReference(value, hash, context.docId);
			if (!hashed.ok) return hashed;
			hash.update(text.value);

			const mimeType = await detectMimeType(hashed.value.head, {
				override: lobMimeType,
				character: value.character === true,
			});
			return Ok({
				checksum: hash.digest("hex"),
				content: this.limit(context.docId, hashed.value.sizeBytes, {
					kind: "reference",
					reference: value,
					sizeBytes: hashed.value.sizeBytes,
				}),
				mimeType,
			});
		}

		const character = typeof value === "string";
		const bytes = character ? Buffer.from(value, "utf8") : value;
		hash.update(bytes);
		hash.update(text.value);

		const mimeType = await detectMimeType(bytes, { override: lobMimeType, character });
		return Ok({
			checksum: hash.digest("hex"),
			content: this.limit(context.docId, bytes.byteLength, { kind: "bytes", bytes }),
			mimeType,
		});
	}

	async buildDocument(holder: DocumentHolder): Promise<Result<FeedDocument, DocumentError>> {
		const { row, docId, contentHolder } = holder;
		const { config } = this.deps;

		let content: DocumentContent | undefined;
		const captured = contentHolder.content;
		if (captured?.kind === "bytes") {
			content = {
				kind: "stream",
				stream: Readable.from([Buffer.from(captured.bytes)]),
				sizeBytes: captured.bytes.byteLength,
			};
		} else if (captured?.kind === "reference") {
			const stream = await openLobReference(captured.reference, docId);
			if (!stream.ok) return stream;
			content = { kind: "stream", stream: stream.value, sizeBytes: captured.sizeBytes };
		}

		const fetchUrl = scalarColumn(row, config.fetchUrlField);

		return Ok({
			docId,
			properties: metadataProperties(row, this.excluded),
			displayUrl:
				fetchUrl === undefined
					? displayUrlFor(config.connectorName, docId)
					: stringifyValue(fetchUrl),
			lastModified: lastModifiedOf(row, config),
			mimeType: contentHolder.mimeType,
			content,
		});
	}

	/**
	 * LOB column value: a string (CLOB), bytes (BLOB), a reference, or null
	 * when the column is absent or empty. Other scalars are read as text.
	 */
	private lobValue(row: Row): string | Uint8Array | LobReference | null {
		const name = this.deps.config.lobField;
		const column = name === undefined ? undefined : findColumn(row, name);
		if (column === undefined) return null;

		const value = row[column];
		if (value === undefined || value === null) return null;
		if (typeof value === "string" || value instanceof Uint8Array || isLobReference(value)) {
			return value;
		}
		return stringifyValue(value);
	}

	/** Swap content for a skipped marker when it is over the configured size limit. */
	private limit(docId: string, sizeBytes: number, content: HolderContent): HolderContent {
		const max = this.deps.config.maxContentBytes;
		if (max === undefined || sizeBytes <= max) return content;

		this.deps.events({ type: "lob.content_skipped", docId, sizeBytes, maxContentBytes: max });
		return { kind: "skipped", sizeBytes };
	}
}
