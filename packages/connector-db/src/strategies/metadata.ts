import { type DocumentError, Ok, type Result } from "@rowfeed/core";
import { checksumOf } from "../checksum";
import type {
	ContentContext,
	ContentHolder,
	DocumentHolder,
	DocumentStrategy,
	FeedDocument,
} from "../types";
import {
	displayUrlFor,
	excludedColumns,
	lastModifiedOf,
	metadataProperties,
	type StrategyDeps,
	serializeRow,
} from "./shared";

/** MIME type of documents whose body is the serialised row. */
export const METADATA_MIME_TYPE = "text/html";

/**
 * Content feed for plain rows: the serialised row is both the checksum
 * input and the document body.
 */
export class MetadataStrategy implements DocumentStrategy {
	readonly kind = "metadata" as const;
	private readonly excluded: Set<string>;

	constructor(private readonly deps: StrategyDeps) {
		this.excluded = excludedColumns(deps.config);
	}

	async buildContent(context: ContentContext): Promise<Result<ContentHolder, DocumentError>> {
		const text = serializeRow(this.deps, context, this.excluded);
		if (!text.ok) return text;

		return Ok({
			checksum: checksumOf(text.value),
			content: { kind: "text", text: text.value },
			mimeType: METADATA_MIME_TYPE,
		});
	}

	async buildDocument(holder: DocumentHolder): Promise<Result<FeedDocument, DocumentError>> {
		const { row, docId, contentHolder } = holder;
		const content = contentHolder.content;

		return Ok({
			docId,
			properties: metadataProperties(row, this.excluded),
			displayUrl: displayUrlFor(this.deps.config.connectorName, docId),
			lastModified: lastModifiedOf(row, this.deps.config),
			mimeType: contentHolder.mimeType,
			content: content?.kind === "text" ? { kind: "text", text: content.text } : undefined,
		});
	}
}
