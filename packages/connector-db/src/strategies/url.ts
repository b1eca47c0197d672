import { type DocumentError, Err, Ok, type Result, SerializationError } from "@rowfeed/core";
import { checksumOf } from "../checksum";
import { stringifyValue } from "../row/values";
import type {
	ContentContext,
	ContentHolder,
	DocumentHolder,
	DocumentStrategy,
	FeedDocument,
	Row,
} from "../types";
import {
	excludedColumns,
	lastModifiedOf,
	metadataProperties,
	type StrategyDeps,
	scalarColumn,
	serializeRow,
} from "./shared";

/** How the document URL is derived from the row. */
export type UrlType = "complete-url" | "base-url";

/**
 * External-metadata feed: documents carry a URL for the indexer to fetch
 * instead of a body.
 *
 * The checksum still covers the whole serialised row, so any column change
 * re-sends the metadata, not only a change of the URL.
 */
export class UrlStrategy implements DocumentStrategy {
	readonly kind = "url" as const;
	private readonly excluded: Set<string>;

	constructor(
		private readonly deps: StrategyDeps,
		readonly urlType: UrlType,
	) {
		this.excluded = excludedColumns(deps.config);
	}

	async buildContent(context: ContentContext): Promise<Result<ContentHolder, DocumentError>> {
		const url = this.resolveUrl(context.row, context.docId);
		if (!url.ok) return url;

		const text = serializeRow(this.deps, context, this.excluded);
		if (!text.ok) return text;

		return Ok({
			checksum: checksumOf(text.value),
			content: { kind: "url", url: url.value },
		});
	}

	async buildDocument(holder: DocumentHolder): Promise<Result<FeedDocument, DocumentError>> {
		const { row, docId, contentHolder } = holder;
		const content = contentHolder.content;
		if (content?.kind !== "url") {
			return Err(new SerializationError(`No document URL was captured for ${docId}`));
		}

		return Ok({
			docId,
			properties: metadataProperties(row, this.excluded),
			displayUrl: content.url,
			searchUrl: content.url,
			lastModified: lastModifiedOf(row, this.deps.config),
		});
	}

	private resolveUrl(row: Row, docId: string): Result<string, SerializationError> {
		const { config } = this.deps;

		if (this.urlType === "complete-url") {
			const value = scalarColumn(row, config.documentUrlField);
			if (value === undefined) {
				return Err(
					new SerializationError(`Row ${docId} has no value in URL column "${config.documentUrlField}"`),
				);
			}
			return Ok(stringifyValue(value));
		}

		const value = scalarColumn(row, config.documentIdField);
		if (value === undefined) {
			return Err(
				new SerializationError(
					`Row ${docId} has no value in document ID column "${config.documentIdField}"`,
				),
			);
		}
		return Ok(`${config.baseUrl ?? ""}${stringifyValue(value)}`);
	}
}
