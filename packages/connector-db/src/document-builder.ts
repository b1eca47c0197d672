import {
	combineEventSinks,
	type DocumentError,
	defaultLogger,
	type EventSink,
	type ExtMetadataMode,
	type FeedConfig,
	type Logger,
	loggingEventSink,
	Ok,
	type Result,
} from "@rowfeed/core";
import { generateDocId } from "./doc-id";
import { sealHolder } from "./holder";
import { freezeRow } from "./row/freeze";
import { resolvePrimaryKey } from "./row/primary-key";
import { selectStrategy } from "./select-strategy";
import { htmlRowSerializer, type RowSerializer } from "./serializer";
import { createHandle, createSnapshot } from "./snapshot";
import type { Strategy } from "./strategies";
import type { DocumentHolder, Handle, SnapshotResult } from "./types";

/** Optional collaborators for {@link createDocumentBuilder}. */
export interface DocumentBuilderOptions {
	/** Log sink (default: console). Every event is logged. */
	logger?: Logger;
	/** Extra receiver for structured events, alongside the logger. */
	events?: EventSink;
	/** Row → text renderer used for checksums and metadata bodies (default: HTML). */
	serializer?: RowSerializer;
}

/** A feed config with its strategy resolved once. */
export interface DocumentBuilder {
	readonly config: FeedConfig;
	/** Effective mode after any fallback. */
	readonly mode: ExtMetadataMode;
	readonly strategy: Strategy;
}

/**
 * Resolve the strategy for a feed. Call once per connector and reuse the
 * builder for every row.
 */
export function createDocumentBuilder(
	config: FeedConfig,
	options: DocumentBuilderOptions = {},
): DocumentBuilder {
	const logged = loggingEventSink(options.logger ?? defaultLogger);
	const events = options.events ? combineEventSinks(logged, options.events) : logged;
	const { strategy, mode } = selectStrategy({
		config,
		serializer: options.serializer ?? htmlRowSerializer,
		events,
	});
	return Object.freeze({ config, mode, strategy });
}

/**
 * Build the snapshot for one row, plus the holder its handle is later built from.
 *
 * 1. Copy and freeze the row
 * 2. Resolve the primary key and derive the document ID
 * 3. Let the strategy compute the checksum and capture content
 * 4. Encode the two-field snapshot
 */
export async function buildSnapshot(
	builder: DocumentBuilder,
	input: Readonly<Record<string, unknown>>,
): Promise<Result<SnapshotResult, DocumentError>> {
	const row = freezeRow(input);
	if (!row.ok) return row;

	const primaryKey = resolvePrimaryKey(builder.config.primaryKeys, row.value);
	if (!primaryKey.ok) return primaryKey;

	const docId = generateDocId(primaryKey.value.values);
	const context = { row: row.value, primaryKey: primaryKey.value.columns, docId };

	const contentHolder = await builder.strategy.buildContent(context);
	if (!contentHolder.ok) return contentHolder;

	return Ok({
		snapshot: createSnapshot(docId, contentHolder.value.checksum),
		holder: sealHolder({ ...context, contentHolder: contentHolder.value, strategy: builder.strategy }),
	});
}

/** Build the deliverable document for a row whose snapshot changed. */
export async function buildHandle(holder: DocumentHolder): Promise<Result<Handle, DocumentError>> {
	const document = await holder.strategy.buildDocument(holder);
	if (!document.ok) return document;
	return Ok(createHandle(document.value));
}

/** Snapshot and handle in one step, for callers that always deliver. */
export async function buildDocument(
	builder: DocumentBuilder,
	input: Readonly<Record<string, unknown>>,
): Promise<Result<Handle, DocumentError>> {
	const built = await buildSnapshot(builder, input);
	if (!built.ok) return built;
	return buildHandle(built.value.holder);
}
