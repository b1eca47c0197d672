// ---------------------------------------------------------------------------
// Row to Document: Type Definitions
// ---------------------------------------------------------------------------

import type { Readable } from "node:stream";
import type { DocumentError, Result, StrategyKind } from "@rowfeed/core";
import { HOLDER } from "./holder";

/** Scalar column values a row may hold. */
export type ScalarValue = string | number | bigint | boolean | Date | null;

/**
 * Re-openable handle to large-object content.
 *
 * Every call to `open()` must return a fresh stream positioned at the start
 * of the content: the stream read while the snapshot is built is closed
 * before the handle re-opens it.
 */
export interface LobReference {
	readonly kind: "lob-reference";
	/** Character (CLOB) content; unsniffable text then defaults to `text/plain`. */
	readonly character?: boolean;
	open(): Promise<Readable>;
}

/** Any value a row column may hold. */
export type RowValue = ScalarValue | Uint8Array | LobReference;

/** One source record. Frozen once it enters the builder. */
export type Row = Readonly<Record<string, RowValue>>;

/** Content captured while the snapshot is built, consumed again by the handle. */
export type HolderContent =
	| { kind: "text"; text: string }
	| { kind: "url"; url: string }
	| { kind: "bytes"; bytes: Uint8Array }
	| { kind: "reference"; reference: LobReference; sizeBytes: number }
	| { kind: "skipped"; sizeBytes: number };

/** Checksum plus whatever content the strategy needs to build the document later. */
export interface ContentHolder {
	/** 40-character lowercase hex SHA-1. */
	readonly checksum: string;
	readonly content?: HolderContent;
	readonly mimeType?: string;
}

/** Body of a delivered document. */
export type DocumentContent =
	| { kind: "text"; text: string }
	| { kind: "stream"; stream: Readable; sizeBytes: number };

/** The deliverable document a handle wraps. The checksum is never one of its properties. */
export interface FeedDocument {
	readonly docId: string;
	/** Stringified non-skipped column values. */
	readonly properties: Readonly<Record<string, string>>;
	readonly displayUrl: string;
	/** URL the indexer should fetch (URL strategies only). */
	readonly searchUrl?: string;
	readonly lastModified?: Date;
	readonly mimeType?: string;
	readonly content?: DocumentContent;
}

/** Input to {@link DocumentStrategy.buildContent}. */
export interface ContentContext {
	readonly row: Row;
	readonly primaryKey: readonly string[];
	readonly docId: string;
}

/**
 * Row → document policy.
 *
 * Implementations hold no per-row state and may be shared across
 * concurrent builds.
 */
export interface DocumentStrategy {
	readonly kind: StrategyKind;
	/** Compute the checksum and capture the content the document will need. */
	buildContent(context: ContentContext): Promise<Result<ContentHolder, DocumentError>>;
	/** Assemble the deliverable document from a holder this strategy produced. */
	buildDocument(holder: DocumentHolder): Promise<Result<FeedDocument, DocumentError>>;
}

/**
 * Everything needed to turn a snapshot into its handle.
 *
 * Only `buildSnapshot` creates holders, so a handle can never be requested
 * for a row whose snapshot was not built first.
 */
export interface DocumentHolder {
	readonly [HOLDER]: true;
	readonly row: Row;
	readonly primaryKey: readonly string[];
	readonly docId: string;
	readonly contentHolder: ContentHolder;
	readonly strategy: DocumentStrategy;
}

/** Change-detection record compared across traversal passes. */
export interface Snapshot {
	readonly docId: string;
	readonly checksum: string;
	/** Canonical `{"google:docid":…,"google:sum":…}` form. */
	readonly json: string;
}

/** Deliverable payload, built only when a snapshot changed. */
export interface Handle {
	readonly docId: string;
	readonly document: FeedDocument;
}

/** Output of `buildSnapshot`. */
export interface SnapshotResult {
	readonly snapshot: Snapshot;
	readonly holder: DocumentHolder;
}
