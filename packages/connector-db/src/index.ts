export { readContent } from "./content";
export { generateDocId, parseDocId } from "./doc-id";
export {
	buildDocument,
	buildHandle,
	buildSnapshot,
	createDocumentBuilder,
	type DocumentBuilder,
	type DocumentBuilderOptions,
} from "./document-builder";
export { BLOB_MIME_TYPE, CLOB_MIME_TYPE, detectMimeType } from "./lob/sniff";
export { freezeRow, type ResolvedPrimaryKey, resolvePrimaryKey, stringifyValue } from "./row";
export { type StrategySelection, selectStrategy } from "./select-strategy";
export { htmlRowSerializer, type RowSerializer, type SerializerInput } from "./serializer";
export { CHECKSUM_FIELD, createSnapshot, DOCID_FIELD, parseSnapshot } from "./snapshot";
export {
	DISPLAY_URL_SCHEME,
	displayUrlFor,
	LobStrategy,
	METADATA_MIME_TYPE,
	MetadataStrategy,
	type Strategy,
	type StrategyDeps,
	type UrlType,
	UrlStrategy,
} from "./strategies";
export type {
	ContentContext,
	ContentHolder,
	DocumentContent,
	DocumentHolder,
	DocumentStrategy,
	FeedDocument,
	Handle,
	HolderContent,
	LobReference,
	Row,
	RowValue,
	ScalarValue,
	Snapshot,
	SnapshotResult,
} from "./types";
