// ---------------------------------------------------------------------------
// Feed Configuration: Type Definitions
// ---------------------------------------------------------------------------

/** External-metadata modes a feed can be configured with. */
export const EXT_METADATA_MODES = ["none", "complete-url", "base-url", "lob"] as const;

/** Union of supported external-metadata mode strings. */
export type ExtMetadataMode = (typeof EXT_METADATA_MODES)[number];

/** The three ways a row can become a document. */
export type StrategyKind = "metadata" | "url" | "lob";

/** Configuration for turning source rows into feed documents. */
export interface FeedConfig {
	/** Connector name, used in synthesised display URLs. */
	connectorName: string;
	/** Ordered primary-key column names (matched case-insensitively against row columns). */
	primaryKeys: string[];
	/**
	 * Requested external-metadata mode. Unknown values, and modes whose required
	 * field is absent, fall back to `"none"` when the strategy is selected.
	 */
	extMetadataMode?: string;
	/** Columns excluded from the serialised row and from document metadata. */
	skipColumns?: string[];
	/** Column holding the row's last-modified timestamp. */
	lastModifiedField?: string;
	/** Column holding a complete document URL (`complete-url` mode). */
	documentUrlField?: string;
	/** Column holding a document ID appended to `baseUrl` (`base-url` mode). */
	documentIdField?: string;
	/** Prefix for document IDs in `base-url` mode. */
	baseUrl?: string;
	/** Column holding BLOB/CLOB content (`lob` mode). */
	lobField?: string;
	/** Column holding a display URL for LOB documents. */
	fetchUrlField?: string;
	/** MIME type used when LOB content sniffing is inconclusive. */
	lobMimeType?: string;
	/** LOB bodies larger than this many bytes are not delivered. */
	maxContentBytes?: number;
}
