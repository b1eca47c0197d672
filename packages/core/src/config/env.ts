import type { ConfigValidationError } from "../result/errors";
import type { Result } from "../result/result";
import type { FeedConfig } from "./types";
import { validateFeedConfig } from "./validate";

const PREFIX = "ROWFEED_";

/** Split a comma-separated list, dropping blanks. */
function splitList(value: string): string[] {
	return value
		.split(",")
		.map((item) => item.trim())
		.filter((item) => item.length > 0);
}

/**
 * Build a {@link FeedConfig} from `ROWFEED_*` environment variables.
 *
 * List variables (`ROWFEED_PRIMARY_KEYS`, `ROWFEED_SKIP_COLUMNS`) are comma-separated.
 * The result goes through {@link validateFeedConfig}.
 */
export function loadFeedConfigFromEnv(
	env: Record<string, string | undefined>,
): Result<FeedConfig, ConfigValidationError> {
	const read = (name: string): string | undefined => {
		const value = env[`${PREFIX}${name}`]?.trim();
		return value ? value : undefined;
	};

	const primaryKeys = read("PRIMARY_KEYS");
	const skipColumns = read("SKIP_COLUMNS");
	const maxContentBytes = read("MAX_CONTENT_BYTES");

	return validateFeedConfig({
		connectorName: read("CONNECTOR_NAME"),
		primaryKeys: primaryKeys ? splitList(primaryKeys) : undefined,
		skipColumns: skipColumns ? splitList(skipColumns) : undefined,
		extMetadataMode: read("EXT_METADATA_MODE"),
		lastModifiedField: read("LAST_MODIFIED_FIELD"),
		documentUrlField: read("DOCUMENT_URL_FIELD"),
		documentIdField: read("DOCUMENT_ID_FIELD"),
		baseUrl: read("BASE_URL"),
		lobField: read("LOB_FIELD"),
		fetchUrlField: read("FETCH_URL_FIELD"),
		lobMimeType: read("LOB_MIME_TYPE"),
		maxContentBytes: maxContentBytes === undefined ? undefined : Number(maxContentBytes),
	});
}
