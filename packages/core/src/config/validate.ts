import { ConfigValidationError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";
import type { FeedConfig } from "./types";

const OPTIONAL_STRING_FIELDS = [
	"extMetadataMode",
	"lastModifiedField",
	"documentUrlField",
	"documentIdField",
	"baseUrl",
	"lobField",
	"fetchUrlField",
	"lobMimeType",
] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a feed configuration for structural correctness.
 *
 * Checks:
 * - `connectorName` is a non-empty string
 * - `primaryKeys` is a non-empty array of non-empty strings
 * - `skipColumns`, when present, is an array of strings
 * - Optional column/URL fields are non-empty strings when present
 * - `maxContentBytes`, when present, is a positive integer
 *
 * Whether the requested mode has the field it needs is not checked here:
 * strategy selection falls back to metadata mode instead.
 *
 * @param input - Raw input to validate.
 * @returns The validated {@link FeedConfig} or a validation error.
 */
export function validateFeedConfig(input: unknown): Result<FeedConfig, ConfigValidationError> {
	if (!isRecord(input)) {
		return Err(new ConfigValidationError("Feed config must be an object"));
	}
	const obj = input;

	// --- connectorName ---
	const connectorName = obj.connectorName;
	if (typeof connectorName !== "string" || connectorName.length === 0) {
		return Err(new ConfigValidationError("connectorName must be a non-empty string"));
	}

	// --- primaryKeys ---
	const primaryKeys = obj.primaryKeys;
	if (!Array.isArray(primaryKeys) || primaryKeys.length === 0) {
		return Err(new ConfigValidationError("primaryKeys must be a non-empty array"));
	}
	const keys: string[] = [];
	for (let i = 0; i < primaryKeys.length; i++) {
		const key: unknown = primaryKeys[i];
		if (typeof key !== "string" || key.length === 0) {
			return Err(new ConfigValidationError(`primaryKeys[${i}] must be a non-empty string`));
		}
		keys.push(key);
	}

	// --- skipColumns ---
	const skipColumns: string[] = [];
	if (obj.skipColumns !== undefined) {
		const raw = obj.skipColumns;
		if (!Array.isArray(raw)) {
			return Err(new ConfigValidationError("skipColumns must be an array"));
		}
		for (const column of raw) {
			if (typeof column !== "string") {
				return Err(new ConfigValidationError("skipColumns entries must be strings"));
			}
			skipColumns.push(column);
		}
	}

	const config: FeedConfig = { connectorName, primaryKeys: keys, skipColumns };

	// --- optional string fields ---
	for (const field of OPTIONAL_STRING_FIELDS) {
		const value = obj[field];
		if (value === undefined) continue;
		if (typeof value !== "string" || value.length === 0) {
			return Err(new ConfigValidationError(`${field} must be a non-empty string when provided`));
		}
		config[field] = value;
	}

	// --- maxContentBytes ---
	if (obj.maxContentBytes !== undefined) {
		const max = obj.maxContentBytes;
		if (typeof max !== "number" || !Number.isInteger(max) || max <= 0) {
			return Err(new ConfigValidationError("maxContentBytes must be a positive integer"));
		}
		config.maxContentBytes = max;
	}

	return Ok(config);
}
