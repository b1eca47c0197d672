import { ConfigValidationError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";

/** Letter or underscore first, then alphanumerics and underscores, at most 64 characters. */
const IDENTIFIER_RE = /^[a-zA-Z_][a-zA-Z0-9_]{0,63}$/;

/** Whether a table or column name can be interpolated into generated SQL. */
export function isValidIdentifier(name: string): boolean {
	return IDENTIFIER_RE.test(name);
}

/**
 * Check a table or column name before it is used to build a query.
 *
 * @returns Ok(undefined) if valid, Err(ConfigValidationError) otherwise
 */
export function assertValidIdentifier(name: string): Result<void, ConfigValidationError> {
	if (isValidIdentifier(name)) {
		return Ok(undefined);
	}
	return Err(
		new ConfigValidationError(
			`Invalid SQL identifier: "${name}". Identifiers must start with a letter or underscore, contain only alphanumeric characters and underscores, and be at most 64 characters long.`,
		),
	);
}

/** Double-quote an identifier, doubling any embedded quotes. */
export function quoteIdentifier(name: string): string {
	return `"${name.replace(/"/g, '""')}"`;
}
