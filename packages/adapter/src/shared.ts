import { AdapterError, Err, Ok, type Result, toError } from "@rowfeed/core";

/**
 * Run a database call and return its value as a Result. An AdapterError
 * thrown inside `query` is passed through; anything else is wrapped with
 * `message`.
 */
export async function wrapQuery<T>(
	query: () => Promise<T>,
	message: string,
): Promise<Result<T, AdapterError>> {
	try {
		return Ok(await query());
	} catch (error) {
		return Err(error instanceof AdapterError ? error : new AdapterError(message, toError(error)));
	}
}
