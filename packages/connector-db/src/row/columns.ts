import type { Row } from "../types";

/**
 * Find the row column matching a configured name.
 *
 * Databases disagree on identifier case, so an exact match wins and a
 * case-insensitive match is accepted otherwise.
 */
export function findColumn(row: Row, name: string): string | undefined {
	if (Object.hasOwn(row, name)) return name;
	const lower = name.toLowerCase();
	return Object.keys(row).find((column) => column.toLowerCase() === lower);
}

/**
 * Set an own, enumerable property. Plain assignment would route a column
 * named `__proto__` to the prototype setter and drop it.
 */
export function defineColumn<T>(record: Record<string, T>, column: string, value: T): void {
	Object.defineProperty(record, column, {
		value,
		enumerable: true,
		writable: true,
		configurable: true,
	});
}

/** Case-insensitive membership set for configured column names. */
export function columnSet(names: Iterable<string | undefined>): Set<string> {
	const set = new Set<string>();
	for (const name of names) {
		if (name) set.add(name.toLowerCase());
	}
	return set;
}
