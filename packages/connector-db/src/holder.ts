import type { ContentHolder, DocumentHolder, DocumentStrategy, Row } from "./types";

/** Brand carried by every holder; not exported from the package. */
export const HOLDER: unique symbol = Symbol("DocumentHolder");

/** Bundle the state of one row's build into a frozen holder. */
export function sealHolder(fields: {
	row: Row;
	primaryKey: readonly string[];
	docId: string;
	contentHolder: ContentHolder;
	strategy: DocumentStrategy;
}): DocumentHolder {
	return Object.freeze({ [HOLDER]: true as const, ...fields });
}
