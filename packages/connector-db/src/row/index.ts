export { columnSet, findColumn } from "./columns";
export { freezeRow } from "./freeze";
export { type ResolvedPrimaryKey, resolvePrimaryKey } from "./primary-key";
export { isLobReference, isRowValue, isScalarValue, stringifyValue } from "./values";
