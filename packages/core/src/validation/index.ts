export { assertValidIdentifier, isValidIdentifier, quoteIdentifier } from "./identifier";
