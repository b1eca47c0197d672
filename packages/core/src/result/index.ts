export {
	AdapterError,
	ConfigValidationError,
	ContentAcquisitionError,
	type DocumentError,
	EncodingInvariantError,
	MissingPrimaryKeyError,
	RowfeedError,
	SerializationError,
	toError,
} from "./errors";
export { Err, Ok, type Result } from "./result";
