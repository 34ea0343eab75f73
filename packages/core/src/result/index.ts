export {
	AdapterError,
	ConfigurationError,
	IngestionAbortedError,
	LoadstoneError,
	ParseError,
	SchemaMismatchError,
	SourceResolutionError,
	toError,
} from "./errors";
export {
	Err,
	flatMapResult,
	fromPromise,
	mapResult,
	Ok,
	type Result,
	unwrapOrThrow,
} from "./result";
