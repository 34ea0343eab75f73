/** Base error class for all Loadstone errors */
export class LoadstoneError extends Error {
	readonly code: string;
	override readonly cause?: Error;

	constructor(message: string, code: string, cause?: Error) {
		super(message);
		this.name = this.constructor.name;
		this.code = code;
		this.cause = cause;
	}
}

/** Missing or invalid parameter, detected before any external call */
export class ConfigurationError extends LoadstoneError {
	constructor(message: string, cause?: Error) {
		super(message, "CONFIGURATION", cause);
	}
}

/** No source could be resolved for the run (empty listing, no candidates) */
export class SourceResolutionError extends LoadstoneError {
	constructor(message: string, cause?: Error) {
		super(message, "SOURCE_RESOLUTION", cause);
	}
}

/** Source columns share nothing with the destination schema */
export class SchemaMismatchError extends LoadstoneError {
	constructor(message: string, cause?: Error) {
		super(message, "SCHEMA_MISMATCH", cause);
	}
}

/** Tabular bytes could not be decoded or parsed */
export class ParseError extends LoadstoneError {
	constructor(message: string, cause?: Error) {
		super(message, "PARSE_FAILED", cause);
	}
}

/** External collaborator (table store, object store, download API) failure */
export class AdapterError extends LoadstoneError {
	constructor(message: string, cause?: Error) {
		super(message, "ADAPTER_ERROR", cause);
	}
}

/** Run interrupted between sources */
export class IngestionAbortedError extends LoadstoneError {
	constructor(message: string, cause?: Error) {
		super(message, "ABORTED", cause);
	}
}

/** Coerce an unknown thrown value into an Error instance. */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
