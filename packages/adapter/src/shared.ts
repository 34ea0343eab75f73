import { AdapterError, Err, Ok, type Result } from "@loadstone/core";

/** Normalise a caught value into an Error or undefined. */
export function toCause(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined;
}

/** Execute an async operation and wrap errors into an AdapterError Result. */
export async function wrapAsync<T>(
	operation: () => Promise<T>,
	errorMessage: string,
): Promise<Result<T, AdapterError>> {
	try {
		const value = await operation();
		return Ok(value);
	} catch (error) {
		if (error instanceof AdapterError) {
			return Err(error);
		}
		const cause = toCause(error);
		const detail = cause ? `: ${cause.message}` : "";
		return Err(new AdapterError(`${errorMessage}${detail}`, cause));
	}
}

/** Read a string property from an untyped JSON object. */
export function readString(value: unknown, key: string): string | undefined {
	if (typeof value !== "object" || value === null) return undefined;
	const field: unknown = Reflect.get(value, key);
	return typeof field === "string" ? field : undefined;
}
