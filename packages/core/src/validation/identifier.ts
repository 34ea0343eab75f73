import { ConfigurationError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";

/** Valid identifier segment: starts with letter or underscore, alphanumeric + underscore, max 64 chars. */
const IDENTIFIER_RE = /^[a-zA-Z_][a-zA-Z0-9_]{0,63}$/;

/**
 * Check whether a string is a valid table reference.
 *
 * Accepts `table` or `database.table`, where each segment starts with a
 * letter or underscore and contains only alphanumeric characters and
 * underscores.
 */
export function isValidTableName(name: string): boolean {
	const segments = name.split(".");
	return segments.length <= 2 && segments.every((segment) => IDENTIFIER_RE.test(segment));
}

/**
 * Assert that a table reference is safe to interpolate into a statement.
 *
 * @returns Ok(name) if valid, Err(ConfigurationError) if invalid
 */
export function assertValidTableName(name: string): Result<string, ConfigurationError> {
	if (isValidTableName(name)) {
		return Ok(name);
	}
	return Err(
		new ConfigurationError(
			`Invalid table name: "${name}". Use "table" or "database.table" with letters, digits and underscores only.`,
		),
	);
}

/**
 * Quote a column identifier with backticks, escaping embedded backticks
 * and backslashes.
 */
export function quoteIdentifier(name: string): string {
	return `\`${name.replace(/\\/g, "\\\\").replace(/`/g, "\\`")}\``;
}
