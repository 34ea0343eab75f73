import { existsSync, readFileSync } from "node:fs";
import { ConfigurationError } from "../result/errors";
import { Err, Ok, type Result } from "../result/result";

const PLACEHOLDER_RE = /\{\{\s*([A-Za-z_][A-Za-z0-9_]*)\s*\}\}/g;

/**
 * Replace every `{{NAME}}` with `vars[NAME]`.
 *
 * Placeholders without a matching variable are left in place; use
 * {@link findUnresolvedPlaceholders} to detect them.
 */
export function expandTemplate(template: string, vars: Readonly<Record<string, string>>): string {
	let expanded = template;
	for (const [key, value] of Object.entries(vars)) {
		expanded = expanded.replaceAll(`{{${key}}}`, value);
	}
	return expanded;
}

/** Names of `{{NAME}}` placeholders still present in the text, deduplicated. */
export function findUnresolvedPlaceholders(text: string): string[] {
	const names = new Set<string>();
	for (const match of text.matchAll(PLACEHOLDER_RE)) {
		names.add(match[1]!);
	}
	return [...names];
}

/** Read a UTF-8 SQL file and expand its placeholders. */
export function loadSqlFile(
	filePath: string,
	vars: Readonly<Record<string, string>>,
): Result<string, ConfigurationError> {
	if (!existsSync(filePath)) {
		return Err(new ConfigurationError(`SQL file not found: ${filePath}`));
	}
	return Ok(expandTemplate(readFileSync(filePath, "utf-8"), vars));
}
