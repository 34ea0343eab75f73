import { ConfigurationError, Err, Ok, type ParseError, type RawTable, type Result } from "@loadstone/core";
import { parseCsv } from "./csv";
import { parseParquet } from "./parquet";
import { type ParseOptions, TABULAR_FORMATS, type TabularFormat } from "./types";

/** Type guard for a format name read from configuration. */
export function isTabularFormat(value: string): value is TabularFormat {
	return (TABULAR_FORMATS as readonly string[]).includes(value);
}

/**
 * Infer the format from a locator's extension (`.csv`, `.parquet`),
 * ignoring any query string.
 */
export function detectFormat(locator: string): Result<TabularFormat, ConfigurationError> {
	const path = locator.split("?")[0] ?? locator;
	const dot = path.lastIndexOf(".");
	const extension = dot === -1 ? "" : path.slice(dot + 1).toLowerCase();

	if (isTabularFormat(extension)) return Ok(extension);
	return Err(
		new ConfigurationError(
			`Cannot infer a tabular format from "${locator}"; expected one of: ${TABULAR_FORMATS.join(", ")}`,
		),
	);
}

/** Parse bytes in the given format. */
export function parseTabular(
	bytes: Uint8Array,
	format: TabularFormat,
	options: ParseOptions,
): Result<RawTable, ParseError> {
	switch (format) {
		case "csv":
			return parseCsv(bytes, options);
		case "parquet":
			return parseParquet(bytes, options);
	}
}
