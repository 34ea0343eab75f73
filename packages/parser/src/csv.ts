import { Err, Ok, ParseError, type RawTable, type Result, toError } from "@loadstone/core";
import Papa from "papaparse";
import type { ParseOptions } from "./types";

/**
 * Parse comma-separated UTF-8 text into a header and raw rows.
 *
 * Double-quoted fields may contain commas and newlines. Blank lines are
 * skipped; records with a different field count than the header are kept
 * as they are. Once `rowCap` data rows have been read the rest is dropped
 * and a warning is emitted.
 */
export function parseCsv(bytes: Uint8Array, options: ParseOptions): Result<RawTable, ParseError> {
	let text: string;
	try {
		text = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
	} catch (error) {
		return Err(new ParseError("Source is not valid UTF-8", toError(error)));
	}

	// Header plus one row beyond the cap, so truncation can be detected.
	// Counted after blank lines are skipped.
	const limit = options.rowCap + 2;
	const parsed: string[][] = [];
	const errors: { message: string; row?: number }[] = [];
	Papa.parse<string[]>(text, {
		delimiter: ",",
		skipEmptyLines: true,
		step(results, parser) {
			errors.push(...results.errors);
			parsed.push(results.data);
			if (parsed.length >= limit) parser.abort();
		},
	});

	if (errors.length > 0) {
		const first = errors[0]!;
		options.diagnostics.warn("CSV records were malformed and kept as read", {
			errors: errors.length,
			firstError: first.message,
			firstErrorRow: first.row,
		});
	}

	const [header, ...records] = parsed;
	if (header === undefined) {
		return Err(new ParseError("Source has no header row"));
	}

	const truncated = records.length > options.rowCap;
	const rows = truncated ? records.slice(0, options.rowCap) : records;
	if (truncated) {
		options.diagnostics.warn(`Reached maximum row limit (${options.rowCap}). Truncating data.`);
	}

	options.diagnostics.info(`Parsed ${rows.length} rows from CSV`, { columns: header });
	return Ok({ header, rows, truncated });
}
