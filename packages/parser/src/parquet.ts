import { readFileSync } from "node:fs";
import { createRequire } from "node:module";
import { Err, Ok, ParseError, type RawTable, type Result, toError } from "@loadstone/core";
import { DataType, type Field, tableFromIPC, TimeUnit, type Vector } from "apache-arrow";
import { initSync, readParquet } from "parquet-wasm/esm";
import type { ParseOptions } from "./types";

let wasmReady = false;

/**
 * Load the parquet-wasm binary from disk the first time a file is read.
 * Later calls are no-ops.
 */
export function ensureWasmInitialised(): void {
	if (wasmReady) return;

	const require = createRequire(import.meta.url);
	const entry = require.resolve("parquet-wasm/esm");
	initSync(readFileSync(entry.replace("parquet_wasm.js", "parquet_wasm_bg.wasm")));
	wasmReady = true;
}

function jsonReplacer(_key: string, value: unknown): unknown {
	return typeof value === "bigint" ? value.toString() : value;
}

/** ISO-8601 with six fractional digits when the value has sub-millisecond precision. */
function microsToIso(micros: bigint): string {
	let millis = micros / 1000n;
	let rest = micros % 1000n;
	if (rest < 0n) {
		rest += 1000n;
		millis -= 1n;
	}
	const iso = new Date(Number(millis)).toISOString();
	return rest === 0n ? iso : `${iso.slice(0, -1)}${String(rest).padStart(3, "0")}Z`;
}

/**
 * Stored microseconds of a micro- or nanosecond timestamp column. Arrow's
 * accessor rounds these to milliseconds. Undefined for other columns.
 */
function rawMicros(field: Field, vector: Vector | null): bigint[] | undefined {
	if (!vector || !DataType.isTimestamp(field.type)) return undefined;
	const unit = field.type.unit;
	if (unit !== TimeUnit.MICROSECOND && unit !== TimeUnit.NANOSECOND) return undefined;

	const micros: bigint[] = [];
	for (const chunk of vector.data) {
		const values: unknown = chunk.values;
		if (!(values instanceof BigInt64Array)) return undefined;
		for (let i = 0; i < chunk.length; i++) {
			const stored = values[i] ?? 0n;
			micros.push(unit === TimeUnit.NANOSECOND ? stored / 1000n : stored);
		}
	}
	return micros;
}

/**
 * Render one Arrow cell as the raw text a CSV export would carry.
 * Timestamps become ISO-8601 with a trailing `Z`, dates `YYYY-MM-DD`.
 */
function cellToText(value: unknown, field: Field): string {
	if (value === null || value === undefined) return "";

	if (DataType.isTimestamp(field.type) || DataType.isDate(field.type)) {
		const instant = value instanceof Date ? value : new Date(Number(value));
		if (Number.isNaN(instant.getTime())) return "";
		const iso = instant.toISOString();
		return DataType.isDate(field.type) ? iso.slice(0, 10) : iso;
	}

	switch (typeof value) {
		case "string":
			return value;
		case "number":
		case "bigint":
		case "boolean":
			return String(value);
		default:
			return JSON.stringify(value, jsonReplacer);
	}
}

/**
 * Read Parquet bytes into a header (the Arrow field names) and rows of
 * text cells, keeping at most `rowCap` rows.
 */
export function parseParquet(
	bytes: Uint8Array,
	options: ParseOptions,
): Result<RawTable, ParseError> {
	try {
		ensureWasmInitialised();

		const table = tableFromIPC(readParquet(bytes).intoIPCStream());
		const fields = table.schema.fields;
		const header = fields.map((f) => f.name);
		const vectors = fields.map((f) => table.getChild(f.name));
		const micros = fields.map((f, c) => rawMicros(f, vectors[c] ?? null));

		const truncated = table.numRows > options.rowCap;
		const count = truncated ? options.rowCap : table.numRows;
		if (truncated) {
			options.diagnostics.warn(`Reached maximum row limit (${options.rowCap}). Truncating data.`);
		}

		const rows: string[][] = [];
		for (let i = 0; i < count; i++) {
			rows.push(
				fields.map((field, c) => {
					const value: unknown = vectors[c]?.get(i);
					const stored = micros[c]?.[i];
					if (value === null || value === undefined || stored === undefined) {
						return cellToText(value, field);
					}
					return microsToIso(stored);
				}),
			);
		}

		options.diagnostics.info(`Parsed ${rows.length} rows from Parquet`, { columns: header });
		return Ok({ header, rows, truncated });
	} catch (error) {
		const cause = toError(error);
		return Err(new ParseError(`Failed to read Parquet: ${cause.message}`, cause));
	}
}
