import type { Diagnostics } from "../logger";
import {
	type CellValue,
	type CoercedRow,
	type ColumnMapping,
	NO_VALUE,
	type SemanticType,
} from "../schema";
import { parseTimestamp, TIMESTAMP_FORMAT_LABELS, toCalendarDate } from "./datetime";

const INTEGER_RE = /^\s*[+-]?\d+\s*$/;
const FLOAT_RE = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;
const NON_FINITE_RE = /^\s*([+-]?)(inf|infinity|nan)\s*$/i;

function parseInteger(raw: string): bigint | null {
	return INTEGER_RE.test(raw) ? BigInt(raw.trim()) : null;
}

function parseFloatValue(raw: string): number | null {
	if (FLOAT_RE.test(raw)) return Number(raw.trim());

	const special = NON_FINITE_RE.exec(raw);
	if (!special) return null;
	if (special[2]!.toLowerCase() === "nan") return Number.NaN;
	return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

/**
 * Convert one raw cell to the destination column's semantic type.
 *
 * Empty or missing input is always {@link NO_VALUE}. A value that cannot be
 * converted also becomes {@link NO_VALUE} and is reported as a warning; this
 * function never throws.
 */
export function coerce(
	raw: string | undefined,
	type: SemanticType,
	diagnostics: Diagnostics,
): CellValue {
	if (raw === undefined || raw.length === 0) return NO_VALUE;

	switch (type) {
		case "text":
			return raw;

		case "datetime":
		case "date": {
			const parsed = parseTimestamp(raw);
			if (!parsed) {
				diagnostics.warn("Failed to parse datetime", {
					value: raw,
					formats: TIMESTAMP_FORMAT_LABELS,
				});
				return NO_VALUE;
			}
			return type === "date" ? toCalendarDate(parsed) : parsed;
		}

		case "integer":
		case "unsigned": {
			const parsed = parseInteger(raw);
			if (parsed === null || (type === "unsigned" && parsed < 0n)) {
				diagnostics.warn("Failed to convert value", { value: raw, type });
				return NO_VALUE;
			}
			return parsed;
		}

		case "float": {
			const parsed = parseFloatValue(raw);
			if (parsed === null) {
				diagnostics.warn("Failed to convert value", { value: raw, type });
				return NO_VALUE;
			}
			return parsed;
		}
	}
}

/**
 * Project and coerce one raw row through a column mapping.
 * Cells past the end of a short row are treated as missing.
 */
export function coerceRow(
	row: readonly string[],
	mapping: ColumnMapping,
	diagnostics: Diagnostics,
): CoercedRow {
	return mapping.map((binding) => coerce(row[binding.sourceIndex], binding.type, diagnostics));
}
