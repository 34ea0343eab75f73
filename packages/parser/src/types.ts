import type { Diagnostics } from "@loadstone/core";

/** Default maximum number of data rows read from one source. */
export const DEFAULT_ROW_CAP = 1_000_000;

/** Supported source encodings. */
export type TabularFormat = "csv" | "parquet";

/** Valid format names. */
export const TABULAR_FORMATS = ["csv", "parquet"] as const satisfies readonly TabularFormat[];

/** Options shared by every reader. */
export interface ParseOptions {
	/** Maximum data rows to keep; the header does not count. */
	rowCap: number;
	diagnostics: Diagnostics;
}
