export { parseCsv } from "./csv";
export { ensureWasmInitialised, parseParquet } from "./parquet";
export { detectFormat, isTabularFormat, parseTabular } from "./tabular";
export {
	DEFAULT_ROW_CAP,
	type ParseOptions,
	TABULAR_FORMATS,
	type TabularFormat,
} from "./types";
