import type { Compaction, IngestionPlan } from "@loadstone/ingest";
import { ConfigurationError, Err, Ok, type Result } from "@loadstone/core";
import { DEFAULT_ROW_CAP, isTabularFormat, type TabularFormat } from "@loadstone/parser";
import { loadOptionalStatement, parsePositiveInt } from "../config";
import type { CommandContext } from "../context";

/** Optional `--format` override. */
export function resolveFormat(
	flags: Readonly<Record<string, string>>,
): Result<TabularFormat | undefined, ConfigurationError> {
	const value = flags.format;
	if (value === undefined) return Ok(undefined);
	const normalised = value.toLowerCase();
	if (isTabularFormat(normalised)) return Ok(normalised);
	return Err(new ConfigurationError(`Unsupported format "${value}". Expected csv or parquet`));
}

/**
 * Build the ingestion plan shared by the file, object-store and download
 * commands. SQL files are expanded with `variables`.
 */
export function resolvePlan(
	ctx: CommandContext,
	table: string,
	variables: Readonly<Record<string, string>>,
): Result<IngestionPlan, ConfigurationError> {
	const { flags, logger } = ctx;

	const rowCap = parsePositiveInt(flags["max-rows"], "--max-rows", DEFAULT_ROW_CAP);
	if (!rowCap.ok) return rowCap;

	const createTableSql = loadOptionalStatement(flags, "create-table-sql", variables, logger);
	if (!createTableSql.ok) return createTableSql;

	const optimizeSql = loadOptionalStatement(flags, "optimize-sql", variables, logger);
	if (!optimizeSql.ok) return optimizeSql;

	let compaction: Compaction = { kind: "none" };
	if (optimizeSql.value !== undefined) {
		compaction = { kind: "statement", sql: optimizeSql.value };
	} else if (flags.optimize === "true") {
		compaction = { kind: "optimize" };
	}

	return Ok({
		table,
		createTableSql: createTableSql.value,
		skipTableCreation: flags["skip-table-creation"] === "true",
		rowCap: rowCap.value,
		compaction,
		watermarkColumn: flags["watermark-column"],
		signal: ctx.signal,
	});
}
