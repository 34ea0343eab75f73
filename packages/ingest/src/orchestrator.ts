import type { TableStore } from "@loadstone/adapter";
import {
	AdapterError,
	assertValidTableName,
	type CoercedRow,
	ConfigurationError,
	coerceRow,
	type Diagnostics,
	Err,
	IngestionAbortedError,
	LoadstoneError,
	Ok,
	type Result,
	reconcile,
	SchemaMismatchError,
	SourceResolutionError,
	toError,
} from "@loadstone/core";
import { DEFAULT_ROW_CAP, parseTabular } from "@loadstone/parser";
import type { SourceFamily } from "./sources";

/** Orchestrator states; `failed` is absorbing. */
export type IngestionState =
	| "init"
	| "table_ready"
	| "sources_resolved"
	| "parsed"
	| "reconciled"
	| "coerced"
	| "inserted"
	| "verified"
	| "done"
	| "failed";

/** Post-ingestion compaction */
export type Compaction =
	| { kind: "none" }
	| { kind: "optimize" }
	/** A caller-supplied statement, e.g. a deduplicating OPTIMIZE */
	| { kind: "statement"; sql: string };

export interface IngestionPlan {
	/** Destination table, `table` or `database.table` */
	table: string;
	/** Statement that creates the table if needed */
	createTableSql?: string;
	skipTableCreation?: boolean;
	/** Maximum data rows read per source (default one million) */
	rowCap?: number;
	compaction?: Compaction;
	/** Column whose maximum is logged after the run */
	watermarkColumn?: string;
	/** Checked between sources */
	signal?: AbortSignal;
}

export interface IngestionDeps {
	store: TableStore;
	diagnostics: Diagnostics;
	onStateChange?: (from: IngestionState, to: IngestionState) => void;
}

export interface SourceReport {
	locator: string;
	rowsParsed: number;
	truncated: boolean;
	/** Destination columns written, in insert order */
	columns: string[];
}

export interface IngestionReport {
	state: "done" | "failed";
	/** Last state reached before failing */
	failedAt?: IngestionState;
	error?: LoadstoneError;
	sources: SourceReport[];
	rowsBefore?: number;
	rowsAfter?: number;
	/** Row-count delta; observability only */
	rowsAdded?: number;
}

/**
 * Run one ingestion: ensure the table, resolve sources, then parse,
 * reconcile, coerce and insert each source in manifest order.
 *
 * Never throws. Sources inserted before a failure stay inserted.
 */
export async function runIngestion(
	family: SourceFamily,
	plan: IngestionPlan,
	deps: IngestionDeps,
): Promise<IngestionReport> {
	const report: IngestionReport = { state: "failed", sources: [] };
	let state: IngestionState = "init";

	const transition = (to: IngestionState): void => {
		const from = state;
		state = to;
		deps.onStateChange?.(from, to);
	};

	const fail = (error: LoadstoneError): IngestionReport => {
		const failedAt = state;
		report.failedAt = failedAt;
		report.error = error;
		deps.diagnostics.error(`Ingestion failed after state ${failedAt}: ${error.message}`, {
			code: error.code,
			cause: error.cause?.message,
		});
		transition("failed");
		return report;
	};

	try {
		const outcome = await execute(family, plan, deps, report, transition);
		if (!outcome.ok) return fail(outcome.error);
		transition("done");
		report.state = "done";
		return report;
	} catch (thrown) {
		return fail(
			thrown instanceof LoadstoneError
				? thrown
				: new AdapterError("Unexpected failure during ingestion", toError(thrown)),
		);
	}
}

async function execute(
	family: SourceFamily,
	plan: IngestionPlan,
	deps: IngestionDeps,
	report: IngestionReport,
	transition: (to: IngestionState) => void,
): Promise<Result<void, LoadstoneError>> {
	const { store, diagnostics } = deps;
	const rowCap = plan.rowCap ?? DEFAULT_ROW_CAP;
	const aborted = () =>
		plan.signal?.aborted ? Err(new IngestionAbortedError("Ingestion aborted between sources")) : Ok(undefined);

	const validTable = assertValidTableName(plan.table);
	if (!validTable.ok) return validTable;
	const table = validTable.value;
	if (!Number.isInteger(rowCap) || rowCap <= 0) {
		return Err(new ConfigurationError(`Row cap must be a positive integer, got ${rowCap}`));
	}
	const beforeStart = aborted();
	if (!beforeStart.ok) return beforeStart;

	// init -> table_ready
	if (plan.createTableSql !== undefined && !plan.skipTableCreation) {
		diagnostics.info(`Ensuring table ${table} exists`);
		const created = await store.execute(plan.createTableSql);
		if (!created.ok) return created;
	} else {
		diagnostics.info("Skipping table creation", { table });
	}
	transition("table_ready");

	// table_ready -> sources_resolved
	const manifest = await family.resolveSources();
	if (!manifest.ok) return manifest;
	if (manifest.value.length === 0) {
		return Err(new SourceResolutionError(`No sources found for ${family.description}`));
	}
	transition("sources_resolved");

	const schema = await store.describeTable(table);
	if (!schema.ok) return schema;
	if (schema.value.size === 0) {
		return Err(new SchemaMismatchError(`Table ${table} has no columns`));
	}
	diagnostics.debug("Destination schema", { table, columns: Object.fromEntries(schema.value) });

	const rowsBefore = await store.countRows(table);
	if (!rowsBefore.ok) return rowsBefore;
	report.rowsBefore = rowsBefore.value;
	let rowsSent = 0;

	for (const locator of manifest.value) {
		const betweenSources = aborted();
		if (!betweenSources.ok) return betweenSources;

		const fetched = await family.fetch(locator);
		if (!fetched.ok) return fetched;
		const source = fetched.value.locator;

		const raw = parseTabular(fetched.value.bytes, fetched.value.format, { rowCap, diagnostics });
		if (!raw.ok) return raw;
		transition("parsed");

		const mapping = reconcile(raw.value.header, schema.value);
		if (mapping.length === 0) {
			return Err(new SchemaMismatchError(`No source columns of ${source} match table ${table}`));
		}
		const columns = mapping.map((binding) => binding.column);
		diagnostics.info(`Mapped ${columns.length} of ${raw.value.header.length} source columns`, {
			source,
			columns,
		});
		transition("reconciled");

		report.sources.push({
			locator: source,
			rowsParsed: raw.value.rows.length,
			truncated: raw.value.truncated,
			columns,
		});

		if (raw.value.rows.length === 0) {
			diagnostics.warn("Source has no data rows; nothing to insert", { source });
			continue;
		}

		const rows: CoercedRow[] = raw.value.rows.map((row) => coerceRow(row, mapping, diagnostics));
		transition("coerced");

		const inserted = await store.bulkInsert(table, rows, columns);
		if (!inserted.ok) return inserted;
		rowsSent += rows.length;
		diagnostics.info(`Inserted ${rows.length} rows into ${table}`, { source });
		transition("inserted");
	}

	const rowsAfter = await store.countRows(table);
	if (rowsAfter.ok) {
		report.rowsAfter = rowsAfter.value;
		report.rowsAdded = rowsAfter.value - rowsBefore.value;
		diagnostics.info(
			`Rows before: ${rowsBefore.value}, after: ${rowsAfter.value}, added: ${report.rowsAdded}`,
			{ rowsSent },
		);
	} else {
		diagnostics.warn("Could not count rows after ingestion", { error: rowsAfter.error.message });
	}

	if (plan.watermarkColumn !== undefined) {
		const latest = await store.latestValue(table, plan.watermarkColumn);
		if (latest.ok) {
			diagnostics.info(`Latest ${plan.watermarkColumn} in ${table}: ${latest.value ?? "none"}`);
		} else {
			diagnostics.warn("Could not read the watermark column", { error: latest.error.message });
		}
	}
	transition("verified");

	await compact(table, plan.compaction ?? { kind: "none" }, deps);
	return Ok(undefined);
}

/** Compaction failures are logged and never fail the run. */
async function compact(table: string, compaction: Compaction, deps: IngestionDeps): Promise<void> {
	if (compaction.kind === "none") return;

	deps.diagnostics.info(`Optimizing table ${table}`);
	const result =
		compaction.kind === "optimize"
			? await deps.store.optimize(table)
			: await deps.store.execute(compaction.sql);
	if (!result.ok) {
		deps.diagnostics.warn("Table optimization failed", { table, error: result.error.message });
	}
}
