import { Agent } from "node:https";
import { type ClickHouseClient, createClient } from "@clickhouse/client";
import {
	AdapterError,
	type CellValue,
	type CoercedRow,
	type DestinationSchema,
	formatCalendarDate,
	formatDateTime,
	Ok,
	quoteIdentifier,
	type Result,
	type SemanticType,
} from "@loadstone/core";
import { wrapAsync } from "./shared";
import type { ClickHouseConfig, TableStore } from "./types";

/** Wrappers that only change nullability or storage, never the value domain. */
const WRAPPER_RE = /^(?:Nullable|LowCardinality)\((.*)\)$/;

/**
 * Map a ClickHouse column type to its semantic type.
 *
 * `Nullable(...)` and `LowCardinality(...)` are unwrapped first. Types
 * with no numeric or temporal counterpart are treated as text.
 */
export function storeTypeToSemantic(storeType: string): SemanticType {
	let type = storeType.trim();
	for (let match = WRAPPER_RE.exec(type); match; match = WRAPPER_RE.exec(type)) {
		type = (match[1] ?? "").trim();
	}

	if (type.startsWith("DateTime")) return "datetime";
	if (type.startsWith("Date")) return "date";
	if (type.startsWith("UInt")) return "unsigned";
	if (type.startsWith("Int")) return "integer";
	if (type.startsWith("Float") || type === "Double") return "float";
	return "text";
}

/**
 * Render a coerced cell for JSONCompactEachRow input.
 *
 * Integers outside the double-precision safe range are sent as strings,
 * which ClickHouse parses into the column's integer type. Non-finite
 * floats use the textual forms ClickHouse accepts.
 */
export function toStoreValue(value: CellValue): string | number | null {
	if (value === null) return null;
	switch (typeof value) {
		case "bigint":
			return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)
				? Number(value)
				: value.toString();
		case "number":
			if (Number.isNaN(value)) return "nan";
			if (value === Number.POSITIVE_INFINITY) return "inf";
			if (value === Number.NEGATIVE_INFINITY) return "-inf";
			return value;
		case "string":
			return value;
		default:
			return value.kind === "date" ? formatCalendarDate(value) : formatDateTime(value);
	}
}

function readRowField(row: Record<string, unknown> | undefined, key: string): unknown {
	return row === undefined ? undefined : row[key];
}

/**
 * ClickHouse table store over the HTTP interface.
 *
 * Wraps `@clickhouse/client` to provide a Result-based interface. All
 * public methods return `Result` and never throw.
 */
export class ClickHouseTableStore implements TableStore {
	/** @internal */
	readonly client: ClickHouseClient;

	constructor(config: ClickHouseConfig) {
		const protocol = config.secure ? "https" : "http";
		this.client = createClient({
			url: `${protocol}://${config.host}:${config.port}`,
			username: config.username,
			password: config.password,
			database: config.database,
			...(config.secure && !config.verify
				? { http_agent: new Agent({ rejectUnauthorized: false }) }
				: {}),
		});
	}

	async execute(statement: string): Promise<Result<void, AdapterError>> {
		return wrapAsync(async () => {
			await this.client.command({ query: statement });
		}, "Failed to execute statement");
	}

	async query(statement: string): Promise<Result<Record<string, unknown>[], AdapterError>> {
		return wrapAsync(async () => {
			const resultSet = await this.client.query({ query: statement, format: "JSONEachRow" });
			return resultSet.json<Record<string, unknown>>();
		}, "Failed to run query");
	}

	async bulkInsert(
		table: string,
		rows: readonly CoercedRow[],
		columns: readonly string[],
	): Promise<Result<void, AdapterError>> {
		const [first, ...rest] = columns.map(quoteIdentifier);
		if (rows.length === 0 || first === undefined) {
			return Ok(undefined);
		}

		return wrapAsync(async () => {
			await this.client.insert({
				table,
				values: rows.map((row) => row.map(toStoreValue)),
				columns: [first, ...rest],
				format: "JSONCompactEachRow",
				clickhouse_settings: { date_time_input_format: "best_effort" },
			});
		}, `Failed to insert ${rows.length} rows into ${table}`);
	}

	async describeTable(table: string): Promise<Result<DestinationSchema, AdapterError>> {
		return wrapAsync(async () => {
			const resultSet = await this.client.query({
				query: `DESCRIBE TABLE ${table}`,
				format: "JSONEachRow",
			});
			const rows = await resultSet.json<Record<string, unknown>>();
			const schema = new Map<string, SemanticType>();
			for (const row of rows) {
				const name = row.name;
				const type = row.type;
				if (typeof name !== "string" || typeof type !== "string") {
					throw new AdapterError(`Unexpected DESCRIBE output for ${table}`);
				}
				schema.set(name, storeTypeToSemantic(type));
			}
			return schema;
		}, `Failed to describe table ${table}`);
	}

	async tableExists(table: string): Promise<Result<boolean, AdapterError>> {
		return wrapAsync(async () => {
			const resultSet = await this.client.query({
				query: `EXISTS TABLE ${table}`,
				format: "JSONEachRow",
			});
			const rows = await resultSet.json<Record<string, unknown>>();
			return Number(readRowField(rows[0], "result")) === 1;
		}, `Failed to check whether ${table} exists`);
	}

	async countRows(table: string): Promise<Result<number, AdapterError>> {
		return wrapAsync(async () => {
			const resultSet = await this.client.query({
				query: `SELECT count() AS count FROM ${table}`,
				format: "JSONEachRow",
			});
			const rows = await resultSet.json<Record<string, unknown>>();
			// UInt64 arrives quoted
			const count = Number(readRowField(rows[0], "count") ?? 0);
			if (!Number.isFinite(count)) {
				throw new AdapterError(`Unexpected row count for ${table}`);
			}
			return count;
		}, `Failed to count rows in ${table}`);
	}

	async latestValue(table: string, column: string): Promise<Result<string | null, AdapterError>> {
		return wrapAsync(async () => {
			const resultSet = await this.client.query({
				query: `SELECT max(${quoteIdentifier(column)}) AS value FROM ${table}`,
				format: "JSONEachRow",
			});
			const rows = await resultSet.json<Record<string, unknown>>();
			const value = readRowField(rows[0], "value");
			return value === null || value === undefined ? null : String(value);
		}, `Failed to read latest ${column} from ${table}`);
	}

	async optimize(table: string): Promise<Result<void, AdapterError>> {
		return wrapAsync(async () => {
			await this.client.command({ query: `OPTIMIZE TABLE ${table} FINAL` });
		}, `Failed to optimize ${table}`);
	}

	async close(): Promise<void> {
		await this.client.close();
	}
}
