import { beforeEach, describe, expect, it } from "vitest";
import { type IngestionState, runIngestion } from "../orchestrator";
import { createDiagnostics, InMemoryTableStore, memoryCsvSource } from "./test-helpers";

const SCENARIO_HEADER = "ID, Event Time, Name";

function eventsStore(): InMemoryTableStore {
	return new InMemoryTableStore().defineTable("events", {
		id: "unsigned",
		event_time: "datetime",
		name: "text",
	});
}

describe("runIngestion", () => {
	let store: InMemoryTableStore;
	let diagnostics: ReturnType<typeof createDiagnostics>;

	beforeEach(() => {
		store = eventsStore();
		diagnostics = createDiagnostics();
	});

	it("maps drifted headers case-insensitively and coerces each cell", async () => {
		const source = memoryCsvSource({
			"events.csv": `${SCENARIO_HEADER}\n"7","2024-03-01T10:00:00Z","Ä"\n`,
		});

		const report = await runIngestion(source, { table: "events" }, { store, diagnostics });

		expect(report.state).toBe("done");
		expect(store.inserts).toEqual([
			{
				table: "events",
				columns: ["id", "event_time", "name"],
				rows: [
					[
						7n,
						{
							kind: "datetime",
							year: 2024,
							month: 3,
							day: 1,
							hour: 10,
							minute: 0,
							second: 0,
							microsecond: 0,
						},
						"Ä",
					],
				],
			},
		]);
		expect(report.rowsBefore).toBe(0);
		expect(report.rowsAfter).toBe(1);
		expect(report.rowsAdded).toBe(1);
	});

	it("inserts a row of empty cells as all missing values", async () => {
		const source = memoryCsvSource({ "events.csv": `${SCENARIO_HEADER}\n"","",""\n` });

		const report = await runIngestion(source, { table: "events" }, { store, diagnostics });

		expect(report.state).toBe("done");
		expect(store.inserts[0]?.rows).toEqual([[null, null, null]]);
		expect(store.rowsOf("events")).toEqual([{ id: null, event_time: null, name: null }]);
	});

	it("aborts on a source that shares no columns with the table", async () => {
		const source = memoryCsvSource({ "other.csv": "foo,bar\n1,2\n" });

		const report = await runIngestion(source, { table: "events" }, { store, diagnostics });

		expect(report.state).toBe("failed");
		expect(report.failedAt).toBe("parsed");
		expect(report.error?.code).toBe("SCHEMA_MISMATCH");
		expect(report.error?.message).toBe("No source columns of other.csv match table events");
		expect(store.inserts).toEqual([]);
		expect(diagnostics.error).toHaveBeenCalledWith(
			"Ingestion failed after state parsed: No source columns of other.csv match table events",
			{ code: "SCHEMA_MISMATCH", cause: undefined },
		);
	});

	it("moves through every state for a single source", async () => {
		const transitions: [IngestionState, IngestionState][] = [];
		const source = memoryCsvSource({ "events.csv": "id,name\n1,a\n" });

		await runIngestion(
			source,
			{ table: "events" },
			{ store, diagnostics, onStateChange: (from, to) => transitions.push([from, to]) },
		);

		expect(transitions).toEqual([
			["init", "table_ready"],
			["table_ready", "sources_resolved"],
			["sources_resolved", "parsed"],
			["parsed", "reconciled"],
			["reconciled", "coerced"],
			["coerced", "inserted"],
			["inserted", "verified"],
			["verified", "done"],
		]);
	});

	it("drops unmatched source columns", async () => {
		const source = memoryCsvSource({ "events.csv": "extra,name,id\nz,a,1\n" });

		await runIngestion(source, { table: "events" }, { store, diagnostics });

		expect(store.inserts[0]?.columns).toEqual(["name", "id"]);
		expect(store.inserts[0]?.rows).toEqual([["a", 1n]]);
	});

	describe("table creation", () => {
		it("runs the create statement first", async () => {
			const source = memoryCsvSource({ "events.csv": "id\n1\n" });

			const report = await runIngestion(
				source,
				{ table: "events", createTableSql: "CREATE TABLE IF NOT EXISTS events (id UInt32)" },
				{ store, diagnostics },
			);

			expect(report.state).toBe("done");
			expect(store.statements).toEqual(["CREATE TABLE IF NOT EXISTS events (id UInt32)"]);
		});

		it("skips the statement when asked", async () => {
			const source = memoryCsvSource({ "events.csv": "id\n1\n" });

			await runIngestion(
				source,
				{ table: "events", createTableSql: "CREATE TABLE events (id UInt32)", skipTableCreation: true },
				{ store, diagnostics },
			);

			expect(store.statements).toEqual([]);
		});

		it("fails before resolving sources when creation fails", async () => {
			store.failNext("execute", "Syntax error");
			const source = memoryCsvSource({ "events.csv": "id\n1\n" });

			const report = await runIngestion(
				source,
				{ table: "events", createTableSql: "CREATE TABLE" },
				{ store, diagnostics },
			);

			expect(report.state).toBe("failed");
			expect(report.failedAt).toBe("init");
			expect(report.error?.message).toBe("Syntax error");
			expect(source.fetched).toEqual([]);
		});
	});

	it("rejects an unsafe table name before touching the store", async () => {
		const source = memoryCsvSource({ "events.csv": "id\n1\n" });

		const report = await runIngestion(
			source,
			{ table: "events; DROP TABLE x", createTableSql: "CREATE TABLE t (id UInt32)" },
			{ store, diagnostics },
		);

		expect(report.error?.code).toBe("CONFIGURATION");
		expect(store.statements).toEqual([]);
	});

	it("fails when the manifest is empty", async () => {
		const report = await runIngestion(memoryCsvSource({}), { table: "events" }, { store, diagnostics });

		expect(report.failedAt).toBe("table_ready");
		expect(report.error?.code).toBe("SOURCE_RESOLUTION");
	});

	it("reports the row-count delta against existing rows", async () => {
		store.seedRows("events", [{ id: 1n, event_time: null, name: "old" }]);
		const source = memoryCsvSource({ "events.csv": "id,name\n2,b\n3,c\n" });

		const report = await runIngestion(source, { table: "events" }, { store, diagnostics });

		expect(report.rowsBefore).toBe(1);
		expect(report.rowsAfter).toBe(3);
		expect(report.rowsAdded).toBe(2);
		expect(diagnostics.info).toHaveBeenCalledWith("Rows before: 1, after: 3, added: 2", {
			rowsSent: 2,
		});
	});

	it("keeps earlier sources and stops when a later one fails", async () => {
		const source = memoryCsvSource({
			"a.csv": "id,name\n1,a\n",
			"b.csv": "foo\n1\n",
			"c.csv": "id\n3\n",
		});

		const report = await runIngestion(source, { table: "events" }, { store, diagnostics });

		expect(report.state).toBe("failed");
		expect(store.rowsOf("events")).toHaveLength(1);
		expect(source.fetched).toEqual(["a.csv", "b.csv"]);
	});

	it("skips a source without data rows", async () => {
		const source = memoryCsvSource({ "events.csv": "id,name\n" });

		const report = await runIngestion(source, { table: "events" }, { store, diagnostics });

		expect(report.state).toBe("done");
		expect(store.inserts).toEqual([]);
		expect(report.sources).toEqual([
			{ locator: "events.csv", rowsParsed: 0, truncated: false, columns: ["id", "name"] },
		]);
		expect(diagnostics.warn).toHaveBeenCalledWith("Source has no data rows; nothing to insert", {
			source: "events.csv",
		});
	});

	it("applies the row cap per source", async () => {
		const source = memoryCsvSource({ "events.csv": "id\n1\n2\n3\n" });

		const report = await runIngestion(source, { table: "events", rowCap: 2 }, { store, diagnostics });

		expect(store.inserts[0]?.rows).toEqual([[1n], [2n]]);
		expect(report.sources[0]?.truncated).toBe(true);
	});

	it("rejects a non-positive row cap", async () => {
		const report = await runIngestion(
			memoryCsvSource({ "events.csv": "id\n1\n" }),
			{ table: "events", rowCap: 0 },
			{ store, diagnostics },
		);
		expect(report.error?.message).toBe("Row cap must be a positive integer, got 0");
	});

	it("aborts between sources, never mid-source", async () => {
		const controller = new AbortController();
		const source = memoryCsvSource({ "a.csv": "id\n1\n", "b.csv": "id\n2\n" });

		const report = await runIngestion(
			source,
			{ table: "events", signal: controller.signal },
			{
				store,
				diagnostics,
				onStateChange: (_from, to) => {
					if (to === "inserted") controller.abort();
				},
			},
		);

		expect(report.state).toBe("failed");
		expect(report.error?.code).toBe("ABORTED");
		expect(store.rowsOf("events")).toEqual([{ id: 1n }]);
		expect(source.fetched).toEqual(["a.csv"]);
	});

	describe("compaction", () => {
		it("optimizes the table after a successful run", async () => {
			const source = memoryCsvSource({ "events.csv": "id\n1\n" });

			await runIngestion(
				source,
				{ table: "events", compaction: { kind: "optimize" } },
				{ store, diagnostics },
			);

			expect(store.statements).toEqual(["OPTIMIZE TABLE events FINAL"]);
		});

		it("runs a custom compaction statement", async () => {
			const source = memoryCsvSource({ "events.csv": "id\n1\n" });

			await runIngestion(
				source,
				{
					table: "events",
					compaction: { kind: "statement", sql: "OPTIMIZE TABLE events FINAL DEDUPLICATE" },
				},
				{ store, diagnostics },
			);

			expect(store.statements).toEqual(["OPTIMIZE TABLE events FINAL DEDUPLICATE"]);
		});

		it("does not fail the run when compaction fails", async () => {
			store.failNext("optimize", "Timeout");
			const source = memoryCsvSource({ "events.csv": "id\n1\n" });

			const report = await runIngestion(
				source,
				{ table: "events", compaction: { kind: "optimize" } },
				{ store, diagnostics },
			);

			expect(report.state).toBe("done");
			expect(diagnostics.warn).toHaveBeenCalledWith("Table optimization failed", {
				table: "events",
				error: "Timeout",
			});
		});
	});

	it("logs the watermark column after the run", async () => {
		const source = memoryCsvSource({ "events.csv": "id\n4\n9\n" });

		await runIngestion(
			source,
			{ table: "events", watermarkColumn: "id" },
			{ store, diagnostics },
		);

		expect(diagnostics.info).toHaveBeenCalledWith("Latest id in events: 9");
	});

	it("fails when the destination table does not exist", async () => {
		const report = await runIngestion(
			memoryCsvSource({ "x.csv": "id\n1\n" }),
			{ table: "missing" },
			{ store, diagnostics },
		);

		expect(report.failedAt).toBe("sources_resolved");
		expect(report.error?.message).toBe("Table missing does not exist");
	});
});
