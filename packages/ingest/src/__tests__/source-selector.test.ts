import { AdapterError, Err } from "@loadstone/core";
import { describe, expect, it, vi } from "vitest";
import {
	embeddedDate,
	listingPrefix,
	parseSelectionMode,
	selectSources,
	sortByEmbeddedDate,
} from "../source-selector";
import { createDiagnostics, InMemoryObjectStore } from "./test-helpers";

const PATTERN = "data/{{DATE}}.parquet";

function storeWith(...keys: string[]): InMemoryObjectStore {
	return new InMemoryObjectStore(
		"exports",
		Object.fromEntries(keys.map((key) => [key, "x"])),
	);
}

describe("selectSources", () => {
	describe("latest", () => {
		it("selects the newest dated key and ignores undated ones", async () => {
			const store = storeWith(
				"data/2024-01-05.parquet",
				"data/2024-02-10.parquet",
				"data/not-a-date.parquet",
			);
			const diagnostics = createDiagnostics();

			const result = await selectSources(store, { pathPattern: PATTERN, mode: "latest" }, diagnostics);

			expect(result).toEqual({ ok: true, value: ["data/2024-02-10.parquet"] });
			expect(store.listedPrefixes).toEqual(["data"]);
			expect(diagnostics.warn).toHaveBeenCalledWith("Could not parse a date from the object key", {
				key: "data/not-a-date.parquet",
			});
		});

		it("is stable for an unchanged listing and follows a newly added later key", async () => {
			const store = storeWith("data/2024-01-05.parquet", "data/2024-02-10.parquet");
			const request = { pathPattern: PATTERN, mode: "latest" } as const;

			const first = await selectSources(store, request, createDiagnostics());
			const second = await selectSources(store, request, createDiagnostics());
			expect(second).toEqual(first);

			store.put("data/2024-03-01.parquet", "x");
			const third = await selectSources(store, request, createDiagnostics());
			expect(third).toEqual({ ok: true, value: ["data/2024-03-01.parquet"] });
		});

		it("falls back to listing order when no key carries a date", async () => {
			const store = storeWith("data/b.parquet", "data/a.parquet");

			const result = await selectSources(
				store,
				{ pathPattern: PATTERN, mode: "latest" },
				createDiagnostics(),
			);
			expect(result).toEqual({ ok: true, value: ["data/b.parquet"] });
		});

		it("only considers keys with the expected extension", async () => {
			const store = storeWith("data/2024-05-01.csv", "data/2024-04-01.parquet");

			const parquet = await selectSources(
				store,
				{ pathPattern: PATTERN, mode: "latest" },
				createDiagnostics(),
			);
			expect(parquet).toEqual({ ok: true, value: ["data/2024-04-01.parquet"] });

			const csv = await selectSources(
				store,
				{ pathPattern: "data/{{DATE}}.csv", mode: "latest", extension: ".csv" },
				createDiagnostics(),
			);
			expect(csv).toEqual({ ok: true, value: ["data/2024-05-01.csv"] });
		});

		it("fails with SOURCE_RESOLUTION on an empty listing", async () => {
			const result = await selectSources(
				storeWith(),
				{ pathPattern: PATTERN, mode: "latest" },
				createDiagnostics(),
			);
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.code).toBe("SOURCE_RESOLUTION");
				expect(result.error.message).toBe('No objects found under prefix "data"');
			}
		});

		it("fails with SOURCE_RESOLUTION when nothing has the extension", async () => {
			const result = await selectSources(
				storeWith("data/2024-01-01.json"),
				{ pathPattern: PATTERN, mode: "latest" },
				createDiagnostics(),
			);
			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.message).toBe('No .parquet objects found under prefix "data"');
			}
		});

		it("propagates listing failures", async () => {
			const store = storeWith();
			vi.spyOn(store, "listObjects").mockResolvedValueOnce(Err(new AdapterError("AccessDenied")));

			const result = await selectSources(
				store,
				{ pathPattern: PATTERN, mode: "latest" },
				createDiagnostics(),
			);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("ADAPTER_ERROR");
		});
	});

	describe("date", () => {
		it("substitutes the period without listing", async () => {
			const store = storeWith();

			const result = await selectSources(
				store,
				{ pathPattern: PATTERN, mode: "date", period: "2024-02-10" },
				createDiagnostics(),
			);

			expect(result).toEqual({ ok: true, value: ["data/2024-02-10.parquet"] });
			expect(store.listedPrefixes).toEqual([]);
		});

		it("requires a period before any I/O", async () => {
			const store = storeWith("data/2024-02-10.parquet");

			const result = await selectSources(
				store,
				{ pathPattern: PATTERN, mode: "date" },
				createDiagnostics(),
			);

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.code).toBe("CONFIGURATION");
				expect(result.error.message).toBe("A period is required when the mode is 'date'");
			}
			expect(store.listedPrefixes).toEqual([]);
		});

		it("rejects a malformed period", async () => {
			const result = await selectSources(
				storeWith(),
				{ pathPattern: PATTERN, mode: "date", period: "2024-13-01" },
				createDiagnostics(),
			);
			expect(result.ok).toBe(false);
			if (!result.ok) expect(result.error.code).toBe("CONFIGURATION");
		});
	});

	describe("all", () => {
		it("returns every matching key in listing order", async () => {
			const store = storeWith(
				"data/2024-02-10.parquet",
				"data/readme.md",
				"data/2024-01-05.parquet",
			);

			const result = await selectSources(
				store,
				{ pathPattern: PATTERN, mode: "all" },
				createDiagnostics(),
			);

			expect(result).toEqual({
				ok: true,
				value: ["data/2024-02-10.parquet", "data/2024-01-05.parquet"],
			});
		});
	});
});

describe("parseSelectionMode", () => {
	it("accepts known modes case-insensitively", () => {
		expect(parseSelectionMode("latest")).toEqual({ ok: true, value: "latest" });
		expect(parseSelectionMode("ALL")).toEqual({ ok: true, value: "all" });
		expect(parseSelectionMode("period")).toEqual({ ok: true, value: "date" });
	});

	it("rejects unknown modes", () => {
		const result = parseSelectionMode("weekly");
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("CONFIGURATION");
			expect(result.error.message).toBe(
				'Unknown selection mode "weekly". Expected one of: latest, date, all',
			);
		}
	});
});

describe("helpers", () => {
	it("derives the listing prefix", () => {
		expect(listingPrefix("a/b/{{DATE}}.parquet")).toBe("a/b");
		expect(listingPrefix("{{DATE}}.parquet")).toBe("{{DATE}}.parquet");
	});

	it("reads the date token before the first dot of the last segment", () => {
		expect(embeddedDate("2023-12-31/2024-02-10.part-1.parquet")).toEqual({
			kind: "date",
			year: 2024,
			month: 2,
			day: 10,
		});
		expect(embeddedDate("data/latest.parquet")).toBeNull();
	});

	it("sorts newest first with undated keys last", () => {
		expect(
			sortByEmbeddedDate(["x/junk.parquet", "x/2024-01-01.parquet", "x/2024-06-01.parquet"]),
		).toEqual(["x/2024-06-01.parquet", "x/2024-01-01.parquet", "x/junk.parquet"]);
	});
});
