import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { expandTemplate, findUnresolvedPlaceholders, loadSqlFile } from "../expand";

describe("expandTemplate", () => {
	it("replaces every occurrence of each variable", () => {
		const sql = "SELECT * FROM url('{{URL}}') WHERE d = '{{DATE}}' OR e = '{{DATE}}'";
		expect(expandTemplate(sql, { URL: "https://example.test/a.csv", DATE: "2024-01-05" })).toBe(
			"SELECT * FROM url('https://example.test/a.csv') WHERE d = '2024-01-05' OR e = '2024-01-05'",
		);
	});

	it("leaves unknown placeholders in place", () => {
		expect(expandTemplate("{{A}}-{{B}}", { A: "1" })).toBe("1-{{B}}");
	});

	it("leaves a self-referencing value as it is", () => {
		expect(expandTemplate("{{A}}", { A: "{{A}}" })).toBe("{{A}}");
	});

	it("expands a placeholder introduced by an earlier variable's value", () => {
		expect(expandTemplate("{{A}}", { A: "{{B}}", B: "x" })).toBe("x");
	});

	it("leaves a placeholder introduced by a later variable's value", () => {
		expect(expandTemplate("{{B}}", { A: "x", B: "{{A}}" })).toBe("{{A}}");
	});
});

describe("findUnresolvedPlaceholders", () => {
	it("lists each remaining name once", () => {
		expect(findUnresolvedPlaceholders("{{B}} {{ C }} {{B}}")).toEqual(["B", "C"]);
		expect(findUnresolvedPlaceholders("SELECT 1")).toEqual([]);
	});
});

describe("loadSqlFile", () => {
	const dir = mkdtempSync(join(tmpdir(), "loadstone-sql-"));

	afterAll(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	it("reads and expands a file", () => {
		const file = join(dir, "create.sql");
		writeFileSync(file, "CREATE TABLE IF NOT EXISTS {{TARGET_TABLE}} (id UInt32)", "utf-8");

		const result = loadSqlFile(file, { TARGET_TABLE: "raw.events" });
		expect(result).toEqual({ ok: true, value: "CREATE TABLE IF NOT EXISTS raw.events (id UInt32)" });
	});

	it("returns a ConfigurationError for a missing file", () => {
		const result = loadSqlFile(join(dir, "missing.sql"), {});
		expect(result.ok).toBe(false);
		if (!result.ok) {
			expect(result.error.code).toBe("CONFIGURATION");
			expect(result.error.message).toContain("missing.sql");
		}
	});
});
