import { describe, expect, it } from "vitest";
import { isLogLevel, type LogEntry, Logger } from "../logger";

/** Collect log output into an array of parsed entries. */
function createTestLogger(level: "debug" | "info" | "warn" | "error" = "info") {
	const lines: LogEntry[] = [];
	const writeFn = (line: string) => {
		lines.push(JSON.parse(line) as LogEntry);
	};
	const logger = new Logger(level, {}, writeFn);
	return { logger, lines };
}

describe("Logger", () => {
	it("outputs valid JSON lines", () => {
		const { logger, lines } = createTestLogger();
		logger.info("hello world");

		expect(lines).toHaveLength(1);
		expect(lines[0]!.level).toBe("info");
		expect(lines[0]!.msg).toBe("hello world");
		expect(new Date(lines[0]!.ts).toISOString()).toBe(lines[0]!.ts);
	});

	it("includes extra data in the log entry", () => {
		const { logger, lines } = createTestLogger();
		logger.info("rows inserted", { rows: 5, table: "events" });

		expect(lines[0]!.rows).toBe(5);
		expect(lines[0]!.table).toBe("events");
	});

	it("serialises bigint values as strings", () => {
		const { logger, lines } = createTestLogger();
		logger.info("sample row", { row: [7n, "a"] });

		expect(lines[0]!.row).toEqual(["7", "a"]);
	});

	it("filters messages below the minimum level", () => {
		const { logger, lines } = createTestLogger("warn");
		logger.debug("should not appear");
		logger.info("should not appear");
		logger.warn("should appear");
		logger.error("should appear");

		expect(lines.map((l) => l.level)).toEqual(["warn", "error"]);
	});

	it("child loggers merge bindings and keep the parent level", () => {
		const { logger, lines } = createTestLogger("warn");
		const child = logger.child({ table: "t1" }).child({ source: "a.csv" });

		child.info("dropped");
		child.warn("kept");

		expect(lines).toHaveLength(1);
		expect(lines[0]!.table).toBe("t1");
		expect(lines[0]!.source).toBe("a.csv");
	});
});

describe("isLogLevel", () => {
	it("accepts known level names only", () => {
		expect(isLogLevel("debug")).toBe(true);
		expect(isLogLevel("warn")).toBe(true);
		expect(isLogLevel("verbose")).toBe(false);
	});
});
