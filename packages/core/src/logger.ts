// ---------------------------------------------------------------------------
// Structured Logger: JSON-lines diagnostics sink passed into every component
// ---------------------------------------------------------------------------

/** Supported log levels, ordered by severity. */
export type LogLevel = "debug" | "info" | "warn" | "error";

/** Valid level names, lowest severity first. */
export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

/** A single structured log entry. */
export interface LogEntry {
	level: LogLevel;
	msg: string;
	ts: string;
	[key: string]: unknown;
}

/**
 * Diagnostics sink accepted by the parser, reconciler, coercion module and
 * orchestrator. Components never write to `console` directly.
 */
export interface Diagnostics {
	debug(msg: string, data?: Record<string, unknown>): void;
	info(msg: string, data?: Record<string, unknown>): void;
	warn(msg: string, data?: Record<string, unknown>): void;
	error(msg: string, data?: Record<string, unknown>): void;
}

/** Numeric severity values for level comparison. */
const LEVEL_VALUE: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

/** Type guard for a log level name read from flags or the environment. */
export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_VALUE, value);
}

/**
 * Minimal structured logger that outputs JSON lines to stdout.
 *
 * Supports log-level filtering and child loggers with bound context.
 *
 * @example
 * ```ts
 * const logger = new Logger("info");
 * const runLogger = logger.child({ table: "events.daily" });
 * runLogger.info("rows inserted", { rows: 5 });
 * // => {"level":"info","msg":"rows inserted","ts":"...","table":"events.daily","rows":5}
 * ```
 */
export class Logger implements Diagnostics {
	private readonly minLevel: LogLevel;
	private readonly bindings: Record<string, unknown>;

	/** Output function; stdout unless overridden. */
	private readonly writeFn: (line: string) => void;

	constructor(
		minLevel: LogLevel = "info",
		bindings: Record<string, unknown> = {},
		writeFn?: (line: string) => void,
	) {
		this.minLevel = minLevel;
		this.bindings = bindings;
		this.writeFn = writeFn ?? ((line) => process.stdout.write(`${line}\n`));
	}

	/** Log at debug level. */
	debug(msg: string, data?: Record<string, unknown>): void {
		this.log("debug", msg, data);
	}

	/** Log at info level. */
	info(msg: string, data?: Record<string, unknown>): void {
		this.log("info", msg, data);
	}

	/** Log at warn level. */
	warn(msg: string, data?: Record<string, unknown>): void {
		this.log("warn", msg, data);
	}

	/** Log at error level. */
	error(msg: string, data?: Record<string, unknown>): void {
		this.log("error", msg, data);
	}

	/**
	 * Create a child logger with additional bound context.
	 *
	 * The child inherits the parent's level and write function, plus
	 * merges any parent bindings with the new ones.
	 */
	child(bindings: Record<string, unknown>): Logger {
		return new Logger(this.minLevel, { ...this.bindings, ...bindings }, this.writeFn);
	}

	private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
		if (LEVEL_VALUE[level] < LEVEL_VALUE[this.minLevel]) return;

		const entry: LogEntry = {
			level,
			msg,
			ts: new Date().toISOString(),
			...this.bindings,
			...data,
		};

		this.writeFn(JSON.stringify(entry, bigintReplacer));
	}
}

/** JSON.stringify cannot encode bigint; integer cells are logged as strings. */
function bigintReplacer(_key: string, value: unknown): unknown {
	return typeof value === "bigint" ? value.toString() : value;
}

/** Diagnostics sink that drops everything. */
export const silentDiagnostics: Diagnostics = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
