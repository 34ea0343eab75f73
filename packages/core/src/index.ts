export * from "./coerce";
export {
	type Diagnostics,
	isLogLevel,
	LOG_LEVELS,
	type LogEntry,
	Logger,
	type LogLevel,
	silentDiagnostics,
} from "./logger";
export * from "./reconcile";
export * from "./result";
export * from "./schema";
export * from "./template";
export * from "./validation";
