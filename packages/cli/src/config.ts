import type { ClickHouseConfig, ObjectStoreConfig } from "@loadstone/adapter";
import {
	ConfigurationError,
	type Diagnostics,
	Err,
	findUnresolvedPlaceholders,
	isLogLevel,
	LOG_LEVELS,
	type LogLevel,
	loadSqlFile,
	Ok,
	type Result,
} from "@loadstone/core";

/** Process environment as read by the CLI */
export type Env = Readonly<Record<string, string | undefined>>;
type Flags = Readonly<Record<string, string>>;

/** Environment prefix of SQL template variables */
export const QUERY_VAR_PREFIX = "CH_QUERY_VAR_";

const REDACTED = "***REDACTED***";
const SENSITIVE_NAME_RE = /SECRET|PASSWORD|KEY|TOKEN/i;

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

/** Parse a boolean setting (`true/1/yes`, `false/0/no`, case-insensitive). */
export function parseBooleanSetting(
	value: string | undefined,
	name: string,
	fallback: boolean,
): Result<boolean, ConfigurationError> {
	if (value === undefined || value.trim() === "") return Ok(fallback);
	const normalised = value.trim().toLowerCase();
	if (TRUE_VALUES.has(normalised)) return Ok(true);
	if (FALSE_VALUES.has(normalised)) return Ok(false);
	return Err(new ConfigurationError(`${name} must be a boolean, got "${value}"`));
}

/** Parse a positive integer setting. */
export function parsePositiveInt(
	value: string | undefined,
	name: string,
	fallback: number,
): Result<number, ConfigurationError> {
	if (value === undefined || value.trim() === "") return Ok(fallback);
	if (!/^\d+$/.test(value.trim())) {
		return Err(new ConfigurationError(`${name} must be a positive integer, got "${value}"`));
	}
	const parsed = Number(value.trim());
	if (parsed <= 0 || !Number.isSafeInteger(parsed)) {
		return Err(new ConfigurationError(`${name} must be a positive integer, got "${value}"`));
	}
	return Ok(parsed);
}

/**
 * Resolve the table store connection from flags, then environment, then defaults.
 */
export function resolveConnection(flags: Flags, env: Env): Result<ClickHouseConfig, ConfigurationError> {
	const port = parsePositiveInt(flags.port ?? env.CH_PORT, "CH_PORT", 8123);
	if (!port.ok) return port;
	const secure = parseBooleanSetting(flags.secure ?? env.CH_SECURE, "CH_SECURE", false);
	if (!secure.ok) return secure;
	const verify = parseBooleanSetting(flags.verify ?? env.CH_VERIFY, "CH_VERIFY", true);
	if (!verify.ok) return verify;

	return Ok({
		host: flags.host ?? env.CH_HOST ?? "localhost",
		port: port.value,
		username: flags.user ?? env.CH_USER ?? "default",
		password: flags.password ?? env.CH_PASSWORD ?? "",
		database: flags.db ?? env.CH_DB ?? "default",
		secure: secure.value,
		verify: verify.value,
	});
}

/** Template variables from `CH_QUERY_VAR_<NAME>` entries, keyed by `<NAME>`. */
export function queryVariables(env: Env): Record<string, string> {
	const variables: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (key.startsWith(QUERY_VAR_PREFIX) && value !== undefined) {
			variables[key.slice(QUERY_VAR_PREFIX.length)] = value;
		}
	}
	return variables;
}

/** Copy of the variables with secret-looking values masked, for logging. */
export function redactVariables(variables: Readonly<Record<string, string>>): Record<string, string> {
	const redacted: Record<string, string> = {};
	for (const [key, value] of Object.entries(variables)) {
		redacted[key] = SENSITIVE_NAME_RE.test(key) ? REDACTED : value;
	}
	return redacted;
}

/** Minimum log level from `--log-level` or `LOADSTONE_LOG_LEVEL` (default info). */
export function resolveLogLevel(flags: Flags, env: Env): Result<LogLevel, ConfigurationError> {
	const value = flags["log-level"] ?? env.LOADSTONE_LOG_LEVEL;
	if (value === undefined) return Ok("info");
	const normalised = value.trim().toLowerCase();
	if (isLogLevel(normalised)) return Ok(normalised);
	return Err(
		new ConfigurationError(`Invalid log level "${value}". Expected one of: ${LOG_LEVELS.join(", ")}`),
	);
}

/** Object store settings from the `S3_*` template variables. */
export function resolveObjectStore(
	variables: Readonly<Record<string, string>>,
): Result<ObjectStoreConfig, ConfigurationError> {
	const bucket = variables.S3_BUCKET;
	if (bucket === undefined || bucket === "") {
		return Err(new ConfigurationError(`${QUERY_VAR_PREFIX}S3_BUCKET is required`));
	}

	const accessKeyId = variables.S3_ACCESS_KEY;
	const secretAccessKey = variables.S3_SECRET_KEY;
	if ((accessKeyId === undefined) !== (secretAccessKey === undefined)) {
		return Err(
			new ConfigurationError(
				`${QUERY_VAR_PREFIX}S3_ACCESS_KEY and ${QUERY_VAR_PREFIX}S3_SECRET_KEY must be set together`,
			),
		);
	}

	return Ok({
		bucket,
		region: variables.S3_REGION || "us-east-1",
		endpoint: variables.S3_ENDPOINT || undefined,
		credentials:
			accessKeyId !== undefined && secretAccessKey !== undefined
				? { accessKeyId, secretAccessKey }
				: undefined,
	});
}

/** Remote query API key, preferring the template variable form. */
export function resolveQueryApiKey(
	variables: Readonly<Record<string, string>>,
	env: Env,
): Result<string, ConfigurationError> {
	const key = variables.DUNE_API_KEY || env.DUNE_API_KEY;
	if (!key) {
		return Err(
			new ConfigurationError(
				`Missing query API key. Set ${QUERY_VAR_PREFIX}DUNE_API_KEY (preferred) or DUNE_API_KEY`,
			),
		);
	}
	return Ok(key);
}

/** Drive key file from the environment or its template variable form. */
export function resolveDriveKeyFile(
	variables: Readonly<Record<string, string>>,
	env: Env,
): string | undefined {
	return variables.GOOGLE_APPLICATION_CREDENTIALS || env.GOOGLE_APPLICATION_CREDENTIALS || undefined;
}

/** SQL files named by `--queries` or `CH_QUERIES`, comma-separated. */
export function resolveQueryFiles(flags: Flags, env: Env): Result<string[], ConfigurationError> {
	const list = flags.queries ?? env.CH_QUERIES ?? "";
	const files = list
		.split(",")
		.map((file) => file.trim())
		.filter((file) => file !== "");
	if (files.length === 0) {
		return Err(new ConfigurationError("No queries given. Use --queries or CH_QUERIES"));
	}
	return Ok(files);
}

/**
 * Load and expand a SQL file, warning about placeholders no variable filled.
 */
export function loadStatement(
	filePath: string,
	variables: Readonly<Record<string, string>>,
	diagnostics: Diagnostics,
): Result<string, ConfigurationError> {
	const loaded = loadSqlFile(filePath, variables);
	if (!loaded.ok) return loaded;
	const unresolved = findUnresolvedPlaceholders(loaded.value);
	if (unresolved.length > 0) {
		diagnostics.warn("SQL file has unresolved placeholders", { file: filePath, unresolved });
	}
	return loaded;
}

/** Load an optional SQL file named by a flag. */
export function loadOptionalStatement(
	flags: Flags,
	name: string,
	variables: Readonly<Record<string, string>>,
	diagnostics: Diagnostics,
): Result<string | undefined, ConfigurationError> {
	const filePath = flags[name];
	if (filePath === undefined) return Ok(undefined);
	if (filePath === "true" || filePath === "") {
		return Err(new ConfigurationError(`--${name} needs a file path`));
	}
	return loadStatement(filePath, variables, diagnostics);
}
