import {
	DEFAULT_SOURCE_EXTENSION,
	ingestFromObjectStore,
	parseSelectionMode,
	type SelectionRequest,
} from "@loadstone/ingest";
import { ConfigurationError, isValidPeriod } from "@loadstone/core";
import { requireFlag } from "../args";
import {
	queryVariables,
	redactVariables,
	resolveConnection,
	resolveObjectStore,
} from "../config";
import { type CommandContext, configurationFailure, EXIT_OK, withTableStore } from "../context";
import { print, printError } from "../output";
import { resolvePlan } from "./plan";

const KNOWN_EXTENSIONS = [".parquet", ".csv"];

/** Extension from `--extension`, else the pattern's own, else `.parquet`. */
function resolveExtension(flag: string | undefined, pathPattern: string): string {
	if (flag !== undefined && flag !== "true") {
		return flag.startsWith(".") ? flag : `.${flag}`;
	}
	const lower = pathPattern.toLowerCase();
	return KNOWN_EXTENSIONS.find((ext) => lower.endsWith(ext)) ?? DEFAULT_SOURCE_EXTENSION;
}

/**
 * `loadstone object-store --table <name> --s3-path <pattern> [--mode latest|date|all] [--date YYYY-MM-DD]`
 */
export async function objectStoreCommand(ctx: CommandContext): Promise<number> {
	const { flags } = ctx;

	const table = requireFlag(flags, "table");
	if (!table.ok) return configurationFailure(table.error);

	const pathPattern = requireFlag(flags, "s3-path");
	if (!pathPattern.ok) return configurationFailure(pathPattern.error);

	const mode = parseSelectionMode(flags.mode ?? "latest");
	if (!mode.ok) return configurationFailure(mode.error);

	const period = flags.date;
	if (mode.value === "date") {
		if (period === undefined) {
			return configurationFailure(new ConfigurationError("--date is required when --mode is date"));
		}
		if (!isValidPeriod(period)) {
			return configurationFailure(
				new ConfigurationError(`Invalid --date "${period}". Expected YYYY-MM-DD`),
			);
		}
	}

	const variables = { ...queryVariables(ctx.env), TARGET_TABLE: table.value };
	ctx.logger.debug("Template variables", redactVariables(variables));

	const storeConfig = resolveObjectStore(variables);
	if (!storeConfig.ok) return configurationFailure(storeConfig.error);

	const plan = resolvePlan(ctx, table.value, variables);
	if (!plan.ok) return configurationFailure(plan.error);

	const connection = resolveConnection(flags, ctx.env);
	if (!connection.ok) return configurationFailure(connection.error);

	const selection: SelectionRequest = {
		pathPattern: pathPattern.value,
		mode: mode.value,
		period,
		extension: resolveExtension(flags.extension, pathPattern.value),
	};
	const objectStore = ctx.factories.objectStore(storeConfig.value);

	const code = await withTableStore(ctx, connection.value, (store) =>
		ingestFromObjectStore(objectStore, selection, plan.value, {
			store,
			diagnostics: ctx.logger,
		}),
	);
	const source = `s3://${storeConfig.value.bucket}/${pathPattern.value}`;
	if (code === EXIT_OK) {
		print(`Loaded ${source} (${mode.value}) into ${table.value}`);
	} else {
		printError(`Ingestion of ${source} into ${table.value} failed`);
	}
	return code;
}
