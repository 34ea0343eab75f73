import { ingestFromTabularPath } from "@loadstone/ingest";
import { ConfigurationError } from "@loadstone/core";
import { requireFlag } from "../args";
import { queryVariables, redactVariables, resolveConnection } from "../config";
import { type CommandContext, configurationFailure, EXIT_OK, withTableStore } from "../context";
import { print, printError } from "../output";
import { resolveFormat, resolvePlan } from "./plan";

/** `loadstone file <path|url> --table <name>` */
export async function fileCommand(ctx: CommandContext): Promise<number> {
	const locator = ctx.positional[0] ?? ctx.flags.path;
	if (locator === undefined || locator === "true") {
		return configurationFailure(new ConfigurationError("A file path or URL is required"));
	}

	const table = requireFlag(ctx.flags, "table");
	if (!table.ok) return configurationFailure(table.error);

	const format = resolveFormat(ctx.flags);
	if (!format.ok) return configurationFailure(format.error);

	const variables = { ...queryVariables(ctx.env), TARGET_TABLE: table.value };
	ctx.logger.debug("Template variables", redactVariables(variables));

	const plan = resolvePlan(ctx, table.value, variables);
	if (!plan.ok) return configurationFailure(plan.error);

	const connection = resolveConnection(ctx.flags, ctx.env);
	if (!connection.ok) return configurationFailure(connection.error);

	const code = await withTableStore(ctx, connection.value, (store) =>
		ingestFromTabularPath(locator, plan.value, { store, diagnostics: ctx.logger }, format.value),
	);
	if (code === EXIT_OK) {
		print(`Loaded ${locator} into ${table.value}`);
	} else {
		printError(`Ingestion of ${locator} into ${table.value} failed`);
	}
	return code;
}
