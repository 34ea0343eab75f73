import { ingestFromDownload } from "@loadstone/ingest";
import { requireFlag } from "../args";
import {
	queryVariables,
	redactVariables,
	resolveConnection,
	resolveDriveKeyFile,
} from "../config";
import { type CommandContext, configurationFailure, EXIT_OK, withTableStore } from "../context";
import { print, printError } from "../output";
import { resolveFormat, resolvePlan } from "./plan";

/** `loadstone download --file-id <id> --table <name> [--format csv|parquet]` */
export async function downloadCommand(ctx: CommandContext): Promise<number> {
	const fileId = requireFlag(ctx.flags, "file-id");
	if (!fileId.ok) return configurationFailure(fileId.error);

	const table = requireFlag(ctx.flags, "table");
	if (!table.ok) return configurationFailure(table.error);

	const format = resolveFormat(ctx.flags);
	if (!format.ok) return configurationFailure(format.error);

	const variables = {
		...queryVariables(ctx.env),
		TARGET_TABLE: table.value,
		GDRIVE_FILE_ID: fileId.value,
	};
	ctx.logger.debug("Template variables", redactVariables(variables));

	const plan = resolvePlan(ctx, table.value, variables);
	if (!plan.ok) return configurationFailure(plan.error);

	const connection = resolveConnection(ctx.flags, ctx.env);
	if (!connection.ok) return configurationFailure(connection.error);

	const source = ctx.factories.downloadSource(resolveDriveKeyFile(variables, ctx.env));

	const code = await withTableStore(ctx, connection.value, (store) =>
		ingestFromDownload(
			source,
			fileId.value,
			plan.value,
			{ store, diagnostics: ctx.logger },
			format.value,
		),
	);
	if (code === EXIT_OK) {
		print(`Loaded file ${fileId.value} into ${table.value}`);
	} else {
		printError(`Ingestion of file ${fileId.value} into ${table.value} failed`);
	}
	return code;
}
