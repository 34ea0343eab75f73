import { basename } from "node:path";
import { type NamedStatement, runQueries } from "@loadstone/ingest";
import { loadStatement, queryVariables, redactVariables, resolveConnection, resolveQueryFiles } from "../config";
import { type CommandContext, configurationFailure, EXIT_OK, withTableStore } from "../context";
import { print, printError } from "../output";

/** `loadstone query [--queries a.sql,b.sql]`: run SQL files in order. */
export async function queryCommand(ctx: CommandContext): Promise<number> {
	const files = resolveQueryFiles(ctx.flags, ctx.env);
	if (!files.ok) return configurationFailure(files.error);

	const variables = queryVariables(ctx.env);
	ctx.logger.debug("Template variables", redactVariables(variables));

	const statements: NamedStatement[] = [];
	for (const file of files.value) {
		const sql = loadStatement(file, variables, ctx.logger);
		if (!sql.ok) return configurationFailure(sql.error);
		statements.push({ name: basename(file), sql: sql.value });
	}

	const connection = resolveConnection(ctx.flags, ctx.env);
	if (!connection.ok) return configurationFailure(connection.error);

	const code = await withTableStore(ctx, connection.value, (store) =>
		runQueries(store, statements, ctx.logger),
	);
	if (code === EXIT_OK) {
		print(`Executed ${statements.length} queries`);
	} else {
		printError("Query run failed");
	}
	return code;
}
