import { runStatementIngestion } from "@loadstone/ingest";
import { requireFlag } from "../args";
import {
	loadOptionalStatement,
	loadStatement,
	queryVariables,
	redactVariables,
	resolveConnection,
} from "../config";
import { type CommandContext, configurationFailure, EXIT_OK, withTableStore } from "../context";
import { print, printError } from "../output";

/**
 * `loadstone sql --insert-sql <file> [--create-table-sql <file>] [--optimize-sql <file>]`
 *
 * The store pulls the data itself, e.g. through its `s3()` or `url()` table functions.
 */
export async function sqlCommand(ctx: CommandContext): Promise<number> {
	const insertFile = requireFlag(ctx.flags, "insert-sql");
	if (!insertFile.ok) return configurationFailure(insertFile.error);

	const variables = queryVariables(ctx.env);
	ctx.logger.debug("Template variables", redactVariables(variables));

	const insertSql = loadStatement(insertFile.value, variables, ctx.logger);
	if (!insertSql.ok) return configurationFailure(insertSql.error);
	const createTableSql = loadOptionalStatement(ctx.flags, "create-table-sql", variables, ctx.logger);
	if (!createTableSql.ok) return configurationFailure(createTableSql.error);
	const optimizeSql = loadOptionalStatement(ctx.flags, "optimize-sql", variables, ctx.logger);
	if (!optimizeSql.ok) return configurationFailure(optimizeSql.error);

	const connection = resolveConnection(ctx.flags, ctx.env);
	if (!connection.ok) return configurationFailure(connection.error);

	const code = await withTableStore(ctx, connection.value, (store) =>
		runStatementIngestion(
			store,
			{
				insertSql: insertSql.value,
				createTableSql: createTableSql.value,
				optimizeSql: optimizeSql.value,
				skipTableCreation: ctx.flags["skip-table-creation"] === "true",
			},
			ctx.logger,
		),
	);
	if (code === EXIT_OK) {
		print(`Ran ${insertFile.value}`);
	} else {
		printError(`Statement ingestion from ${insertFile.value} failed`);
	}
	return code;
}
