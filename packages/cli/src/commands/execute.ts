import { runStatementIngestion } from "@loadstone/ingest";
import { expandTemplate, findUnresolvedPlaceholders, loadSqlFile } from "@loadstone/core";
import { parseKeyValueList, requireFlag } from "../args";
import {
	parsePositiveInt,
	queryVariables,
	redactVariables,
	resolveConnection,
	resolveQueryApiKey,
} from "../config";
import {
	type CommandContext,
	configurationFailure,
	EXIT_FAILED,
	EXIT_OK,
	withTableStore,
} from "../context";
import { print, printError } from "../output";

/** Template variable that carries the remote execution id into the insert statement */
export const EXECUTION_ID_VARIABLE = "DUNE_EXECUTION_ID";

/**
 * `loadstone execute --query-id <id> [--params k=v,...] --insert-sql <file>`
 *
 * Runs a saved remote query, waits for it to settle, then runs the insert
 * statement with the execution id available as `{{DUNE_EXECUTION_ID}}`.
 * Table creation only happens with `--create-table`.
 */
export async function executeCommand(ctx: CommandContext): Promise<number> {
	const { flags, logger } = ctx;

	const queryId = requireFlag(flags, "query-id");
	if (!queryId.ok) return configurationFailure(queryId.error);

	const insertFile = requireFlag(flags, "insert-sql");
	if (!insertFile.ok) return configurationFailure(insertFile.error);

	const params = parseKeyValueList(flags.params ?? "");
	if (!params.ok) return configurationFailure(params.error);

	const timeoutSeconds = parsePositiveInt(flags["timeout-seconds"], "--timeout-seconds", 900);
	if (!timeoutSeconds.ok) return configurationFailure(timeoutSeconds.error);
	const pollSeconds = parsePositiveInt(flags["poll-seconds"], "--poll-seconds", 2);
	if (!pollSeconds.ok) return configurationFailure(pollSeconds.error);

	const variables = queryVariables(ctx.env);
	logger.debug("Template variables", redactVariables(variables));

	const apiKey = resolveQueryApiKey(variables, ctx.env);
	if (!apiKey.ok) return configurationFailure(apiKey.error);

	// Expanded once the remote run has settled, so the new execution id
	// takes precedence over any CH_QUERY_VAR_DUNE_EXECUTION_ID
	const insertTemplate = loadSqlFile(insertFile.value, {});
	if (!insertTemplate.ok) return configurationFailure(insertTemplate.error);

	const createFile = flags["create-table-sql"];
	const createTemplate =
		createFile !== undefined && createFile !== "true" ? loadSqlFile(createFile, {}) : undefined;
	if (createTemplate !== undefined && !createTemplate.ok) {
		return configurationFailure(createTemplate.error);
	}

	const connection = resolveConnection(flags, ctx.env);
	if (!connection.ok) return configurationFailure(connection.error);

	const runner = ctx.factories.queryRunner(apiKey.value, logger);
	logger.info(`Executing remote query ${queryId.value}`, { params: redactVariables(params.value) });
	const executionId = await runner.execute(queryId.value, params.value);
	if (!executionId.ok) {
		printError(executionId.error.message);
		return EXIT_FAILED;
	}

	const settled = await runner.waitForCompletion(executionId.value, {
		timeoutMs: timeoutSeconds.value * 1000,
		pollMs: pollSeconds.value * 1000,
	});
	if (!settled.ok) {
		printError(settled.error.message);
		return EXIT_FAILED;
	}
	logger.info(`Ingesting with execution id ${executionId.value}`);

	const executionVars = { ...variables, [EXECUTION_ID_VARIABLE]: executionId.value };
	const insertSql = expandTemplate(insertTemplate.value, executionVars);
	const unresolved = findUnresolvedPlaceholders(insertSql);
	if (unresolved.length > 0) {
		logger.warn("SQL file has unresolved placeholders", { file: insertFile.value, unresolved });
	}
	const createTableSql =
		createTemplate === undefined ? undefined : expandTemplate(createTemplate.value, executionVars);

	const code = await withTableStore(ctx, connection.value, (store) =>
		runStatementIngestion(
			store,
			{
				insertSql,
				createTableSql,
				skipTableCreation: flags["create-table"] !== "true",
			},
			logger,
		),
	);
	if (code === EXIT_OK) {
		print(`Ingested execution ${executionId.value} of query ${queryId.value}`);
	} else {
		printError(`Ingestion of execution ${executionId.value} failed`);
	}
	return code;
}
