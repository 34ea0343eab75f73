export { type ParsedArgs, parseArgs, parseKeyValueList, requireFlag } from "./args";
export { HELP, type RunOptions, runCli, VERSION } from "./cli";
export {
	type Env,
	parseBooleanSetting,
	parsePositiveInt,
	QUERY_VAR_PREFIX,
	queryVariables,
	redactVariables,
	resolveConnection,
	resolveLogLevel,
	resolveObjectStore,
} from "./config";
export {
	type AdapterFactories,
	type CommandContext,
	defaultFactories,
	EXIT_CONFIGURATION,
	EXIT_FAILED,
	EXIT_OK,
	type QueryRunner,
} from "./context";
