import { Logger } from "@loadstone/core";
import { parseArgs } from "./args";
import { downloadCommand } from "./commands/download";
import { executeCommand } from "./commands/execute";
import { fileCommand } from "./commands/file";
import { objectStoreCommand } from "./commands/object-store";
import { queryCommand } from "./commands/query";
import { sqlCommand } from "./commands/sql";
import { type Env, resolveLogLevel } from "./config";
import {
	type AdapterFactories,
	type Command,
	configurationFailure,
	defaultFactories,
	EXIT_CONFIGURATION,
	EXIT_OK,
} from "./context";
import { print, printError } from "./output";

export const VERSION = "0.1.0";

export const HELP = `loadstone: load CSV and Parquet files into ClickHouse

Usage: loadstone <command> [options]

Commands:
  file <path|url>          Load one local file or HTTP(S) URL
  object-store             Load objects from an S3 bucket
  download                 Load one Google Drive file
  sql                      Run create/insert/optimize SQL files against the store
  query                    Run SQL files in order
  execute                  Run a remote saved query, then ingest its results with SQL

Table options (file, object-store, download):
  --table <name>           Destination table ("table" or "database.table")
  --format <csv|parquet>   Override format detection (file, download)
  --create-table-sql <f>   SQL file creating the table ({{TARGET_TABLE}} is available)
  --skip-table-creation    Do not run the create statement
  --max-rows <n>           Rows read per source (default: 1000000)
  --optimize               Run OPTIMIZE TABLE ... FINAL after loading
  --optimize-sql <f>       Run this SQL file after loading instead
  --watermark-column <c>   Log MAX(<c>) after loading

Object store options:
  --s3-path <pattern>      Key pattern, e.g. exports/daily/{{DATE}}.parquet
  --mode <latest|date|all> Which objects to load (default: latest)
  --date <YYYY-MM-DD>      Period to load (required with --mode date)
  --extension <ext>        Extension of candidate objects (default: from pattern, else .parquet)

Download options:
  --file-id <id>           Drive file id

SQL options:
  --insert-sql <f>         Insert statement file
  --queries <a.sql,b.sql>  Files for the query command (or CH_QUERIES)

Execute options:
  --query-id <id>          Saved query id
  --params <k=v,...>       Query parameters
  --create-table           Run --create-table-sql before inserting
  --timeout-seconds <n>    Give up waiting after n seconds (default: 900)
  --poll-seconds <n>       Status poll interval (default: 2)

Connection (flag, then environment, then default):
  --host                   CH_HOST (localhost)
  --port                   CH_PORT (8123)
  --user                   CH_USER (default)
  --password               CH_PASSWORD
  --db                     CH_DB (default)
  --secure <bool>          CH_SECURE (false)
  --verify <bool>          CH_VERIFY (true)

Template variables:
  CH_QUERY_VAR_<NAME>      Replaces {{NAME}} in SQL files; also carries S3_BUCKET,
                           S3_ACCESS_KEY, S3_SECRET_KEY, S3_REGION, S3_ENDPOINT, DUNE_API_KEY

General:
  --log-level <level>      debug, info, warn or error (or LOADSTONE_LOG_LEVEL)
  --help, -h               Show this help message
  --version, -v            Show version

Exit codes: 0 success, 1 ingestion failure, 2 configuration error

Examples:
  loadstone file ./prices.csv --table analytics.prices --create-table-sql sql/prices.sql
  loadstone object-store --table events --s3-path exports/{{DATE}}.parquet --mode date --date 2024-03-01
  loadstone download --file-id 1AbC --table wallets --optimize
  loadstone query --queries sql/a.sql,sql/b.sql
`;

const COMMANDS: Readonly<Record<string, Command>> = {
	file: fileCommand,
	"object-store": objectStoreCommand,
	download: downloadCommand,
	sql: sqlCommand,
	query: queryCommand,
	execute: executeCommand,
};

export interface RunOptions {
	env: Env;
	/** Where log lines go (default stderr) */
	writeLog?: (line: string) => void;
	signal?: AbortSignal;
	factories?: AdapterFactories;
}

/**
 * Parse `argv`, dispatch to a command and return the process exit code.
 */
export async function runCli(argv: string[], options: RunOptions): Promise<number> {
	const { command, flags, positional } = parseArgs(argv);

	if (flags.version === "true" || flags.v === "true") {
		print(VERSION);
		return EXIT_OK;
	}

	if (flags.help === "true" || flags.h === "true" || command.length === 0) {
		print(HELP);
		return EXIT_OK;
	}

	const cmd = command.join(" ");
	if (cmd === "help") {
		print(HELP);
		return EXIT_OK;
	}
	if (cmd === "version") {
		print(VERSION);
		return EXIT_OK;
	}

	const handler = COMMANDS[cmd];
	if (handler === undefined) {
		printError(`Unknown command: ${cmd}\nRun 'loadstone --help' for usage.`);
		return EXIT_CONFIGURATION;
	}

	const level = resolveLogLevel(flags, options.env);
	if (!level.ok) return configurationFailure(level.error);

	const writeLog = options.writeLog ?? ((line: string) => process.stderr.write(`${line}\n`));
	const logger = new Logger(level.value, { command: cmd }, writeLog);

	return handler({
		flags,
		positional,
		env: options.env,
		logger,
		signal: options.signal,
		factories: options.factories ?? defaultFactories,
	});
}
