import {
	type ClickHouseConfig,
	ClickHouseTableStore,
	DriveDownloadSource,
	type FileDownloadSource,
	type ObjectStore,
	type ObjectStoreConfig,
	QueryExecutionClient,
	S3ObjectStore,
	type TableStore,
} from "@loadstone/adapter";
import type { ConfigurationError, Diagnostics } from "@loadstone/core";
import type { Env } from "./config";
import { printError } from "./output";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIGURATION = 2;

/** The part of the remote query client the `execute` command drives */
export type QueryRunner = Pick<QueryExecutionClient, "execute" | "waitForCompletion">;

/** Constructors for external collaborators, replaced in tests. */
export interface AdapterFactories {
	tableStore(config: ClickHouseConfig): TableStore;
	objectStore(config: ObjectStoreConfig): ObjectStore;
	downloadSource(keyFile: string | undefined): FileDownloadSource;
	queryRunner(apiKey: string, diagnostics: Diagnostics): QueryRunner;
}

export const defaultFactories: AdapterFactories = {
	tableStore: (config) => new ClickHouseTableStore(config),
	objectStore: (config) => new S3ObjectStore(config),
	downloadSource: (keyFile) => new DriveDownloadSource({ keyFile }),
	queryRunner: (apiKey, diagnostics) => new QueryExecutionClient({ apiKey, diagnostics }),
};

export interface CommandContext {
	flags: Readonly<Record<string, string>>;
	positional: readonly string[];
	env: Env;
	logger: Diagnostics;
	/** Aborted on interrupt; checked between sources */
	signal?: AbortSignal;
	factories: AdapterFactories;
}

export type Command = (ctx: CommandContext) => Promise<number>;

/** Report a configuration error and return its exit code. */
export function configurationFailure(error: ConfigurationError): number {
	printError(error.message);
	return EXIT_CONFIGURATION;
}

/** Run `fn` against a table store, closing the store afterwards. */
export async function withTableStore(
	ctx: CommandContext,
	config: ClickHouseConfig,
	fn: (store: TableStore) => Promise<boolean>,
): Promise<number> {
	ctx.logger.info(`Connecting to ClickHouse at ${config.host}:${config.port}`, {
		database: config.database,
		secure: config.secure,
	});
	const store = ctx.factories.tableStore(config);
	try {
		return (await fn(store)) ? EXIT_OK : EXIT_FAILED;
	} finally {
		await store.close();
	}
}
