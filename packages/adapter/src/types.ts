import type { AdapterError, CoercedRow, DestinationSchema, Result } from "@loadstone/core";

/** Connection settings for the ClickHouse table store */
export interface ClickHouseConfig {
	host: string;
	port: number;
	username: string;
	password: string;
	database: string;
	/** Connect over HTTPS */
	secure: boolean;
	/** Verify the server certificate when `secure` is set */
	verify: boolean;
}

/**
 * Destination table store.
 *
 * All methods return `Result` and never throw. Table names are passed
 * as `table` or `database.table` and must already be validated.
 */
export interface TableStore {
	/** Run a statement that returns no rows (DDL, INSERT ... SELECT) */
	execute(statement: string): Promise<Result<void, AdapterError>>;

	/** Run a statement and return its rows as objects keyed by column name */
	query(statement: string): Promise<Result<Record<string, unknown>[], AdapterError>>;

	/** Append rows whose cells are aligned with `columns` */
	bulkInsert(
		table: string,
		rows: readonly CoercedRow[],
		columns: readonly string[],
	): Promise<Result<void, AdapterError>>;

	/** Column names and semantic types of a table, in declaration order */
	describeTable(table: string): Promise<Result<DestinationSchema, AdapterError>>;

	tableExists(table: string): Promise<Result<boolean, AdapterError>>;

	countRows(table: string): Promise<Result<number, AdapterError>>;

	/** Maximum value of a column rendered as text, or null for an empty table */
	latestValue(table: string, column: string): Promise<Result<string | null, AdapterError>>;

	/** Force a merge of the table's parts */
	optimize(table: string): Promise<Result<void, AdapterError>>;

	close(): Promise<void>;
}

/** Information about an object in a bucket */
export interface ObjectInfo {
	/** Object key */
	key: string;
	/** Object size in bytes */
	size: number;
	/** Last modification date */
	lastModified: Date;
}

/** Connection settings for an S3-compatible object store */
export interface ObjectStoreConfig {
	bucket: string;
	/** AWS region (defaults to us-east-1) */
	region?: string;
	/** Custom endpoint for S3-compatible services */
	endpoint?: string;
	/** Static credentials; the SDK default chain is used when omitted */
	credentials?: {
		accessKeyId: string;
		secretAccessKey: string;
	};
}

/** Read-only access to one bucket */
export interface ObjectStore {
	readonly bucket: string;

	/** List every object under a prefix, following continuation tokens */
	listObjects(prefix: string): Promise<Result<ObjectInfo[], AdapterError>>;

	/** Retrieve an object's bytes */
	getObject(key: string): Promise<Result<Uint8Array, AdapterError>>;
}

/** Metadata of a remotely hosted file */
export interface FileMetadata {
	id: string;
	name: string;
	mimeType?: string;
}

/** Progress of a running download */
export interface DownloadProgress {
	bytesReceived: number;
	/** Total size when the service reports one */
	totalBytes?: number;
}

/** A remote file service that serves files by id (e.g. Google Drive) */
export interface FileDownloadSource {
	getMetadata(fileId: string): Promise<Result<FileMetadata, AdapterError>>;

	download(
		fileId: string,
		onProgress?: (progress: DownloadProgress) => void,
	): Promise<Result<Uint8Array, AdapterError>>;
}
