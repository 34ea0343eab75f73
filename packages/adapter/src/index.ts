export { ClickHouseTableStore, storeTypeToSemantic, toStoreValue } from "./clickhouse";
export { type DriveConfig, DriveDownloadSource } from "./drive";
export {
	COMPLETED_STATES,
	DEFAULT_QUERY_API_URL,
	FAILED_STATES,
	QueryExecutionClient,
	type QueryExecutionConfig,
	type WaitOptions,
} from "./query-execution";
export { S3ObjectStore } from "./s3";
export { readString, toCause, wrapAsync } from "./shared";
export type {
	ClickHouseConfig,
	DownloadProgress,
	FileDownloadSource,
	FileMetadata,
	ObjectInfo,
	ObjectStore,
	ObjectStoreConfig,
	TableStore,
} from "./types";
