export { ingestFromDownload, ingestFromObjectStore, ingestFromTabularPath } from "./ingest";
export {
	type Compaction,
	type IngestionDeps,
	type IngestionPlan,
	type IngestionReport,
	type IngestionState,
	runIngestion,
	type SourceReport,
} from "./orchestrator";
export {
	DEFAULT_SOURCE_EXTENSION,
	embeddedDate,
	listingPrefix,
	PERIOD_PLACEHOLDER,
	parseSelectionMode,
	SELECTION_MODES,
	type SelectionMode,
	type SelectionRequest,
	type SourceManifest,
	selectSources,
	sortByEmbeddedDate,
} from "./source-selector";
export {
	createDownloadSource,
	createObjectStoreSource,
	createTabularPathSource,
	type DownloadSourceOptions,
	type FetchedSource,
	type ObjectStoreSourceOptions,
	type SourceFamily,
	type TabularPathOptions,
} from "./sources";
export {
	extractInsertTable,
	type NamedStatement,
	runQueries,
	runStatementIngestion,
	type StatementIngestionPlan,
} from "./statement-runner";
