import type { FileDownloadSource, ObjectStore } from "@loadstone/adapter";
import type { TabularFormat } from "@loadstone/parser";
import { type IngestionDeps, type IngestionPlan, runIngestion } from "./orchestrator";
import type { SelectionRequest } from "./source-selector";
import { createDownloadSource, createObjectStoreSource, createTabularPathSource } from "./sources";

/** Ingest one local file or URL. */
export async function ingestFromTabularPath(
	locator: string,
	plan: IngestionPlan,
	deps: IngestionDeps,
	format?: TabularFormat,
): Promise<boolean> {
	const report = await runIngestion(createTabularPathSource({ locator, format }), plan, deps);
	return report.state === "done";
}

/** Ingest the objects of a bucket chosen by `selection`. */
export async function ingestFromObjectStore(
	store: ObjectStore,
	selection: SelectionRequest,
	plan: IngestionPlan,
	deps: IngestionDeps,
): Promise<boolean> {
	const family = createObjectStoreSource({ store, selection, diagnostics: deps.diagnostics });
	const report = await runIngestion(family, plan, deps);
	return report.state === "done";
}

/** Ingest one file downloaded by id. */
export async function ingestFromDownload(
	source: FileDownloadSource,
	fileId: string,
	plan: IngestionPlan,
	deps: IngestionDeps,
	format?: TabularFormat,
): Promise<boolean> {
	const family = createDownloadSource({ source, fileId, format, diagnostics: deps.diagnostics });
	const report = await runIngestion(family, plan, deps);
	return report.state === "done";
}
