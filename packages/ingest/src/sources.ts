import { readFile } from "node:fs/promises";
import type { FileDownloadSource, ObjectStore } from "@loadstone/adapter";
import {
	AdapterError,
	type Diagnostics,
	Err,
	type LoadstoneError,
	Ok,
	type Result,
	toError,
} from "@loadstone/core";
import { detectFormat, type TabularFormat } from "@loadstone/parser";
import { type SelectionRequest, type SourceManifest, selectSources } from "./source-selector";

/** Bytes of one source, ready to parse */
export interface FetchedSource {
	locator: string;
	format: TabularFormat;
	bytes: Uint8Array;
}

/**
 * One family of sources. Variants differ only in how sources are found
 * and fetched; parsing onwards is shared.
 */
export interface SourceFamily {
	readonly kind: "tabular-path" | "object-store" | "download";
	/** Human-readable description for logs */
	readonly description: string;
	resolveSources(): Promise<Result<SourceManifest, LoadstoneError>>;
	fetch(locator: string): Promise<Result<FetchedSource, LoadstoneError>>;
}

function isRemoteLocator(locator: string): boolean {
	return /^https?:\/\//i.test(locator);
}

async function fetchUrl(url: string): Promise<Uint8Array> {
	const response = await fetch(url);
	if (!response.ok) {
		throw new AdapterError(`GET ${url} returned ${response.status}`);
	}
	return new Uint8Array(await response.arrayBuffer());
}

export interface TabularPathOptions {
	/** Local file path or http(s) URL */
	locator: string;
	/** Overrides detection from the extension */
	format?: TabularFormat;
}

/** A single file read from the local filesystem or over HTTP. */
export function createTabularPathSource(options: TabularPathOptions): SourceFamily {
	const { locator } = options;

	return {
		kind: "tabular-path",
		description: locator,

		async resolveSources() {
			const format = options.format === undefined ? detectFormat(locator) : Ok(options.format);
			if (!format.ok) return format;
			return Ok([locator]);
		},

		async fetch(target) {
			const format = options.format === undefined ? detectFormat(target) : Ok(options.format);
			if (!format.ok) return format;
			try {
				const bytes = isRemoteLocator(target) ? await fetchUrl(target) : await readFile(target);
				return Ok({ locator: target, format: format.value, bytes });
			} catch (error) {
				if (error instanceof AdapterError) return Err(error);
				return Err(new AdapterError(`Failed to read ${target}`, toError(error)));
			}
		},
	};
}

export interface ObjectStoreSourceOptions {
	store: ObjectStore;
	selection: SelectionRequest;
	diagnostics: Diagnostics;
}

/** Objects in one bucket, chosen by a selection mode. */
export function createObjectStoreSource(options: ObjectStoreSourceOptions): SourceFamily {
	const { store, selection, diagnostics } = options;

	return {
		kind: "object-store",
		description: `s3://${store.bucket}/${selection.pathPattern}`,

		resolveSources() {
			return selectSources(store, selection, diagnostics);
		},

		async fetch(key) {
			const format = detectFormat(key);
			if (!format.ok) return format;
			diagnostics.info(`Downloading s3://${store.bucket}/${key}`);
			const bytes = await store.getObject(key);
			if (!bytes.ok) return bytes;
			return Ok({ locator: key, format: format.value, bytes: bytes.value });
		},
	};
}

export interface DownloadSourceOptions {
	source: FileDownloadSource;
	fileId: string;
	/** Overrides detection from the remote file name (CSV when the name has no known extension) */
	format?: TabularFormat;
	diagnostics: Diagnostics;
}

/** Percent steps at which download progress is logged */
const PROGRESS_STEP = 25;

/** A single file downloaded by id from a remote file service. */
export function createDownloadSource(options: DownloadSourceOptions): SourceFamily {
	const { source, fileId, diagnostics } = options;

	return {
		kind: "download",
		description: `file ${fileId}`,

		async resolveSources() {
			return Ok([fileId]);
		},

		async fetch(id) {
			const metadata = await source.getMetadata(id);
			if (!metadata.ok) return metadata;
			const { name } = metadata.value;

			let format: TabularFormat = "csv";
			if (options.format !== undefined) {
				format = options.format;
			} else {
				const detected = detectFormat(name);
				if (detected.ok) format = detected.value;
			}

			diagnostics.info(`Downloading file: ${name} (ID: ${id})`);
			let nextStep = PROGRESS_STEP;
			const bytes = await source.download(id, ({ bytesReceived, totalBytes }) => {
				if (totalBytes === undefined) return;
				const percent = Math.floor((bytesReceived / totalBytes) * 100);
				if (percent >= nextStep) {
					diagnostics.info(`Download progress: ${percent}%`);
					nextStep = (Math.floor(percent / PROGRESS_STEP) + 1) * PROGRESS_STEP;
				}
			});
			if (!bytes.ok) return bytes;

			diagnostics.info(`Download complete: ${name}`, { bytes: bytes.value.byteLength });
			return Ok({ locator: name, format, bytes: bytes.value });
		},
	};
}
