import type { ObjectStore } from "@loadstone/adapter";
import {
	type CalendarDate,
	ConfigurationError,
	compareCalendarDates,
	type Diagnostics,
	Err,
	isValidPeriod,
	type LoadstoneError,
	Ok,
	parseDateToken,
	type Result,
	SourceResolutionError,
} from "@loadstone/core";

/** How the manifest is chosen from the candidate objects */
export type SelectionMode = "latest" | "date" | "all";

export const SELECTION_MODES = ["latest", "date", "all"] as const satisfies readonly SelectionMode[];

/** Placeholder replaced by the period in `date` mode */
export const PERIOD_PLACEHOLDER = "{{DATE}}";

export const DEFAULT_SOURCE_EXTENSION = ".parquet";

/** Ordered source locators for one run */
export type SourceManifest = readonly string[];

export interface SelectionRequest {
	/** Object key pattern, e.g. `exports/daily/{{DATE}}.parquet` */
	pathPattern: string;
	mode: SelectionMode;
	/** `YYYY-MM-DD`; required in `date` mode */
	period?: string;
	/** Extension candidates must carry (default `.parquet`) */
	extension?: string;
}

/**
 * Validate a selection mode name. `period` is accepted as an alias of `date`.
 */
export function parseSelectionMode(value: string): Result<SelectionMode, ConfigurationError> {
	const normalised = value.trim().toLowerCase();
	if (normalised === "period") return Ok("date");
	for (const mode of SELECTION_MODES) {
		if (mode === normalised) return Ok(mode);
	}
	return Err(
		new ConfigurationError(
			`Unknown selection mode "${value}". Expected one of: ${SELECTION_MODES.join(", ")}`,
		),
	);
}

/** Everything before the final path segment, or the whole pattern when it has none. */
export function listingPrefix(pathPattern: string): string {
	const slash = pathPattern.lastIndexOf("/");
	return slash === -1 ? pathPattern : pathPattern.slice(0, slash);
}

/** The `YYYY-MM-DD` token of a key's final segment, before its first dot. */
export function embeddedDate(key: string): CalendarDate | null {
	const segment = key.slice(key.lastIndexOf("/") + 1);
	const stem = segment.split(".")[0] ?? "";
	return parseDateToken(stem);
}

/**
 * Sort keys newest first by their embedded date.
 *
 * Keys without a parseable date sort after every dated key and keep
 * their listing order among themselves.
 */
export function sortByEmbeddedDate(keys: readonly string[]): string[] {
	const dated = keys.map((key) => ({ key, date: embeddedDate(key) }));
	dated.sort((a, b) => {
		if (a.date === null || b.date === null) {
			return (a.date === null ? 1 : 0) - (b.date === null ? 1 : 0);
		}
		return compareCalendarDates(b.date, a.date);
	});
	return dated.map((entry) => entry.key);
}

/**
 * Resolve the source manifest for a run.
 *
 * - `latest`: list under the pattern's prefix, keep keys with the
 *   expected extension, return the newest by embedded date.
 * - `date`: substitute the period into the pattern; no listing.
 * - `all`: list and filter as for `latest`, return every key in listing order.
 */
export async function selectSources(
	store: Pick<ObjectStore, "listObjects">,
	request: SelectionRequest,
	diagnostics: Diagnostics,
): Promise<Result<SourceManifest, LoadstoneError>> {
	if (request.mode === "date") {
		if (request.period === undefined || request.period === "") {
			return Err(new ConfigurationError("A period is required when the mode is 'date'"));
		}
		if (!isValidPeriod(request.period)) {
			return Err(
				new ConfigurationError(`Invalid period "${request.period}". Expected YYYY-MM-DD`),
			);
		}
		const key = request.pathPattern.replaceAll(PERIOD_PLACEHOLDER, request.period);
		diagnostics.info(`Selected source for ${request.period}`, { key });
		return Ok([key]);
	}

	const extension = request.extension ?? DEFAULT_SOURCE_EXTENSION;
	const prefix = listingPrefix(request.pathPattern);
	diagnostics.info("Listing candidate sources", { prefix, mode: request.mode });

	const listed = await store.listObjects(prefix);
	if (!listed.ok) return listed;

	if (listed.value.length === 0) {
		return Err(new SourceResolutionError(`No objects found under prefix "${prefix}"`));
	}

	const candidates = listed.value.map((object) => object.key).filter((key) => key.endsWith(extension));
	if (candidates.length === 0) {
		return Err(
			new SourceResolutionError(`No ${extension} objects found under prefix "${prefix}"`),
		);
	}
	diagnostics.info(`Found ${candidates.length} ${extension} objects`, {
		firstFew: candidates.slice(0, 3),
	});

	if (request.mode === "all") {
		return Ok(candidates);
	}

	for (const key of candidates) {
		if (embeddedDate(key) === null) {
			diagnostics.warn("Could not parse a date from the object key", { key });
		}
	}
	const latest = sortByEmbeddedDate(candidates)[0];
	if (latest === undefined) {
		return Err(new SourceResolutionError(`No candidates under prefix "${prefix}"`));
	}
	diagnostics.info("Selected latest source", { key: latest });
	return Ok([latest]);
}
