import type { ColumnBinding, ColumnMapping, DestinationSchema } from "../schema";
import { cleanHeader } from "./clean";

/**
 * Resolve a cleaned source name to a canonical destination name, or undefined.
 */
type NameResolver = (cleaned: string) => string | undefined;

function project(
	cleaned: readonly string[],
	schema: DestinationSchema,
	resolve: NameResolver,
): ColumnBinding[] {
	const bindings: ColumnBinding[] = [];
	const taken = new Set<string>();

	cleaned.forEach((name, sourceIndex) => {
		const column = resolve(name);
		if (column === undefined || taken.has(column)) return;

		const type = schema.get(column);
		if (type === undefined) return;

		taken.add(column);
		bindings.push({ sourceIndex, column, type });
	});

	return bindings;
}

/**
 * Match a raw source header against the destination schema.
 *
 * Names are cleaned first (see `cleanColumnName`). Exact, case-sensitive
 * matches are tried across the whole header; only if none match is a
 * case-insensitive pass attempted, which maps to the destination's own
 * casing. Unmatched source columns are dropped, and a destination column
 * claimed twice keeps its first source column. An empty result means the
 * source and destination share no columns.
 */
export function reconcile(rawHeader: readonly string[], schema: DestinationSchema): ColumnMapping {
	const cleaned = cleanHeader(rawHeader);

	const exact = project(cleaned, schema, (name) => (schema.has(name) ? name : undefined));
	if (exact.length > 0) return exact;

	const byLowerCase = new Map<string, string>();
	for (const column of schema.keys()) {
		byLowerCase.set(column.toLowerCase(), column);
	}

	return project(cleaned, schema, (name) => byLowerCase.get(name.toLowerCase()));
}
