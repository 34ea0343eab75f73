const BOM = "\uFEFF";
const WHITESPACE_RUN = /\s+/g;
const NON_WORD = /[^\p{L}\p{N}_]/gu;

/**
 * Normalise a raw source column name for matching.
 *
 * Removes byte-order marks, trims, collapses whitespace runs to `_` and
 * drops any remaining character that is not a letter, digit or underscore.
 * Case is preserved.
 */
export function cleanColumnName(name: string): string {
	return name
		.replaceAll(BOM, "")
		.trim()
		.replace(WHITESPACE_RUN, "_")
		.replace(NON_WORD, "");
}

/** Clean every name in a header, keeping positions. */
export function cleanHeader(header: readonly string[]): string[] {
	return header.map(cleanColumnName);
}
