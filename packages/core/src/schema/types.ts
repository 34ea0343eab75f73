// ---------------------------------------------------------------------------
// Data model shared by the parser, reconciler, coercion module and orchestrator
// ---------------------------------------------------------------------------

/** Semantic type of a destination column, independent of the store's own type names. */
export type SemanticType = "integer" | "unsigned" | "float" | "date" | "datetime" | "text";

/** Valid semantic type tags. */
export const SEMANTIC_TYPES = [
	"integer",
	"unsigned",
	"float",
	"date",
	"datetime",
	"text",
] as const satisfies readonly SemanticType[];

/**
 * Authoritative column-name → semantic-type mapping of the destination table.
 * Insertion order is the table's column order; names are case-sensitive.
 */
export type DestinationSchema = ReadonlyMap<string, SemanticType>;

/** Header and capped rows read from one source, before any cleaning or typing. */
export interface RawTable {
	/** Column names exactly as they appear in the source. */
	readonly header: readonly string[];
	/** Raw cells; a row may be shorter or longer than the header. */
	readonly rows: readonly (readonly string[])[];
	/** True when the row cap cut the source short. */
	readonly truncated: boolean;
}

/** One matched source column. */
export interface ColumnBinding {
	/** Position of the column in the raw header. */
	readonly sourceIndex: number;
	/** Canonical destination column name. */
	readonly column: string;
	readonly type: SemanticType;
}

/**
 * Matched columns ordered by first-seen source index. Destination names are
 * unique. An empty mapping means nothing matched.
 */
export type ColumnMapping = readonly ColumnBinding[];

/** Calendar date with no time or zone. */
export interface CalendarDate {
	readonly kind: "date";
	readonly year: number;
	readonly month: number;
	readonly day: number;
}

/** Wall-clock timestamp with no zone; a trailing UTC marker is dropped, not converted. */
export interface NaiveDateTime {
	readonly kind: "datetime";
	readonly year: number;
	readonly month: number;
	readonly day: number;
	readonly hour: number;
	readonly minute: number;
	readonly second: number;
	readonly microsecond: number;
}

/** Explicit absence of a value, distinct from an empty string or zero. */
export type NoValue = null;

/** The absence marker. */
export const NO_VALUE: NoValue = null;

/** A typed cell ready for insertion. */
export type CellValue = bigint | number | string | CalendarDate | NaiveDateTime | NoValue;

/** Cells aligned to a {@link ColumnMapping}'s destination order. */
export type CoercedRow = CellValue[];
