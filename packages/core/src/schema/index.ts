export type {
	CalendarDate,
	CellValue,
	CoercedRow,
	ColumnBinding,
	ColumnMapping,
	DestinationSchema,
	NaiveDateTime,
	NoValue,
	RawTable,
	SemanticType,
} from "./types";
export { NO_VALUE, SEMANTIC_TYPES } from "./types";
