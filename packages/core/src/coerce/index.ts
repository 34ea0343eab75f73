export { coerce, coerceRow } from "./coerce";
export {
	compareCalendarDates,
	daysInMonth,
	formatCalendarDate,
	formatDateTime,
	isValidPeriod,
	parseDateToken,
	parseTimestamp,
	TIMESTAMP_FORMAT_LABELS,
	toCalendarDate,
} from "./datetime";
