import type { CalendarDate, NaiveDateTime } from "../schema";

/** Candidate layout tried by {@link parseTimestamp}. */
interface TimestampFormat {
	/** strftime-style label, used in diagnostics. */
	readonly label: string;
	readonly pattern: RegExp;
}

const YMD = "(?<year>\\d{4})-(?<month>\\d{1,2})-(?<day>\\d{1,2})";
const HMS = "(?<hour>\\d{1,2}):(?<minute>\\d{1,2}):(?<second>\\d{1,2})";
const FRACTION = "\\.(?<fraction>\\d{1,6})";

function format(label: string, source: string): TimestampFormat {
	return { label, pattern: new RegExp(`^${source}$`) };
}

/** Layouts accepted once a trailing `Z` has been stripped. */
const UTC_MARKER_FORMATS: readonly TimestampFormat[] = [
	format("%Y-%m-%dT%H:%M:%S", `${YMD}T${HMS}`),
	format("%Y-%m-%dT%H:%M:%S.%f", `${YMD}T${HMS}${FRACTION}`),
];

/**
 * General layouts in priority order. Day-first precedes month-first, so
 * `03/04/2024` reads as 3 April; there is no attempt to tell them apart.
 */
const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
	format("%Y-%m-%d %H:%M:%S", `${YMD} ${HMS}`),
	format("%Y-%m-%d %H:%M:%S.%f", `${YMD} ${HMS}${FRACTION}`),
	format("%Y-%m-%dT%H:%M:%S", `${YMD}T${HMS}`),
	format("%Y-%m-%dT%H:%M:%S.%f", `${YMD}T${HMS}${FRACTION}`),
	format("%Y-%m-%d", YMD),
	format("%d/%m/%Y %H:%M:%S", `(?<day>\\d{1,2})/(?<month>\\d{1,2})/(?<year>\\d{4}) ${HMS}`),
	format("%d/%m/%Y", "(?<day>\\d{1,2})/(?<month>\\d{1,2})/(?<year>\\d{4})"),
	format("%m/%d/%Y %H:%M:%S", `(?<month>\\d{1,2})/(?<day>\\d{1,2})/(?<year>\\d{4}) ${HMS}`),
	format("%m/%d/%Y", "(?<month>\\d{1,2})/(?<day>\\d{1,2})/(?<year>\\d{4})"),
];

/** strftime labels of every layout, in the order they are tried. */
export const TIMESTAMP_FORMAT_LABELS: readonly string[] = [
	...UTC_MARKER_FORMATS.map((f) => `${f.label}Z`),
	...TIMESTAMP_FORMATS.map((f) => f.label),
];

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

/** Number of days in a month (1-based). */
export function daysInMonth(year: number, month: number): number {
	if (month === 2) return isLeapYear(year) ? 29 : 28;
	return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function field(groups: Record<string, string | undefined>, name: string): number {
	const raw = groups[name];
	return raw === undefined ? 0 : Number.parseInt(raw, 10);
}

/** Build a validated timestamp from regex groups, or null when out of range. */
function fromGroups(groups: Record<string, string | undefined>): NaiveDateTime | null {
	const year = field(groups, "year");
	const month = field(groups, "month");
	const day = field(groups, "day");
	const hour = field(groups, "hour");
	const minute = field(groups, "minute");
	const second = field(groups, "second");
	const fraction = groups.fraction;

	if (year < 1 || month < 1 || month > 12) return null;
	if (day < 1 || day > daysInMonth(year, month)) return null;
	if (hour > 23 || minute > 59 || second > 59) return null;

	const microsecond = fraction === undefined ? 0 : Number.parseInt(fraction.padEnd(6, "0"), 10);

	return { kind: "datetime", year, month, day, hour, minute, second, microsecond };
}

function tryFormats(value: string, formats: readonly TimestampFormat[]): NaiveDateTime | null {
	for (const fmt of formats) {
		const match = fmt.pattern.exec(value);
		if (!match?.groups) continue;
		const parsed = fromGroups(match.groups);
		if (parsed) return parsed;
	}
	return null;
}

/**
 * Parse a timestamp using the first layout that matches.
 *
 * A trailing `Z` is stripped and the remainder read as naive wall-clock
 * time. Returns null when no layout matches.
 */
export function parseTimestamp(value: string): NaiveDateTime | null {
	if (value.length === 0) return null;

	if (value.endsWith("Z")) {
		const parsed = tryFormats(value.slice(0, -1), UTC_MARKER_FORMATS);
		if (parsed) return parsed;
	}

	return tryFormats(value, TIMESTAMP_FORMATS);
}

const DATE_TOKEN = format("%Y-%m-%d", YMD);

/** Parse a `YYYY-MM-DD` token, or null. */
export function parseDateToken(value: string): CalendarDate | null {
	const parsed = tryFormats(value, [DATE_TOKEN]);
	return parsed ? toCalendarDate(parsed) : null;
}

/** True when the value is a valid `YYYY-MM-DD` period. */
export function isValidPeriod(value: string): boolean {
	return parseDateToken(value) !== null;
}

/** Drop the time component. */
export function toCalendarDate(value: NaiveDateTime): CalendarDate {
	return { kind: "date", year: value.year, month: value.month, day: value.day };
}

/** Order two calendar dates; negative when `a` is earlier. */
export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
	return a.year - b.year || a.month - b.month || a.day - b.day;
}

function pad(n: number, width = 2): string {
	return String(n).padStart(width, "0");
}

/** `YYYY-MM-DD` */
export function formatCalendarDate(value: CalendarDate): string {
	return `${pad(value.year, 4)}-${pad(value.month)}-${pad(value.day)}`;
}

/** `YYYY-MM-DD HH:MM:SS`, with `.ffffff` appended when there is a fractional part. */
export function formatDateTime(value: NaiveDateTime): string {
	const base = `${pad(value.year, 4)}-${pad(value.month)}-${pad(value.day)} ${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`;
	return value.microsecond === 0 ? base : `${base}.${pad(value.microsecond, 6)}`;
}
