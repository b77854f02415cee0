const MONTHS = ["jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec"];
const MONTH_NAMES = [
	"january",
	"february",
	"march",
	"april",
	"may",
	"june",
	"july",
	"august",
	"september",
	"october",
	"november",
	"december",
];

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?: (\d{2}):(\d{2}):(\d{2}))?$/;
const SLASH_YMD = /^(\d{4})\/(\d{2})\/(\d{2})$/;
const SLASH_MDY = /^(\d{2})\/(\d{2})\/(\d{4})(?: (\d{2}):(\d{2}):(\d{2}))?$/;
const NAMED_MONTH = /^([A-Za-z]+) (\d{1,2}), (\d{4})$/;
const DAY_MONTH_YEAR = /^(\d{2})-([A-Za-z]{3})-(\d{4})$/;

/**
 * Build a UTC date, returning null when any component is out of range
 * (e.g. February 30th or hour 25).
 */
function utcDate(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): Date | null {
	if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
		return null;
	}
	// Date.UTC maps years 0-99 to 19xx
	const d = new Date(Date.UTC(2000, 0, 1, hour, minute, second));
	d.setUTCFullYear(year, month - 1, day);
	if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
		return null;
	}
	return d;
}

function num(s: string | undefined): number {
	return s === undefined ? 0 : parseInt(s, 10);
}

function monthFromName(name: string): number {
	const lower = name.toLowerCase();
	const full = MONTH_NAMES.indexOf(lower);
	if (full !== -1) {
		return full + 1;
	}
	return MONTHS.indexOf(lower) + 1;
}

/**
 * Parse text that looks like a date into a UTC Date.
 *
 * Recognized shapes:
 * - `2006-01-02`, `2006-01-02 15:04:05`
 * - `2006/01/02`
 * - `01/02/2006`, `01/02/2006 15:04:05` (month first; day first when the month would exceed 12)
 * - `Jan 2, 2006`, `January 2, 2006`
 * - `02-Jan-2006`
 *
 * @returns The parsed date, or null when the text is not a recognized date
 */
export function parseDateText(text: string): Date | null {
	let m = ISO_DATE.exec(text);
	if (m) {
		return utcDate(num(m[1]), num(m[2]), num(m[3]), num(m[4]), num(m[5]), num(m[6]));
	}
	m = SLASH_YMD.exec(text);
	if (m) {
		return utcDate(num(m[1]), num(m[2]), num(m[3]));
	}
	m = SLASH_MDY.exec(text);
	if (m) {
		const first = num(m[1]);
		const second = num(m[2]);
		const year = num(m[3]);
		return (
			utcDate(year, first, second, num(m[4]), num(m[5]), num(m[6])) ??
			utcDate(year, second, first, num(m[4]), num(m[5]), num(m[6]))
		);
	}
	m = NAMED_MONTH.exec(text);
	if (m) {
		const month = monthFromName(m[1] ?? "");
		return month === 0 ? null : utcDate(num(m[3]), month, num(m[2]));
	}
	m = DAY_MONTH_YEAR.exec(text);
	if (m) {
		const month = monthFromName(m[2] ?? "");
		return month === 0 ? null : utcDate(num(m[3]), month, num(m[1]));
	}
	return null;
}

/** False for a Date built from unparsable input */
export function isValidDate(d: Date): boolean {
	return !Number.isNaN(d.getTime());
}

/**
 * Render a date as display text: `YYYY-MM-DD` at UTC midnight,
 * otherwise `YYYY-MM-DD HH:MM:SS` (UTC). Invalid dates render as "".
 */
export function formatDateText(d: Date): string {
	if (!isValidDate(d)) {
		return "";
	}
	const iso = d.toISOString();
	const day = iso.slice(0, 10);
	const time = iso.slice(11, 19);
	return time === "00:00:00" ? day : day + " " + time;
}
