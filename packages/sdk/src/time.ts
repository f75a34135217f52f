/**
 * strftime-style date formatting, used for `%(asctime)s` and for the
 * suffixes of time-rotated backups.
 */

const MONTHS = [
	'January',
	'February',
	'March',
	'April',
	'May',
	'June',
	'July',
	'August',
	'September',
	'October',
	'November',
	'December',
];

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

/** Calendar fields of an instant, in local time or UTC */
export interface DateParts {
	year: number;
	/** 1-12 */
	month: number;
	day: number;
	hours: number;
	minutes: number;
	seconds: number;
	milliseconds: number;
	/** 0 = Sunday */
	weekday: number;
	/** Minutes east of UTC */
	offsetMinutes: number;
}

export function dateParts(date: Date, utc: boolean): DateParts {
	if (utc) {
		return {
			year: date.getUTCFullYear(),
			month: date.getUTCMonth() + 1,
			day: date.getUTCDate(),
			hours: date.getUTCHours(),
			minutes: date.getUTCMinutes(),
			seconds: date.getUTCSeconds(),
			milliseconds: date.getUTCMilliseconds(),
			weekday: date.getUTCDay(),
			offsetMinutes: 0,
		};
	}
	return {
		year: date.getFullYear(),
		month: date.getMonth() + 1,
		day: date.getDate(),
		hours: date.getHours(),
		minutes: date.getMinutes(),
		seconds: date.getSeconds(),
		milliseconds: date.getMilliseconds(),
		weekday: date.getDay(),
		offsetMinutes: -date.getTimezoneOffset(),
	};
}

function pad(value: number, width = 2): string {
	return String(value).padStart(width, '0');
}

function dayOfYear(parts: DateParts): number {
	const start = Date.UTC(parts.year, 0, 1);
	const current = Date.UTC(parts.year, parts.month - 1, parts.day);
	return Math.round((current - start) / 86_400_000) + 1;
}

function formatOffset(offsetMinutes: number): string {
	const sign = offsetMinutes < 0 ? '-' : '+';
	const abs = Math.abs(offsetMinutes);
	return `${sign}${pad(Math.floor(abs / 60))}${pad(abs % 60)}`;
}

function directive(code: string, p: DateParts): string | null {
	switch (code) {
		case 'Y':
			return String(p.year);
		case 'y':
			return pad(p.year % 100);
		case 'm':
			return pad(p.month);
		case 'd':
			return pad(p.day);
		case 'H':
			return pad(p.hours);
		case 'I':
			return pad(p.hours % 12 === 0 ? 12 : p.hours % 12);
		case 'M':
			return pad(p.minutes);
		case 'S':
			return pad(p.seconds);
		case 'f':
			return pad(p.milliseconds * 1000, 6);
		case 'p':
			return p.hours < 12 ? 'AM' : 'PM';
		case 'b':
			return MONTHS[p.month - 1].slice(0, 3);
		case 'B':
			return MONTHS[p.month - 1];
		case 'a':
			return WEEKDAYS[p.weekday].slice(0, 3);
		case 'A':
			return WEEKDAYS[p.weekday];
		case 'w':
			return String(p.weekday);
		case 'j':
			return pad(dayOfYear(p), 3);
		case 'z':
			return formatOffset(p.offsetMinutes);
		case '%':
			return '%';
		default:
			return null;
	}
}

/**
 * Format a date with a strftime pattern.
 *
 * Supports `%Y %y %m %d %H %I %M %S %f %p %b %B %a %A %w %j %z %%`.
 * Unknown directives are copied through unchanged.
 *
 * @example
 * ```ts
 * strftime('%Y-%m-%d %H:%M:%S', new Date(0), true); // '1970-01-01 00:00:00'
 * ```
 */
export function strftime(pattern: string, date: Date, utc = false): string {
	const parts = dateParts(date, utc);
	return pattern.replace(/%(.)/g, (match, code: string) => directive(code, parts) ?? match);
}
