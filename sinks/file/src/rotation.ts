/**
 * Rollover arithmetic for time-based rotation.
 */

import type { RotationWhen } from '@tributary/sdk';
import { dateParts } from '@tributary/sdk';

const SECOND = 1000;
const MINUTE = 60 * SECOND;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;
const WEEK = 7 * DAY;

/** Rotation period in milliseconds */
export function rotationIntervalMs(when: RotationWhen, interval: number): number {
	switch (when) {
		case 'S':
			return interval * SECOND;
		case 'M':
			return interval * MINUTE;
		case 'H':
			return interval * HOUR;
		case 'D':
		case 'midnight':
			return interval * DAY;
		default:
			return interval * WEEK;
	}
}

/** strftime pattern used to name backups for each unit */
export function backupSuffixPattern(when: RotationWhen): string {
	switch (when) {
		case 'S':
			return '%Y-%m-%d_%H-%M-%S';
		case 'M':
			return '%Y-%m-%d_%H-%M';
		case 'H':
			return '%Y-%m-%d_%H';
		default:
			return '%Y-%m-%d';
	}
}

/** Matches backup suffixes produced by `backupSuffixPattern(when)` */
export function backupSuffixRegex(when: RotationWhen): RegExp {
	switch (when) {
		case 'S':
			return /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}$/;
		case 'M':
			return /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}$/;
		case 'H':
			return /^\d{4}-\d{2}-\d{2}_\d{2}$/;
		default:
			return /^\d{4}-\d{2}-\d{2}$/;
	}
}

function nextMidnight(from: Date, utc: boolean): number {
	const p = dateParts(from, utc);
	return utc
		? Date.UTC(p.year, p.month - 1, p.day + 1)
		: new Date(p.year, p.month - 1, p.day + 1).getTime();
}

/**
 * Compute the first rollover instant after `from`.
 *
 * - `S`/`M`/`H`/`D`: `from` plus the interval
 * - `midnight`: the next midnight, plus `interval - 1` further days
 * - `W0`–`W6`: the midnight that ends the given weekday (Monday = 0)
 */
export function computeRollover(
	from: Date,
	when: RotationWhen,
	interval: number,
	utc: boolean,
): number {
	if (when === 'midnight') {
		return nextMidnight(from, utc) + (interval - 1) * DAY;
	}
	if (when.startsWith('W')) {
		const target = Number(when.slice(1));
		// JS weeks start on Sunday; rotation weekdays start on Monday
		const today = (dateParts(from, utc).weekday + 6) % 7;
		let daysToWait = 0;
		if (today !== target) {
			daysToWait = today < target ? target - today : 6 - today + target + 1;
		}
		return nextMidnight(from, utc) + daysToWait * DAY;
	}
	return from.getTime() + rotationIntervalMs(when, interval);
}
