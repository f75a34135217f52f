import { describe, expect, it } from 'vitest';
import { dateParts, strftime } from '../time.js';

// Monday 2024-01-15 10:30:45.123 UTC
const date = new Date(Date.UTC(2024, 0, 15, 10, 30, 45, 123));

describe('strftime', () => {
	it('formats numeric date and time fields', () => {
		expect(strftime('%Y-%m-%d %H:%M:%S', date, true)).toBe('2024-01-15 10:30:45');
		expect(strftime('%y %j %w %f', date, true)).toBe('24 015 1 123000');
	});

	it('formats names and the 12-hour clock', () => {
		expect(strftime('%a %A %b %B', date, true)).toBe('Mon Monday Jan January');
		expect(strftime('%I %p', date, true)).toBe('10 AM');
		expect(strftime('%I %p', new Date(Date.UTC(2024, 0, 15, 0, 5)), true)).toBe('12 AM');
		expect(strftime('%I %p', new Date(Date.UTC(2024, 0, 15, 15, 5)), true)).toBe('03 PM');
	});

	it('renders a zero offset in UTC', () => {
		expect(strftime('%z', date, true)).toBe('+0000');
	});

	it('counts leap days in the day of year', () => {
		expect(strftime('%j', new Date(Date.UTC(2024, 11, 31)), true)).toBe('366');
	});

	it('handles literal percent signs and unknown directives', () => {
		expect(strftime('100%% %Q', date, true)).toBe('100% %Q');
	});
});

describe('dateParts', () => {
	it('uses Sunday as weekday 0', () => {
		expect(dateParts(new Date(Date.UTC(2024, 0, 14)), true).weekday).toBe(0);
		expect(dateParts(date, true)).toMatchObject({ year: 2024, month: 1, day: 15, hours: 10, weekday: 1 });
	});
});
