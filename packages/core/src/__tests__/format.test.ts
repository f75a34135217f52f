import { createTestRecord } from '@tributary/sdk';
import { describe, expect, it } from 'vitest';
import { FormatError, parseTemplate, RecordFormatter, templateFields } from '../format.js';

// 2024-01-15T10:30:45.123Z, channel "test", INFO, pid 4242
const record = createTestRecord();

function render(template: string, overrides?: Parameters<typeof createTestRecord>[0]): string {
	return new RecordFormatter(template, { utc: true }).format(createTestRecord(overrides));
}

describe('RecordFormatter', () => {
	it('uses the default template and date format', () => {
		const formatter = new RecordFormatter(undefined, { utc: true });
		expect(formatter.format(record)).toBe('2024-01-15 10:30:45 - test - INFO - test message');
	});

	it('renders asctime with a custom datefmt', () => {
		const formatter = new RecordFormatter('[%(asctime)s] %(message)s', { datefmt: '%H:%M', utc: true });
		expect(formatter.format(record)).toBe('[10:30] test message');
	});

	it('applies width, alignment and zero padding', () => {
		expect(render('%(levelname)-8s|%(levelno)5d|')).toBe('INFO    |   20|');
		expect(render('%(msecs)03d', { timestamp: Date.UTC(2024, 0, 15, 10, 30, 45, 7) })).toBe('007');
	});

	it('truncates strings to the precision', () => {
		expect(render('%(levelname).1s')).toBe('I');
	});

	it('renders created as seconds with a fractional part', () => {
		expect(render('%(created).3f')).toBe('1705314645.123');
	});

	it('renders source-location fields from metadata', () => {
		const metadata = { file: '/srv/app/jobs/worker.ts', line: 42, fn: 'runJob' };
		expect(render('%(filename)s:%(lineno)d %(funcName)s', { metadata })).toBe('worker.ts:42 runJob');
		expect(render('%(pathname)s', { metadata })).toBe('/srv/app/jobs/worker.ts');
	});

	it('falls back to placeholders without source location', () => {
		expect(render('%(filename)s:%(lineno)d %(funcName)s')).toBe('(unknown file):0 (unknown function)');
	});

	it('supports sign flags on numbers', () => {
		const metadata = { line: 42 };
		expect(render('%(lineno)+d', { metadata })).toBe('+42');
		expect(render('%(lineno)05d', { metadata })).toBe('00042');
	});

	it('renders the process id and literal percent signs', () => {
		expect(render('%(process)d 100%%')).toBe('4242 100%');
	});

	it('quotes strings for the r conversion', () => {
		expect(render('%(message)r')).toBe("'test message'");
	});

	it('looks up other fields in metadata.extra', () => {
		expect(render('%(requestId)s', { metadata: { extra: { requestId: 'r-1' } } })).toBe('r-1');
		expect(render('[%(requestId)s]')).toBe('[]');
	});

	it('ignores inherited properties of metadata.extra', () => {
		const metadata = { extra: { requestId: 'r-1' } };
		expect(render('[%(constructor)s|%(toString)s]', { metadata })).toBe('[|]');
	});
});

describe('parseTemplate', () => {
	it('splits literal text and directives', () => {
		expect(parseTemplate('%(name)s: %(message)s')).toEqual([
			{ field: 'name', flags: '', width: undefined, precision: undefined, conversion: 's' },
			': ',
			{ field: 'message', flags: '', width: undefined, precision: undefined, conversion: 's' },
		]);
	});

	it('rejects a stray percent sign', () => {
		expect(() => parseTemplate('100% done')).toThrow(FormatError);
	});

	it('rejects an unsupported conversion', () => {
		expect(() => parseTemplate('%(name)q')).toThrow(FormatError);
	});
});

describe('templateFields', () => {
	it('lists referenced fields in order', () => {
		expect(templateFields('%(asctime)s %(name)s %%')).toEqual(['asctime', 'name']);
	});
});
