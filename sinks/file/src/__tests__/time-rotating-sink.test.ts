import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { RotationWhen } from '@tributary/sdk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { computeRollover } from '../rotation.js';
import { TimeRotatingFileSink } from '../time-rotating-sink.js';

// ─── computeRollover ──────────────────────────────────────────────────────────

describe('computeRollover', () => {
	// 2024-01-15 is a Monday
	const monday = new Date(Date.UTC(2024, 0, 15, 10, 0, 0));

	it('adds the interval for second/minute/hour/day units', () => {
		expect(computeRollover(monday, 'S', 30, true)).toBe(monday.getTime() + 30_000);
		expect(computeRollover(monday, 'M', 2, true)).toBe(monday.getTime() + 120_000);
		expect(computeRollover(monday, 'H', 1, true)).toBe(monday.getTime() + 3_600_000);
		expect(computeRollover(monday, 'D', 1, true)).toBe(monday.getTime() + 86_400_000);
	});

	it('rolls over at the next midnight', () => {
		expect(computeRollover(monday, 'midnight', 1, true)).toBe(Date.UTC(2024, 0, 16));
	});

	it('adds extra days for midnight intervals above one', () => {
		expect(computeRollover(monday, 'midnight', 3, true)).toBe(Date.UTC(2024, 0, 18));
	});

	const weekly: [RotationWhen, number][] = [
		['W0', Date.UTC(2024, 0, 16)],
		['W2', Date.UTC(2024, 0, 18)],
		['W6', Date.UTC(2024, 0, 22)],
	];

	for (const [when, expected] of weekly) {
		it(`${when} rolls over at the midnight ending that weekday`, () => {
			expect(computeRollover(monday, when, 1, true)).toBe(expected);
		});
	}
});

// ─── TimeRotatingFileSink ─────────────────────────────────────────────────────

describe('TimeRotatingFileSink', () => {
	let tempDir: string;
	let filename: string;
	let clock: Date;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'tributary-time-'));
		filename = join(tempDir, 'app.log');
		clock = new Date(Date.UTC(2024, 0, 15, 10, 30, 20));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	function makeSink(when: RotationWhen, backupCount: number): TimeRotatingFileSink {
		return new TimeRotatingFileSink(
			{ name: 'timed', filename, encoding: 'utf-8', when, interval: 1, backupCount, utc: true },
			{ now: () => clock },
		);
	}

	it('computes the first rollover from the clock for a new file', () => {
		const sink = makeSink('M', 3);
		expect(sink.nextRollover).toBe(Date.UTC(2024, 0, 15, 10, 31, 20));
		sink.close();
	});

	it('does not rotate before the rollover instant', async () => {
		const sink = makeSink('M', 3);
		sink.write('a', 'INFO');
		clock = new Date(Date.UTC(2024, 0, 15, 10, 31, 19));
		sink.write('b', 'INFO');
		sink.close();

		expect(await readdir(tempDir)).toEqual(['app.log']);
		expect(await readFile(filename, 'utf-8')).toBe('a\nb\n');
	});

	it('renames the active file with the closed period suffix', async () => {
		const sink = makeSink('M', 3);
		sink.write('a', 'INFO');
		clock = new Date(Date.UTC(2024, 0, 15, 10, 31, 25));
		sink.write('b', 'INFO');
		sink.close();

		expect(await readFile(`${filename}.2024-01-15_10-30`, 'utf-8')).toBe('a\n');
		expect(await readFile(filename, 'utf-8')).toBe('b\n');
		expect(sink.nextRollover).toBe(Date.UTC(2024, 0, 15, 10, 32, 25));
	});

	it('deletes backups beyond backupCount, oldest first', async () => {
		const sink = makeSink('M', 1);
		sink.write('a', 'INFO');
		clock = new Date(Date.UTC(2024, 0, 15, 10, 31, 25));
		sink.write('b', 'INFO');
		clock = new Date(Date.UTC(2024, 0, 15, 10, 32, 30));
		sink.write('c', 'INFO');
		sink.close();

		expect((await readdir(tempDir)).sort()).toEqual(['app.log', 'app.log.2024-01-15_10-31']);
		expect(await readFile(`${filename}.2024-01-15_10-31`, 'utf-8')).toBe('b\n');
		expect(await readFile(filename, 'utf-8')).toBe('c\n');
	});

	it('names midnight backups after the day that ended', async () => {
		clock = new Date(Date.UTC(2024, 0, 15, 23, 59, 0));
		const sink = makeSink('midnight', 7);
		sink.write('late', 'INFO');
		clock = new Date(Date.UTC(2024, 0, 16, 0, 0, 5));
		sink.write('early', 'INFO');
		sink.close();

		expect(await readFile(`${filename}.2024-01-15`, 'utf-8')).toBe('late\n');
		expect(await readFile(filename, 'utf-8')).toBe('early\n');
	});
});
