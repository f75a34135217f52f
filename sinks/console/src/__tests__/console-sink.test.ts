/**
 * Tests for ConsoleSink — stream selection, colouring, close.
 */

import chalk from 'chalk';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConsoleSink } from '../console-sink.js';

describe('ConsoleSink', () => {
	const originalLevel = chalk.level;

	beforeEach(() => {
		chalk.level = 0;
	});

	afterEach(() => {
		chalk.level = originalLevel;
		vi.restoreAllMocks();
	});

	it('writes to stderr by default configuration', () => {
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		const sink = new ConsoleSink({ stream: 'stderr', color: false });

		sink.write('hello', 'INFO');

		expect(stderr).toHaveBeenCalledWith('hello\n');
	});

	it('writes to stdout when configured', () => {
		const stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		const sink = new ConsoleSink({ stream: 'stdout', color: false });

		sink.write('to stdout', 'WARNING');

		expect(stdout).toHaveBeenCalledWith('to stdout\n');
		expect(stderr).not.toHaveBeenCalled();
	});

	it('colours errors red when color=true', () => {
		chalk.level = 1;
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		const sink = new ConsoleSink({ stream: 'stderr', color: true });

		sink.write('boom', 'ERROR');

		expect(stderr).toHaveBeenCalledWith('\x1b[31mboom\x1b[39m\n');
	});

	it('leaves INFO lines unstyled when color=true', () => {
		chalk.level = 1;
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		const sink = new ConsoleSink({ stream: 'stderr', color: true });

		sink.write('plain', 'INFO');

		expect(stderr).toHaveBeenCalledWith('plain\n');
	});

	it('close is a no-op and the sink keeps working', () => {
		const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
		const sink = new ConsoleSink({ stream: 'stderr', color: false });

		sink.close();
		sink.write('after close', 'INFO');

		expect(stderr).toHaveBeenCalledWith('after close\n');
	});
});
