/**
 * Time-rotating file sink.
 *
 * Once the clock passes the rollover instant, the active file is renamed to
 * `<file>.<suffix>` for the period that just closed, backups beyond
 * `backupCount` are deleted oldest-first, and a fresh file is opened.
 */

import { existsSync, readdirSync, renameSync, unlinkSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { RotationWhen, SinkBuildOptions, TimeRotatingSinkConfig } from '@tributary/sdk';
import { strftime } from '@tributary/sdk';
import { FileSink } from './file-sink.js';
import {
	backupSuffixPattern,
	backupSuffixRegex,
	computeRollover,
	rotationIntervalMs,
} from './rotation.js';

export class TimeRotatingFileSink extends FileSink {
	private readonly when: RotationWhen;
	private readonly interval: number;
	private readonly intervalMs: number;
	private readonly backupCount: number;
	private readonly utc: boolean;
	private readonly now: () => Date;
	private rolloverAt: number;

	constructor(
		config: Omit<TimeRotatingSinkConfig, 'kind' | 'level' | 'format' | 'datefmt'>,
		options: SinkBuildOptions = {},
	) {
		super({ name: config.name, filename: config.filename, encoding: config.encoding }, 'rotating-by-time');
		this.when = config.when;
		this.interval = config.interval;
		this.intervalMs = rotationIntervalMs(config.when, config.interval);
		this.backupCount = config.backupCount;
		this.utc = config.utc;
		this.now = options.now ?? (() => new Date());
		this.rolloverAt = computeRollover(
			this.initialMtime ?? this.now(),
			this.when,
			this.interval,
			this.utc,
		);
	}

	/** Next rollover instant, epoch ms */
	get nextRollover(): number {
		return this.rolloverAt;
	}

	protected beforeWrite(_bytes: number): void {
		const now = this.now();
		if (now.getTime() >= this.rolloverAt) {
			this.rotate(now);
		}
	}

	private rotate(now: Date): void {
		this.close();

		const periodStart = new Date(this.rolloverAt - this.intervalMs);
		const target = `${this.filename}.${strftime(backupSuffixPattern(this.when), periodStart, this.utc)}`;
		if (existsSync(target)) unlinkSync(target);
		if (existsSync(this.filename)) renameSync(this.filename, target);

		if (this.backupCount > 0) {
			for (const stale of this.backupsToDelete()) {
				unlinkSync(stale);
			}
		}

		this.open('a');

		let next = computeRollover(now, this.when, this.interval, this.utc);
		while (next <= now.getTime()) {
			next += this.intervalMs;
		}
		this.rolloverAt = next;
	}

	/** Existing backups, oldest first */
	backups(): string[] {
		const dir = dirname(this.filename);
		const prefix = `${basename(this.filename)}.`;
		const pattern = backupSuffixRegex(this.when);
		return readdirSync(dir)
			.filter((name) => name.startsWith(prefix) && pattern.test(name.slice(prefix.length)))
			.sort()
			.map((name) => join(dir, name));
	}

	private backupsToDelete(): string[] {
		const all = this.backups();
		return all.length > this.backupCount ? all.slice(0, all.length - this.backupCount) : [];
	}
}
