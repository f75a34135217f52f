/**
 * Size-rotating file sink.
 *
 * Before a write that would take a non-empty file past `maxBytes`, the
 * backups shift up one slot (`app.log.1` → `app.log.2`, the oldest beyond
 * `backupCount` discarded), the active file becomes `app.log.1`, and the
 * line goes to a fresh file. Every line lands in exactly one file.
 */

import { existsSync, renameSync, unlinkSync } from 'node:fs';
import type { SizeRotatingSinkConfig } from '@tributary/sdk';
import { FileSink } from './file-sink.js';

export class SizeRotatingFileSink extends FileSink {
	private readonly maxBytes: number;
	private readonly backupCount: number;

	constructor(config: Omit<SizeRotatingSinkConfig, 'kind' | 'level' | 'format' | 'datefmt'>) {
		super({ name: config.name, filename: config.filename, encoding: config.encoding }, 'rotating-by-size');
		this.maxBytes = config.maxBytes;
		this.backupCount = config.backupCount;
	}

	/** Path of backup slot `n` (1 is the newest) */
	backupPath(n: number): string {
		return `${this.filename}.${n}`;
	}

	protected beforeWrite(bytes: number): void {
		if (this.maxBytes <= 0 || this.size === 0) return;
		if (this.size + bytes > this.maxBytes) {
			this.rotate();
		}
	}

	private rotate(): void {
		this.close();

		if (this.backupCount <= 0) {
			this.open('w');
			return;
		}

		for (let i = this.backupCount - 1; i >= 1; i--) {
			const src = this.backupPath(i);
			if (existsSync(src)) {
				moveReplacing(src, this.backupPath(i + 1));
			}
		}
		if (existsSync(this.filename)) {
			moveReplacing(this.filename, this.backupPath(1));
		}

		this.open('a');
	}
}

function moveReplacing(src: string, dest: string): void {
	if (existsSync(dest)) unlinkSync(dest);
	renameSync(src, dest);
}
