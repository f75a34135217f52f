/**
 * Plain file sink.
 *
 * The descriptor is opened at construction and held until close(), so the
 * sink's lifetime is the file handle's lifetime. Writes are synchronous:
 * the owning dispatcher is the only writer and needs each line on disk
 * before the next one is formatted.
 */

import { closeSync, existsSync, fstatSync, openSync, statSync, writeSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import {
	type FileSinkConfig,
	type Severity,
	type Sink,
	SinkConstructionError,
	type SinkKind,
	describeError,
} from '@tributary/sdk';

/** Settings a file-backed sink needs to open its target */
export type FileTargetConfig = Pick<FileSinkConfig, 'name' | 'filename' | 'encoding'> & {
	mode?: FileSinkConfig['mode'];
};

/**
 * Check that the target's directory exists.
 * Directories are never created here; that is the caller's job.
 */
export function assertTargetDirectory(sinkName: string, filename: string): void {
	const dir = dirname(resolve(filename));
	let isDirectory = false;
	try {
		isDirectory = statSync(dir).isDirectory();
	} catch (err) {
		throw new SinkConstructionError(sinkName, filename, `directory does not exist: ${dir}`, {
			cause: err,
		});
	}
	if (!isDirectory) {
		throw new SinkConstructionError(sinkName, filename, `not a directory: ${dir}`);
	}
}

export class FileSink implements Sink {
	readonly kind: SinkKind;
	readonly filename: string;
	protected readonly sinkName: string;
	protected readonly encoding: BufferEncoding;
	/** mtime of the target before this sink opened it, null if it did not exist */
	protected readonly initialMtime: Date | null;
	/** Bytes currently in the active file */
	protected size = 0;
	private fd: number | null = null;

	constructor(config: FileTargetConfig, kind: SinkKind = 'file') {
		this.kind = kind;
		this.sinkName = config.name;
		this.filename = config.filename;
		this.encoding = config.encoding;

		assertTargetDirectory(config.name, config.filename);
		this.initialMtime = existsSync(config.filename) ? statSync(config.filename).mtime : null;
		this.open(config.mode ?? 'a');
	}

	write(line: string, _severity: Severity): void {
		const data = Buffer.from(`${line}\n`, this.encoding);
		this.beforeWrite(data.length);

		const fd = this.descriptor();
		let offset = 0;
		while (offset < data.length) {
			offset += writeSync(fd, data, offset, data.length - offset);
		}
		this.size += data.length;
	}

	close(): void {
		if (this.fd === null) return;
		const fd = this.fd;
		this.fd = null;
		closeSync(fd);
	}

	get isOpen(): boolean {
		return this.fd !== null;
	}

	/** Hook for rotating subclasses; runs before each write */
	protected beforeWrite(_bytes: number): void {}

	/** Open (or re-open) the target with the given flag */
	protected open(flag: 'a' | 'w'): void {
		try {
			this.fd = openSync(this.filename, flag);
		} catch (err) {
			throw new SinkConstructionError(
				this.sinkName,
				this.filename,
				`cannot open file: ${describeError(err)}`,
				{ cause: err },
			);
		}
		this.size = fstatSync(this.fd).size;
	}

	private descriptor(): number {
		if (this.fd === null) {
			throw new Error(`File sink "${this.sinkName}" is closed`);
		}
		return this.fd;
	}
}
