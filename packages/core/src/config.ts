/**
 * Configuration loading — YAML or JSON into a validated TributaryConfig.
 *
 * File shape:
 *
 *   root:
 *     level: INFO
 *     propagate: true
 *     handlers: [console, file]     # default: every handler
 *   handlers:
 *     console:
 *       type: stream
 *       level: DEBUG
 *       formatter:
 *         format: '%(asctime)s - %(name)s - %(levelname)s - %(message)s'
 *         datefmt: '%Y-%m-%d %H:%M:%S'
 *     file:
 *       type: rotating_file
 *       filename: logs/app.log
 *       max_bytes: 10485760
 *       backup_count: 5
 *   channels:
 *     app.db:
 *       level: WARNING
 *
 * `root.propagate` defaults to true, unlike loggers that default to not
 * propagating. Handlers attach to root unless a channel names its own, so a
 * channel only reaches them by propagating. It also sets the default for
 * every channel that does not set `propagate`.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import {
	type ChannelConfig,
	ConfigParseError,
	type RootConfig,
	type RotationWhen,
	type Severity,
	type SinkConfig,
	type SinkConfigBase,
	type TributaryConfig,
	describeError,
	isPlainObject,
	parseSeverity,
} from '@tributary/sdk';
import yaml from 'js-yaml';
import { DEFAULT_DATEFMT, DEFAULT_FORMAT, FormatError, parseTemplate } from './format.js';

/** Handler `type` values and the sink kind each builds */
export const HANDLER_TYPES = {
	stream: 'console',
	file: 'file',
	rotating_file: 'rotating-by-size',
	timed_rotating_file: 'rotating-by-time',
} as const;

type HandlerType = keyof typeof HANDLER_TYPES;

const DEFAULT_FILENAME = 'app.log';
const DEFAULT_ENCODING: BufferEncoding = 'utf-8';
const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;
const DEFAULT_SIZE_BACKUPS = 5;
const DEFAULT_TIME_BACKUPS = 7;

const ROTATION_UNITS: readonly RotationWhen[] = ['S', 'M', 'H', 'D', 'midnight', 'W0', 'W1', 'W2', 'W3', 'W4', 'W5', 'W6'];

// ─── Loading ──────────────────────────────────────────────────────────────────

/**
 * Read and validate a configuration file.
 * `.yaml` and `.yml` are parsed as YAML, `.json` as JSON.
 */
export async function loadConfig(path: string): Promise<TributaryConfig> {
	const ext = extname(path).toLowerCase();
	if (ext !== '.yaml' && ext !== '.yml' && ext !== '.json') {
		throw new ConfigParseError(path, `unsupported file extension "${ext || '(none)'}"`);
	}

	let text: string;
	try {
		text = await readFile(path, 'utf-8');
	} catch (err) {
		const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
		throw new ConfigParseError(path, missing ? 'file not found' : `cannot read file: ${describeError(err)}`, {
			cause: err,
		});
	}

	let raw: unknown;
	try {
		raw = ext === '.json' ? JSON.parse(text) : yaml.load(text);
	} catch (err) {
		throw new ConfigParseError(path, `malformed ${ext === '.json' ? 'JSON' : 'YAML'}: ${describeError(err)}`, {
			cause: err,
		});
	}

	return parseConfig(raw, path);
}

// ─── Validation ───────────────────────────────────────────────────────────────

/**
 * Validate parsed configuration data.
 * `source` names the origin in error messages.
 */
export function parseConfig(raw: unknown, source = '<inline>'): TributaryConfig {
	const fail = (key: string, message: string): never => {
		throw new ConfigParseError(source, `${key}: ${message}`);
	};

	if (!isPlainObject(raw)) fail('(document)', 'must be a mapping');
	const doc = isPlainObject(raw) ? raw : {};

	const handlers: Record<string, SinkConfig> = {};
	for (const [name, value] of Object.entries(section(doc.handlers, 'handlers', fail))) {
		handlers[name] = parseHandler(name, value, fail);
	}
	const handlerNames = Object.keys(handlers);

	const rootRaw = section(doc.root, 'root', fail);
	const root: RootConfig = {
		level: severityField(rootRaw.level, 'root.level', fail) ?? 'INFO',
		propagate: booleanField(rootRaw.propagate, 'root.propagate', fail) ?? true,
		handlers: handlerList(rootRaw.handlers, 'root.handlers', handlerNames, fail) ?? handlerNames,
	};

	const channels: Record<string, ChannelConfig> = {};
	for (const [name, value] of Object.entries(section(doc.channels, 'channels', fail))) {
		const key = `channels.${name}`;
		if (name === 'root' || !/^[^.]+(\.[^.]+)*$/.test(name)) fail(key, 'invalid channel name');
		const entry = section(value, key, fail);
		const channel: ChannelConfig = {};
		const level = severityField(entry.level, `${key}.level`, fail);
		const propagate = booleanField(entry.propagate, `${key}.propagate`, fail);
		const attached = handlerList(entry.handlers, `${key}.handlers`, handlerNames, fail);
		if (level !== undefined) channel.level = level;
		if (propagate !== undefined) channel.propagate = propagate;
		if (attached !== undefined) channel.handlers = attached;
		channels[name] = channel;
	}

	return deepFreeze({ root, handlers, channels, source });
}

type Fail = (key: string, message: string) => never;

/** A mapping-valued section; absent or null means empty */
function section(value: unknown, key: string, fail: Fail): Record<string, unknown> {
	if (value === undefined || value === null) return {};
	if (!isPlainObject(value)) return fail(key, 'must be a mapping');
	return value;
}

function parseHandler(name: string, value: unknown, fail: Fail): SinkConfig {
	const key = `handlers.${name}`;
	const raw = section(value, key, fail);

	const type = raw.type ?? 'stream';
	if (typeof type !== 'string' || !isHandlerType(type)) {
		return fail(`${key}.type`, `must be one of ${Object.keys(HANDLER_TYPES).join(', ')}`);
	}

	const formatter = section(raw.formatter, `${key}.formatter`, fail);
	const format = stringField(formatter.format, `${key}.formatter.format`, fail) ?? DEFAULT_FORMAT;
	try {
		parseTemplate(format);
	} catch (err) {
		if (err instanceof FormatError) fail(`${key}.formatter.format`, err.message);
		throw err;
	}

	const base: SinkConfigBase = {
		name,
		level: severityField(raw.level, `${key}.level`, fail) ?? 'INFO',
		format,
		datefmt: stringField(formatter.datefmt, `${key}.formatter.datefmt`, fail) ?? DEFAULT_DATEFMT,
	};

	switch (HANDLER_TYPES[type]) {
		case 'console': {
			const stream = raw.stream ?? 'stderr';
			if (stream !== 'stderr' && stream !== 'stdout') return fail(`${key}.stream`, 'must be stderr or stdout');
			return {
				...base,
				kind: 'console',
				stream,
				color: booleanField(raw.color, `${key}.color`, fail) ?? false,
			};
		}
		case 'file': {
			const mode = raw.mode ?? 'a';
			if (mode !== 'a' && mode !== 'w') return fail(`${key}.mode`, 'must be a or w');
			return {
				...base,
				kind: 'file',
				filename: stringField(raw.filename, `${key}.filename`, fail) ?? DEFAULT_FILENAME,
				mode,
				encoding: encodingField(raw.encoding, `${key}.encoding`, fail),
			};
		}
		case 'rotating-by-size':
			return {
				...base,
				kind: 'rotating-by-size',
				filename: stringField(raw.filename, `${key}.filename`, fail) ?? DEFAULT_FILENAME,
				encoding: encodingField(raw.encoding, `${key}.encoding`, fail),
				maxBytes: integerField(raw.max_bytes, `${key}.max_bytes`, 0, fail) ?? DEFAULT_MAX_BYTES,
				backupCount: integerField(raw.backup_count, `${key}.backup_count`, 0, fail) ?? DEFAULT_SIZE_BACKUPS,
			};
		case 'rotating-by-time':
			return {
				...base,
				kind: 'rotating-by-time',
				filename: stringField(raw.filename, `${key}.filename`, fail) ?? DEFAULT_FILENAME,
				encoding: encodingField(raw.encoding, `${key}.encoding`, fail),
				when: rotationField(raw.when, `${key}.when`, fail),
				interval: integerField(raw.interval, `${key}.interval`, 1, fail) ?? 1,
				backupCount: integerField(raw.backup_count, `${key}.backup_count`, 0, fail) ?? DEFAULT_TIME_BACKUPS,
				utc: booleanField(raw.utc, `${key}.utc`, fail) ?? false,
			};
	}
}

function isHandlerType(value: string): value is HandlerType {
	return Object.hasOwn(HANDLER_TYPES, value);
}

// ─── Field validators ─────────────────────────────────────────────────────────

function severityField(value: unknown, key: string, fail: Fail): Severity | undefined {
	if (value === undefined || value === null) return undefined;
	return parseSeverity(value) ?? fail(key, `unknown severity "${String(value)}"`);
}

function booleanField(value: unknown, key: string, fail: Fail): boolean | undefined {
	if (value === undefined || value === null) return undefined;
	if (typeof value !== 'boolean') return fail(key, 'must be true or false');
	return value;
}

function stringField(value: unknown, key: string, fail: Fail): string | undefined {
	if (value === undefined || value === null) return undefined;
	if (typeof value !== 'string' || value.length === 0) return fail(key, 'must be a non-empty string');
	return value;
}

function integerField(value: unknown, key: string, min: number, fail: Fail): number | undefined {
	if (value === undefined || value === null) return undefined;
	if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
		return fail(key, `must be an integer >= ${min}`);
	}
	return value;
}

function encodingField(value: unknown, key: string, fail: Fail): BufferEncoding {
	if (value === undefined || value === null) return DEFAULT_ENCODING;
	if (typeof value !== 'string' || !Buffer.isEncoding(value)) {
		return fail(key, `unknown encoding "${String(value)}"`);
	}
	return value;
}

function rotationField(value: unknown, key: string, fail: Fail): RotationWhen {
	if (value === undefined || value === null) return 'midnight';
	if (typeof value === 'string') {
		const normalized = value.toLowerCase() === 'midnight' ? 'midnight' : value.toUpperCase();
		const unit = ROTATION_UNITS.find((u) => u === normalized);
		if (unit) return unit;
	}
	return fail(key, `must be one of ${ROTATION_UNITS.join(', ')}`);
}

function handlerList(value: unknown, key: string, known: string[], fail: Fail): string[] | undefined {
	if (value === undefined || value === null) return undefined;
	if (!Array.isArray(value)) return fail(key, 'must be a list of handler names');
	const names: string[] = [];
	for (const entry of value) {
		if (typeof entry !== 'string') return fail(key, 'must be a list of handler names');
		if (!known.includes(entry)) return fail(key, `unknown handler "${entry}"`);
		if (!names.includes(entry)) names.push(entry);
	}
	return names;
}

function deepFreeze<T>(value: T): T {
	if (typeof value === 'object' && value !== null) {
		for (const child of Object.values(value)) deepFreeze(child);
		Object.freeze(value);
	}
	return value;
}
