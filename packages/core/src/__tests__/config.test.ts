import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigParseError } from '@tributary/sdk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, parseConfig } from '../config.js';

const YAML_CONFIG = `
root:
  level: debug
  handlers: [console]
handlers:
  console:
    type: stream
    level: warn
    stream: stdout
    formatter:
      format: '%(levelname)s %(message)s'
  archive:
    type: timed_rotating_file
    filename: logs/app.log
    when: w0
    backup_count: 3
    utc: true
channels:
  app.db:
    level: ERROR
    propagate: false
    handlers: [archive]
`;

// ─── loadConfig ───────────────────────────────────────────────────────────────

describe('loadConfig', () => {
	let tempDir: string;

	beforeEach(async () => {
		tempDir = await mkdtemp(join(tmpdir(), 'tributary-config-'));
	});

	afterEach(async () => {
		await rm(tempDir, { recursive: true, force: true });
	});

	async function loadError(path: string): Promise<unknown> {
		try {
			await loadConfig(path);
		} catch (err) {
			return err;
		}
		return undefined;
	}

	it('loads and validates YAML', async () => {
		const path = join(tempDir, 'logging.yaml');
		await writeFile(path, YAML_CONFIG);

		const config = await loadConfig(path);

		expect(config.source).toBe(path);
		expect(config.root).toEqual({ level: 'DEBUG', propagate: true, handlers: ['console'] });
		expect(config.handlers.console).toEqual({
			name: 'console',
			kind: 'console',
			level: 'WARNING',
			format: '%(levelname)s %(message)s',
			datefmt: '%Y-%m-%d %H:%M:%S',
			stream: 'stdout',
			color: false,
		});
		expect(config.handlers.archive).toEqual({
			name: 'archive',
			kind: 'rotating-by-time',
			level: 'INFO',
			format: '%(asctime)s - %(name)s - %(levelname)s - %(message)s',
			datefmt: '%Y-%m-%d %H:%M:%S',
			filename: 'logs/app.log',
			encoding: 'utf-8',
			when: 'W0',
			interval: 1,
			backupCount: 3,
			utc: true,
		});
		expect(config.channels).toEqual({
			'app.db': { level: 'ERROR', propagate: false, handlers: ['archive'] },
		});
	});

	it('loads JSON', async () => {
		const path = join(tempDir, 'logging.json');
		await writeFile(path, JSON.stringify({ handlers: { file: { type: 'file', filename: 'out.log', mode: 'w' } } }));

		const config = await loadConfig(path);

		expect(config.handlers.file).toMatchObject({ kind: 'file', filename: 'out.log', mode: 'w' });
		expect(config.root.handlers).toEqual(['file']);
	});

	it('accepts the .yml extension in any case', async () => {
		const path = join(tempDir, 'logging.YML');
		await writeFile(path, 'root:\n  level: ERROR\n');
		expect((await loadConfig(path)).root.level).toBe('ERROR');
	});

	it('rejects unsupported extensions', async () => {
		const path = join(tempDir, 'logging.toml');
		await writeFile(path, '[root]');

		const err = await loadError(path);
		expect(err).toBeInstanceOf(ConfigParseError);
		expect(err).toMatchObject({ message: `${path}: unsupported file extension ".toml"`, path });
	});

	it('reports a missing file', async () => {
		const path = join(tempDir, 'absent.yaml');
		expect(await loadError(path)).toMatchObject({ message: `${path}: file not found` });
	});

	it('reports malformed YAML', async () => {
		const path = join(tempDir, 'broken.yaml');
		await writeFile(path, 'root: [unclosed\n');

		const err = await loadError(path);
		expect(err).toBeInstanceOf(ConfigParseError);
		expect(err instanceof Error ? err.message : '').toMatch(/^.*broken\.yaml: malformed YAML: /);
	});

	it('reports malformed JSON', async () => {
		const path = join(tempDir, 'broken.json');
		await writeFile(path, '{ "root": ');

		const err = await loadError(path);
		expect(err instanceof Error ? err.message : '').toMatch(/broken\.json: malformed JSON: /);
	});
});

// ─── parseConfig ──────────────────────────────────────────────────────────────

describe('parseConfig', () => {
	function parseError(raw: unknown): string {
		try {
			parseConfig(raw, 'test.yaml');
		} catch (err) {
			if (err instanceof ConfigParseError) return err.message;
			throw err;
		}
		return 'no error';
	}

	it('fills defaults for an empty document section', () => {
		const config = parseConfig({}, 'empty.yaml');
		expect(config.root).toEqual({ level: 'INFO', propagate: true, handlers: [] });
		expect(config.handlers).toEqual({});
		expect(config.channels).toEqual({});
	});

	it('defaults a handler to a stderr stream at INFO', () => {
		const config = parseConfig({ handlers: { console: null } });
		expect(config.handlers.console).toMatchObject({ kind: 'console', stream: 'stderr', level: 'INFO' });
	});

	it('applies size-rotation defaults', () => {
		const config = parseConfig({ handlers: { rotating: { type: 'rotating_file' } } });
		expect(config.handlers.rotating).toMatchObject({
			kind: 'rotating-by-size',
			filename: 'app.log',
			encoding: 'utf-8',
			maxBytes: 10485760,
			backupCount: 5,
		});
	});

	it('applies time-rotation defaults', () => {
		const config = parseConfig({ handlers: { timed: { type: 'timed_rotating_file' } } });
		expect(config.handlers.timed).toMatchObject({ when: 'midnight', interval: 1, backupCount: 7, utc: false });
	});

	it('attaches every handler to root unless root lists them', () => {
		const config = parseConfig({ handlers: { a: {}, b: {} } });
		expect(config.root.handlers).toEqual(['a', 'b']);
	});

	it('freezes the result', () => {
		const config = parseConfig({ handlers: { console: {} } });
		expect(Object.isFrozen(config)).toBe(true);
		expect(Object.isFrozen(config.handlers.console)).toBe(true);
		expect(Object.isFrozen(config.root.handlers)).toBe(true);
	});

	it('rejects a document that is not a mapping', () => {
		expect(parseError(['root'])).toBe('test.yaml: (document): must be a mapping');
		expect(parseError(null)).toBe('test.yaml: (document): must be a mapping');
	});

	it('names the offending key', () => {
		expect(parseError({ handlers: { console: { level: 'LOUD' } } })).toBe(
			'test.yaml: handlers.console.level: unknown severity "LOUD"',
		);
		expect(parseError({ handlers: { console: { type: 'syslog' } } })).toBe(
			'test.yaml: handlers.console.type: must be one of stream, file, rotating_file, timed_rotating_file',
		);
		expect(parseError({ handlers: { f: { type: 'file', encoding: 'klingon' } } })).toBe(
			'test.yaml: handlers.f.encoding: unknown encoding "klingon"',
		);
		expect(parseError({ handlers: { f: { type: 'rotating_file', max_bytes: -1 } } })).toBe(
			'test.yaml: handlers.f.max_bytes: must be an integer >= 0',
		);
		expect(parseError({ handlers: { t: { type: 'timed_rotating_file', interval: 0 } } })).toBe(
			'test.yaml: handlers.t.interval: must be an integer >= 1',
		);
		expect(parseError({ handlers: { t: { type: 'timed_rotating_file', when: 'W7' } } })).toBe(
			'test.yaml: handlers.t.when: must be one of S, M, H, D, midnight, W0, W1, W2, W3, W4, W5, W6',
		);
	});

	it('rejects handler references that do not exist', () => {
		expect(parseError({ handlers: { a: {} }, root: { handlers: ['b'] } })).toBe(
			'test.yaml: root.handlers: unknown handler "b"',
		);
		expect(parseError({ channels: { app: { handlers: ['ghost'] } } })).toBe(
			'test.yaml: channels.app.handlers: unknown handler "ghost"',
		);
	});

	it('rejects invalid format templates', () => {
		expect(parseError({ handlers: { c: { formatter: { format: '%(name)q' } } } })).toMatch(
			/^test\.yaml: handlers\.c\.formatter\.format: invalid format directive/,
		);
	});

	it('rejects malformed channel names', () => {
		expect(parseError({ channels: { 'app..db': {} } })).toBe('test.yaml: channels.app..db: invalid channel name');
		expect(parseError({ channels: { root: {} } })).toBe('test.yaml: channels.root: invalid channel name');
	});
});
