/**
 * Sink factory — builds sinks from handler configuration.
 */

import {
	type SinkBuildOptions,
	type SinkConfig,
	SinkConstructionError,
	type Severity,
	type Sink,
	describeError,
} from '@tributary/sdk';
import { ConsoleSink } from '@tributary/sink-console';
import { FileSink, SizeRotatingFileSink, TimeRotatingFileSink } from '@tributary/sink-file';
import type { ErrorReporter } from './fallback.js';
import { RecordFormatter } from './format.js';

/** A sink together with the threshold and formatter its handler configured */
export interface BoundSink {
	readonly name: string;
	readonly sink: Sink;
	readonly level: Severity;
	readonly formatter: RecordFormatter;
}

/**
 * Build one sink from its configuration.
 * Throws SinkConstructionError when the sink cannot be opened.
 */
export function buildSink(config: SinkConfig, options: SinkBuildOptions = {}): Sink {
	switch (config.kind) {
		case 'console':
			return new ConsoleSink(config);
		case 'file':
			return new FileSink(config);
		case 'rotating-by-size':
			return new SizeRotatingFileSink(config);
		case 'rotating-by-time':
			return new TimeRotatingFileSink(config, options);
	}
}

export interface BuildSinksOptions extends SinkBuildOptions {
	/** Pre-built sinks keyed by handler name; they replace configured ones */
	sinks?: Map<string, Sink>;
	/** Render `asctime` in UTC */
	utc?: boolean;
	report: ErrorReporter;
}

export interface BuildSinksResult {
	sinks: Map<string, BoundSink>;
	errors: SinkConstructionError[];
}

/**
 * Build every configured handler.
 *
 * A handler that fails, including one with an invalid format template, is
 * reported and left out; the others are still built. Pre-built sinks named after a handler take its place and keep its
 * level and formatter.
 */
export function buildSinks(handlers: Record<string, SinkConfig>, options: BuildSinksOptions): BuildSinksResult {
	const sinks = new Map<string, BoundSink>();
	const errors: SinkConstructionError[] = [];

	for (const [name, config] of Object.entries(handlers)) {
		let formatter: RecordFormatter;
		let sink: Sink;
		try {
			// Formatter first, so a bad template never leaves an opened sink behind
			formatter = new RecordFormatter(config.format, { datefmt: config.datefmt, utc: options.utc });
			sink = options.sinks?.get(name) ?? buildSink(config, options);
		} catch (err) {
			const error =
				err instanceof SinkConstructionError
					? err
					: new SinkConstructionError(name, sinkPath(config), describeError(err), { cause: err });
			errors.push(error);
			options.report(error);
			continue;
		}
		sinks.set(name, {
			name,
			sink,
			level: config.level,
			formatter,
		});
	}

	return { sinks, errors };
}

function sinkPath(config: SinkConfig): string | undefined {
	return config.kind === 'console' ? undefined : config.filename;
}
