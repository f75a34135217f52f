/**
 * Error taxonomy.
 *
 * Construction-time errors are thrown to the caller. Steady-state errors
 * (closed or full channels, failing sinks) are returned or reported, never
 * thrown into the code that is logging.
 */

export class TributaryError extends Error {
	readonly code: string;

	constructor(code: string, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'TributaryError';
		this.code = code;
	}
}

/** Missing, unreadable, malformed or invalid configuration file */
export class ConfigParseError extends TributaryError {
	readonly path: string;

	constructor(path: string, message: string, options?: { cause?: unknown }) {
		super('CONFIG_PARSE', `${path}: ${message}`, options);
		this.name = 'ConfigParseError';
		this.path = path;
	}
}

/** A sink could not be built; other sinks are unaffected */
export class SinkConstructionError extends TributaryError {
	readonly sinkName: string;
	readonly path: string | undefined;

	constructor(sinkName: string, path: string | undefined, message: string, options?: { cause?: unknown }) {
		super('SINK_CONSTRUCTION', `Sink "${sinkName}": ${message}`, options);
		this.name = 'SinkConstructionError';
		this.sinkName = sinkName;
		this.path = path;
	}
}

/** A sink failed while writing or closing */
export class SinkWriteError extends TributaryError {
	readonly sinkName: string;

	constructor(sinkName: string, message: string, options?: { cause?: unknown }) {
		super('SINK_WRITE', `Sink "${sinkName}": ${message}`, options);
		this.name = 'SinkWriteError';
		this.sinkName = sinkName;
	}
}

/** Returned when sending on a channel that has been closed */
export class ChannelClosedError extends TributaryError {
	constructor(message = 'Record channel is closed') {
		super('CHANNEL_CLOSED', message);
		this.name = 'ChannelClosedError';
	}
}

/** Returned when a bounded channel is at capacity */
export class ChannelFullError extends TributaryError {
	readonly capacity: number;

	constructor(capacity: number) {
		super('CHANNEL_FULL', `Record channel is full (capacity ${capacity}); record dropped`);
		this.name = 'ChannelFullError';
		this.capacity = capacity;
	}
}

/** Render an unknown thrown value as a message string */
export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}
