/**
 * Core type definitions shared by every Tributary package.
 */

// ─── Severity ─────────────────────────────────────────────────────────────────

/** Ordered record severities, lowest first. */
export type Severity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

// ─── Log Record ───────────────────────────────────────────────────────────────

/** Source-location and free-form metadata attached at the call site */
export interface RecordMetadata {
	/** Source file that produced the record */
	file?: string;
	/** Line number within `file` */
	line?: number;
	/** Function or method name */
	fn?: string;
	/** Arbitrary string fields carried alongside the message */
	extra?: Record<string, string>;
}

/**
 * A single log record.
 *
 * Records are plain data so they survive structured clone across
 * worker-thread ports and child-process IPC unchanged.
 */
export interface LogRecord {
	/** Creation time in epoch milliseconds */
	readonly timestamp: number;
	/** Channel name (`root` for the root channel) */
	readonly name: string;
	readonly severity: Severity;
	readonly message: string;
	readonly metadata?: RecordMetadata;
	/** PID of the producing process */
	readonly pid: number;
}

// ─── Operating Mode ───────────────────────────────────────────────────────────

/**
 * How a facade routes records.
 *
 * - `standalone`        — single process, sinks written directly
 * - `aggregation-owner` — owns the record queue, the collector and every sink
 * - `worker`            — forwards records to an owner; holds no sinks
 */
export type OperatingMode = 'standalone' | 'aggregation-owner' | 'worker';

// ─── Sink Configuration ───────────────────────────────────────────────────────

/** Sink kind tags */
export type SinkKind = 'console' | 'file' | 'rotating-by-size' | 'rotating-by-time';

/** Settings every sink kind shares */
export interface SinkConfigBase {
	/** Handler name from the configuration file */
	name: string;
	/** Minimum severity this sink accepts */
	level: Severity;
	/** Printf-style record template */
	format: string;
	/** strftime pattern for `%(asctime)s` */
	datefmt: string;
}

export interface ConsoleSinkConfig extends SinkConfigBase {
	kind: 'console';
	stream: 'stdout' | 'stderr';
	color: boolean;
}

export interface FileSinkConfig extends SinkConfigBase {
	kind: 'file';
	filename: string;
	mode: 'a' | 'w';
	encoding: BufferEncoding;
}

export interface SizeRotatingSinkConfig extends SinkConfigBase {
	kind: 'rotating-by-size';
	filename: string;
	encoding: BufferEncoding;
	/** Rotate before a write would take the file past this size; 0 disables */
	maxBytes: number;
	backupCount: number;
}

/** Rotation unit for time-based rotation (`W0` is Monday) */
export type RotationWhen =
	| 'S'
	| 'M'
	| 'H'
	| 'D'
	| 'midnight'
	| 'W0'
	| 'W1'
	| 'W2'
	| 'W3'
	| 'W4'
	| 'W5'
	| 'W6';

export interface TimeRotatingSinkConfig extends SinkConfigBase {
	kind: 'rotating-by-time';
	filename: string;
	encoding: BufferEncoding;
	when: RotationWhen;
	interval: number;
	backupCount: number;
	/** Compute rollover instants and backup suffixes in UTC */
	utc: boolean;
}

/** Fully-resolved configuration of one sink */
export type SinkConfig =
	| ConsoleSinkConfig
	| FileSinkConfig
	| SizeRotatingSinkConfig
	| TimeRotatingSinkConfig;

// ─── Channel Configuration ────────────────────────────────────────────────────

/** Per-channel overrides from the `channels` section */
export interface ChannelConfig {
	level?: Severity;
	propagate?: boolean;
	/** Handler names attached directly to this channel */
	handlers?: string[];
}

export interface RootConfig {
	level: Severity;
	/** Default propagation for named channels */
	propagate: boolean;
	/** Handler names attached to the root channel */
	handlers: string[];
}

/** Validated configuration file contents */
export interface TributaryConfig {
	root: RootConfig;
	handlers: Record<string, SinkConfig>;
	channels: Record<string, ChannelConfig>;
	/** Where the configuration was loaded from, if it came from a file */
	source?: string;
}
