/**
 * Sink interface — terminal destinations for formatted records.
 *
 * Sinks are owned by exactly one dispatcher and are only ever written from
 * the thread that owns it, so implementations need no locking.
 */

import type { Severity, SinkKind } from './types.js';

/**
 * Sink interface.
 *
 * Implement this to add a log destination. `write` may throw; the
 * dispatcher isolates the failure to this sink.
 */
export interface Sink {
	readonly kind: SinkKind | 'custom';

	/** Persist or emit one formatted line (without trailing newline) */
	write(line: string, severity: Severity): void;

	/** Release any held resources. Called exactly once. */
	close(): void;
}

/** Options a sink factory passes through to sink constructors */
export interface SinkBuildOptions {
	/** Clock used for time-based rotation */
	now?: () => Date;
}
