/**
 * Dispatcher — hands records to the sinks along a channel's route.
 *
 * A sink failure is caught, reported and confined to that sink; the record
 * still reaches every other sink.
 */

import { type LogRecord, SinkWriteError, type TributaryConfig, describeError, meetsThreshold } from '@tributary/sdk';
import type { ErrorReporter } from './fallback.js';
import { ChannelRegistry } from './registry.js';
import type { BoundSink } from './sink-factory.js';

export interface DispatchStats {
	/** Successful sink writes */
	written: number;
	/** Sink writes or closes that threw */
	failures: number;
}

/**
 * Build a facade's registry from configuration: channel levels and
 * propagation, with sinks attached where the configuration names them.
 * Handlers missing from `sinks` (failed to build) are skipped.
 */
export function createRegistry(config: TributaryConfig, sinks: Map<string, BoundSink> = new Map()): ChannelRegistry {
	const registry = new ChannelRegistry({
		rootLevel: config.root.level,
		defaultPropagate: config.root.propagate,
	});

	const attach = (names: readonly string[], target: BoundSink[]) => {
		for (const name of names) {
			const bound = sinks.get(name);
			if (bound) target.push(bound);
		}
	};

	attach(config.root.handlers, registry.root.sinks);
	for (const [name, channel] of Object.entries(config.channels)) {
		const node = registry.node(name);
		if (channel.level !== undefined) node.level = channel.level;
		if (channel.propagate !== undefined) node.propagate = channel.propagate;
		if (channel.handlers) attach(channel.handlers, node.sinks);
	}

	return registry;
}

export class Dispatcher {
	readonly registry: ChannelRegistry;
	private readonly sinks: BoundSink[];
	private readonly report: ErrorReporter;
	private readonly counts: DispatchStats = { written: 0, failures: 0 };
	private closed = false;

	/** `sinks` are every sink this dispatcher owns, attached or not */
	constructor(registry: ChannelRegistry, sinks: Iterable<BoundSink>, report: ErrorReporter) {
		this.registry = registry;
		this.sinks = [...sinks];
		this.report = report;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Write a record to every sink on its route whose level it meets.
	 * Channel levels are not consulted; callers filter before dispatch.
	 * Returns the number of sinks written.
	 */
	dispatch(record: LogRecord): number {
		if (this.closed) return 0;
		let written = 0;
		for (const node of this.registry.route(record.name)) {
			for (const bound of node.sinks) {
				if (!meetsThreshold(record.severity, bound.level)) continue;
				if (this.writeTo(bound, record)) written++;
			}
		}
		return written;
	}

	/** Close every owned sink once. Later calls do nothing. */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		const seen = new Set<BoundSink['sink']>();
		for (const bound of this.sinks) {
			if (seen.has(bound.sink)) continue;
			seen.add(bound.sink);
			try {
				bound.sink.close();
			} catch (err) {
				this.counts.failures++;
				this.report(new SinkWriteError(bound.name, `close failed: ${describeError(err)}`, { cause: err }));
			}
		}
	}

	stats(): DispatchStats {
		return { ...this.counts };
	}

	private writeTo(bound: BoundSink, record: LogRecord): boolean {
		try {
			bound.sink.write(bound.formatter.format(record), record.severity);
			this.counts.written++;
			return true;
		} catch (err) {
			this.counts.failures++;
			this.report(new SinkWriteError(bound.name, `write failed: ${describeError(err)}`, { cause: err }));
			return false;
		}
	}
}
