/**
 * LoggerFacade — one logging entry point for every process topology.
 *
 * Library-first API:
 *   const logger = await LoggerFacade.create('logging.yaml', { useMultiprocess: true });
 *   const port = logger.getChannelHandleForWorkers();   // hand to a Worker
 *   logger.getChannel('app').info('started');
 *   await logger.stop();
 */

import { basename } from 'node:path';
import {
	ChannelClosedError,
	ChannelFullError,
	type OperatingMode,
	type RecordMetadata,
	type Severity,
	type Sink,
	type SinkConstructionError,
	TributaryError,
	type TributaryConfig,
	buildRecord,
	describeError,
} from '@tributary/sdk';
import { Channel, type ChannelHost, type EmitResult } from './channel.js';
import { CollectorLoop } from './collector.js';
import { loadConfig, parseConfig } from './config.js';
import { Dispatcher, createRegistry } from './dispatcher.js';
import { type ErrorReporter, guardReporter, stderrReporter } from './fallback.js';
import { resolveMode } from './mode.js';
import { RecordQueue, type RecordSender } from './queue.js';
import { type ChannelRegistry, ROOT_CHANNEL, normalizeChannelName } from './registry.js';
import { buildSinks } from './sink-factory.js';
import {
	type ChannelHandle,
	ChannelHub,
	type ChildEndpoint,
	PortSender,
	isMessagePort,
} from './transport.js';

export const DEFAULT_DRAIN_TIMEOUT_MS = 5000;

// ─── Options ──────────────────────────────────────────────────────────────────

export interface LoggerFacadeOptions {
	/** Funnel records through one aggregation owner (default: false) */
	useMultiprocess?: boolean;
	/** Owner queue capacity; unset, <= 0 or Infinity means unbounded */
	queueCapacity?: number;
	/** Channel handle from an owner; with `useMultiprocess` this makes a worker */
	channel?: ChannelHandle;
	/** Pre-built sinks keyed by handler name, replacing configured ones */
	sinks?: Map<string, Sink>;
	/** Receives the library's own diagnostics (default: stderr) */
	onError?: ErrorReporter;
	/** How long an owner's stop() waits for producers to finish (default: 5000) */
	drainTimeoutMs?: number;
	/** Render `asctime` in UTC */
	utc?: boolean;
	/** Clock for record timestamps and time-based rotation */
	now?: () => Date;
}

export interface WorkerFacadeOptions {
	/** Supplies channel levels; a worker never builds sinks */
	config?: TributaryConfig;
	onError?: ErrorReporter;
	now?: () => Date;
}

export interface FacadeStats {
	/** Successful sink writes */
	written: number;
	/** Records sent to an owner */
	queued: number;
	/** Records below their channel's level, here or on arrival at the owner */
	filtered: number;
	/** Records rejected by a full channel */
	dropped: number;
	/** Sink writes or closes that threw */
	sinkFailures: number;
	/** Records from producers that arrived after the owner closed */
	late: number;
	/** Tagged transport messages that failed validation */
	malformed: number;
}

type ModeState =
	| { mode: 'standalone'; dispatcher: Dispatcher }
	| { mode: 'aggregation-owner'; dispatcher: Dispatcher; queue: RecordQueue; collector: CollectorLoop; hub: ChannelHub }
	| { mode: 'worker'; sender: RecordSender };

const EMPTY_CONFIG: TributaryConfig = parseConfig({}, '<none>');

// ─── LoggerFacade ─────────────────────────────────────────────────────────────

export class LoggerFacade implements ChannelHost {
	readonly config: TributaryConfig;
	/** Handlers that failed to build; the facade runs without them */
	readonly constructionErrors: readonly SinkConstructionError[];
	private readonly state: ModeState;
	private readonly registry: ChannelRegistry;
	private readonly report: ErrorReporter;
	private readonly now: () => Date;
	private readonly drainTimeoutMs: number;
	private readonly channels = new Map<string, Channel>();
	private readonly counts = { queued: 0, filtered: 0, dropped: 0 };
	private stopping: Promise<void> | null = null;

	private constructor(
		config: TributaryConfig,
		mode: OperatingMode,
		options: LoggerFacadeOptions,
		channel: ChannelHandle | undefined,
	) {
		this.config = config;
		this.report = guardReporter(options.onError ?? stderrReporter);
		this.now = options.now ?? (() => new Date());
		this.drainTimeoutMs = options.drainTimeoutMs ?? DEFAULT_DRAIN_TIMEOUT_MS;

		if (mode === 'worker') {
			if (!channel) throw new TributaryError('NO_CHANNEL', 'worker mode requires a channel handle');
			this.constructionErrors = [];
			this.registry = createRegistry(config);
			this.state = { mode, sender: isMessagePort(channel) ? new PortSender(channel) : channel };
			return;
		}

		const built = buildSinks(config.handlers, {
			sinks: options.sinks,
			utc: options.utc,
			now: options.now,
			report: this.report,
		});
		this.constructionErrors = built.errors;
		this.registry = createRegistry(config, built.sinks);
		const dispatcher = new Dispatcher(this.registry, built.sinks.values(), this.report);

		if (mode === 'standalone') {
			this.state = { mode, dispatcher };
			return;
		}

		const queue = new RecordQueue(options.queueCapacity);
		const collector = new CollectorLoop(queue, dispatcher);
		collector.start();
		this.state = { mode, dispatcher, queue, collector, hub: new ChannelHub(queue, this.report) };
	}

	/**
	 * Load a configuration file and build a facade.
	 * Throws ConfigParseError for a bad file; sink failures are collected
	 * on `constructionErrors` instead.
	 */
	static async create(configPath: string, options: LoggerFacadeOptions = {}): Promise<LoggerFacade> {
		const config = await loadConfig(configPath);
		return LoggerFacade.fromConfig(config, options);
	}

	/** Build a facade from an already-validated configuration */
	static fromConfig(config: TributaryConfig, options: LoggerFacadeOptions = {}): LoggerFacade {
		const mode = resolveMode(options.useMultiprocess ?? false, options.channel);
		return new LoggerFacade(config, mode, options, options.channel);
	}

	/** Build a worker facade that forwards everything to the owner behind `channel` */
	static fromChannel(channel: ChannelHandle, options: WorkerFacadeOptions = {}): LoggerFacade {
		return new LoggerFacade(options.config ?? EMPTY_CONFIG, 'worker', options, channel);
	}

	getMode(): OperatingMode {
		return this.state.mode;
	}

	get stopped(): boolean {
		return this.stopping !== null;
	}

	// ─── Channels ───────────────────────────────────────────────────────────────

	/**
	 * Get the channel for `name` (root when omitted).
	 * `defaultLevel` applies only when the configuration sets no level for it.
	 */
	getChannel(name?: string, defaultLevel?: Severity): Channel {
		const key = normalizeChannelName(name);
		if (defaultLevel !== undefined && key !== ROOT_CHANNEL && this.config.channels[key]?.level === undefined) {
			this.registry.node(key).level = defaultLevel;
		}

		let channel = this.channels.get(key);
		if (!channel) {
			this.registry.node(key);
			channel = new Channel(key, this);
			this.channels.set(key, channel);
		}
		return channel;
	}

	effectiveLevel(name: string): Severity {
		return this.registry.effectiveLevel(name);
	}

	setChannelLevel(name: string, level: Severity | undefined): void {
		const node = this.registry.node(name);
		node.level = node === this.registry.root ? (level ?? this.config.root.level) : level;
	}

	// ─── Emitting ───────────────────────────────────────────────────────────────

	/**
	 * Route one record. Never throws.
	 *
	 * Standalone and owner facades write synchronously through their
	 * dispatcher; workers build the record and send it to the owner.
	 */
	emit(name: string, severity: Severity, message: string, metadata?: RecordMetadata): EmitResult {
		if (this.stopped) {
			return { status: 'closed', error: new ChannelClosedError('Logger facade is stopped') };
		}

		try {
			const channelName = normalizeChannelName(name);
			if (!this.registry.isEnabledFor(channelName, severity)) {
				this.counts.filtered++;
				return { status: 'filtered' };
			}

			const record = buildRecord({
				name: channelName,
				severity,
				message,
				metadata,
				timestamp: this.now().getTime(),
			});

			switch (this.state.mode) {
				case 'standalone':
					this.state.dispatcher.dispatch(record);
					return { status: 'written' };
				case 'aggregation-owner':
					this.state.collector.dispatch(record);
					return { status: 'written' };
				case 'worker': {
					const result = this.state.sender.send(record);
					if (result.ok) {
						this.counts.queued++;
						return { status: 'queued' };
					}
					if (result.error instanceof ChannelFullError) {
						this.counts.dropped++;
						this.report(result.error);
						return { status: 'dropped', error: result.error };
					}
					return { status: 'closed', error: result.error };
				}
			}
		} catch (err) {
			const error = new TributaryError('EMIT', `emit failed: ${describeError(err)}`, { cause: err });
			this.counts.dropped++;
			this.report(error);
			return { status: 'dropped', error };
		}
	}

	// ─── Owner endpoints ────────────────────────────────────────────────────────

	/**
	 * Open a new MessagePort for one worker thread.
	 * Transfer it to the worker and pass it to `LoggerFacade.fromChannel`.
	 *
	 * Every handle counts as an attached producer until its worker stops or
	 * the port closes. A handle that never reaches a worker holds `stop()`
	 * for the full `drainTimeoutMs` and ends in a DRAIN_TIMEOUT report.
	 */
	getChannelHandleForWorkers(): ChannelHandle {
		return this.ownerState('getChannelHandleForWorkers').hub.openPort();
	}

	/** Sender onto the owner's queue for producers in this same thread */
	getInProcessSender(): RecordSender {
		return this.ownerState('getInProcessSender').queue.sender();
	}

	/** Accept records from a forked child that logs through `processChannel()` */
	attachProcess(child: ChildEndpoint): void {
		this.ownerState('attachProcess').hub.attachProcess(child);
	}

	private ownerState(operation: string): Extract<ModeState, { mode: 'aggregation-owner' }> {
		if (this.state.mode !== 'aggregation-owner') {
			throw new TributaryError('NOT_OWNER', `${operation} is only available in aggregation-owner mode (mode=${this.state.mode})`);
		}
		if (this.stopped) {
			throw new TributaryError('STOPPED', `${operation} called after stop()`);
		}
		return this.state;
	}

	// ─── Lifecycle ──────────────────────────────────────────────────────────────

	/**
	 * Flush and release everything this facade owns.
	 * Repeated calls return the same promise.
	 */
	stop(): Promise<void> {
		this.stopping ??= this.shutdown();
		return this.stopping;
	}

	private async shutdown(): Promise<void> {
		const state = this.state;
		switch (state.mode) {
			case 'standalone':
				state.dispatcher.close();
				return;
			case 'worker':
				state.sender.end();
				return;
			case 'aggregation-owner': {
				const drained = await state.hub.quiesce(this.drainTimeoutMs);
				if (!drained) {
					const pending = state.hub.stats().producers;
					this.report(
						new TributaryError(
							'DRAIN_TIMEOUT',
							`${pending} producer(s) still attached after ${this.drainTimeoutMs}ms; closing anyway`,
						),
					);
				}
				state.hub.close();
				await state.collector.stop();
				return;
			}
		}
	}

	stats(): FacadeStats {
		const state = this.state;
		const dispatched = state.mode === 'worker' ? { written: 0, failures: 0 } : state.dispatcher.stats();
		const hub = state.mode === 'aggregation-owner' ? state.hub.stats() : { late: 0, malformed: 0 };
		return {
			written: dispatched.written,
			queued: this.counts.queued,
			filtered: this.counts.filtered + (state.mode === 'aggregation-owner' ? state.collector.filtered : 0),
			dropped: this.counts.dropped + (state.mode === 'aggregation-owner' ? state.queue.dropped : 0),
			sinkFailures: dispatched.failures,
			late: hub.late,
			malformed: hub.malformed,
		};
	}

	toString(): string {
		const source = this.config.source;
		const name = source === undefined || source.startsWith('<') ? source ?? '<none>' : basename(source);
		return `LoggerFacade(mode=${this.state.mode}, config=${name})`;
	}
}
