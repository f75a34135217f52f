/**
 * Cross-process transport.
 *
 * Producers in worker threads send over a MessagePort; forked children send
 * over their IPC channel. On the owner side a ChannelHub validates incoming
 * messages and feeds the records into the RecordQueue.
 */

import { MessageChannel, type MessagePort } from 'node:worker_threads';
import {
	ChannelClosedError,
	ChannelFullError,
	type LogRecord,
	TributaryError,
	type WireMessage,
	describeError,
	isTributaryMessage,
	parseWireMessage,
	recordMessage,
} from '@tributary/sdk';
import type { ErrorReporter } from './fallback.js';
import type { RecordQueue, RecordSender, SendResult } from './queue.js';

/** Anything a worker facade can be handed as its channel */
export type ChannelHandle = MessagePort | RecordSender;

/** The parts of `process` or a `ChildProcess` used for IPC */
export interface IpcEndpoint {
	send?(message: unknown): boolean;
	readonly connected?: boolean;
	on(event: 'message', listener: (message: unknown) => void): unknown;
	off(event: 'message', listener: (message: unknown) => void): unknown;
}

/** Owner-side view of a forked child */
export interface ChildEndpoint extends IpcEndpoint {
	on(event: 'message', listener: (message: unknown) => void): unknown;
	on(event: 'disconnect', listener: () => void): unknown;
	off(event: 'message', listener: (message: unknown) => void): unknown;
	off(event: 'disconnect', listener: () => void): unknown;
}

const OK: SendResult = { ok: true };
const END: WireMessage = { tributary: 'end' };
const CLOSED: WireMessage = { tributary: 'closed' };

export function isMessagePort(handle: unknown): handle is MessagePort {
	return (
		typeof handle === 'object' &&
		handle !== null &&
		'postMessage' in handle &&
		typeof handle.postMessage === 'function'
	);
}

// ─── Producer Side ────────────────────────────────────────────────────────────

/** Sends records to the owner over a MessagePort */
export class PortSender implements RecordSender {
	private readonly port: MessagePort;
	private ended = false;
	private ownerClosed = false;

	constructor(port: MessagePort) {
		this.port = port;
		port.on('message', (message: unknown) => {
			if (parseWireMessage(message)?.tributary === 'closed') this.ownerClosed = true;
		});
		port.on('close', () => {
			this.ownerClosed = true;
		});
		// The port must not keep a finished worker alive
		port.unref();
	}

	get closed(): boolean {
		return this.ended || this.ownerClosed;
	}

	send(record: LogRecord): SendResult {
		if (this.closed) return { ok: false, error: new ChannelClosedError() };
		try {
			this.port.postMessage(recordMessage(record));
		} catch (err) {
			return { ok: false, error: new ChannelClosedError(`Record channel is closed: ${describeError(err)}`) };
		}
		return OK;
	}

	end(): void {
		if (this.ended) return;
		this.ended = true;
		if (!this.ownerClosed) this.port.postMessage(END);
		this.port.close();
	}
}

/** Sends records to the owner over a child process's IPC channel */
export class IpcSender implements RecordSender {
	private readonly endpoint: IpcEndpoint;
	private ended = false;
	private ownerClosed = false;

	constructor(endpoint: IpcEndpoint) {
		this.endpoint = endpoint;
		endpoint.on('message', this.onMessage);
	}

	get closed(): boolean {
		return this.ended || this.ownerClosed || this.endpoint.connected === false;
	}

	send(record: LogRecord): SendResult {
		if (this.closed || !this.endpoint.send) {
			return { ok: false, error: new ChannelClosedError() };
		}
		try {
			this.endpoint.send(recordMessage(record));
		} catch (err) {
			return { ok: false, error: new ChannelClosedError(`Record channel is closed: ${describeError(err)}`) };
		}
		return OK;
	}

	end(): void {
		if (this.ended) return;
		this.ended = true;
		// Removing the listener lets the child exit once its work is done
		this.endpoint.off('message', this.onMessage);
		if (!this.ownerClosed && this.endpoint.connected !== false) this.endpoint.send?.(END);
	}

	private readonly onMessage = (message: unknown): void => {
		if (parseWireMessage(message)?.tributary === 'closed') this.ownerClosed = true;
	};
}

/**
 * Channel handle for a forked child, sending to the parent over IPC.
 * The parent facade must `attachProcess` the child.
 */
export function processChannel(proc: IpcEndpoint = process): IpcSender {
	return new IpcSender(proc);
}

// ─── Owner Side ───────────────────────────────────────────────────────────────

interface Producer {
	readonly id: number;
	readonly done: Promise<void>;
	readonly finished: boolean;
	finish(): void;
	/** Tell the producer the owner is closed and stop listening */
	release(): void;
}

export interface HubStats {
	/** Producers attached and not yet finished */
	producers: number;
	/** Records that arrived after the queue closed */
	late: number;
	/** Tagged messages that failed validation */
	malformed: number;
}

/**
 * Owner-side fan-in of worker ports and child processes.
 */
export class ChannelHub {
	private readonly queue: RecordQueue;
	private readonly report: ErrorReporter;
	private readonly producers = new Map<number, Producer>();
	private nextId = 0;
	private lateCount = 0;
	private malformedCount = 0;

	constructor(queue: RecordQueue, report: ErrorReporter) {
		this.queue = queue;
		this.report = report;
	}

	/** Open a fresh MessageChannel and return the end to hand to a worker */
	openPort(): MessagePort {
		const { port1, port2 } = new MessageChannel();
		const producer = this.register(() => {
			port1.off('message', onMessage);
			port1.postMessage(CLOSED);
			port1.close();
		});
		const onMessage = (message: unknown) => this.accept(message, producer);
		port1.on('message', onMessage);
		port1.on('close', () => producer.finish());
		port1.unref();
		return port2;
	}

	/** Accept records from a forked child's IPC channel */
	attachProcess(child: ChildEndpoint): void {
		const onDisconnect = () => producer.finish();
		const producer = this.register(() => {
			child.off('message', onMessage);
			child.off('disconnect', onDisconnect);
			if (child.connected !== false) child.send?.(CLOSED);
		});
		const onMessage = (message: unknown) => this.accept(message, producer);
		child.on('message', onMessage);
		child.on('disconnect', onDisconnect);
	}

	stats(): HubStats {
		return { producers: this.pending().length, late: this.lateCount, malformed: this.malformedCount };
	}

	/**
	 * Wait until every attached producer has ended or disconnected.
	 * Resolves false if `timeoutMs` passes first.
	 */
	async quiesce(timeoutMs: number): Promise<boolean> {
		const pending = this.pending();
		if (pending.length === 0) return true;
		const all = Promise.all(pending.map((p) => p.done)).then(() => true);
		let timer: NodeJS.Timeout | undefined;
		const timeout = new Promise<boolean>((resolve) => {
			timer = setTimeout(() => resolve(false), timeoutMs);
		});
		try {
			return await Promise.race([all, timeout]);
		} finally {
			clearTimeout(timer);
		}
	}

	/** Notify producers that the owner is closed and detach from all of them */
	close(): void {
		for (const producer of this.producers.values()) {
			try {
				producer.release();
			} catch (err) {
				this.report(
					new TributaryError('TRANSPORT', `failed to notify producer ${producer.id} of close`, { cause: err }),
				);
			}
			producer.finish();
		}
		this.producers.clear();
	}

	private pending(): Producer[] {
		return [...this.producers.values()].filter((p) => !p.finished);
	}

	private register(release: () => void): Producer {
		const id = this.nextId++;
		let resolveDone: () => void = () => {};
		const done = new Promise<void>((resolve) => {
			resolveDone = resolve;
		});
		let finished = false;
		const producer: Producer = {
			id,
			done,
			get finished() {
				return finished;
			},
			finish: () => {
				if (finished) return;
				finished = true;
				resolveDone();
			},
			release,
		};
		this.producers.set(id, producer);
		return producer;
	}

	private accept(message: unknown, producer: Producer): void {
		// Other IPC traffic shares the channel; only tagged messages are ours
		if (!isTributaryMessage(message)) return;

		const parsed = parseWireMessage(message);
		if (!parsed) {
			this.malformedCount++;
			this.report(new TributaryError('MALFORMED_MESSAGE', `ignored malformed message from producer ${producer.id}`));
			return;
		}

		switch (parsed.tributary) {
			case 'record': {
				const result = this.queue.send(parsed.record);
				if (result.ok) return;
				if (result.error instanceof ChannelFullError) {
					this.report(result.error);
				} else {
					this.lateCount++;
				}
				return;
			}
			case 'end':
				producer.finish();
				return;
			case 'closed':
				return;
		}
	}
}
