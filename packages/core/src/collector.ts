/**
 * Collector loop — the single consumer of the owner's record queue.
 *
 * The collector owns the dispatcher, and through it every sink. Records
 * from the queue and records from the owner's own thread both go through
 * the same dispatcher, so each sink only ever has one writer.
 *
 * Queued records come from producers whose own configuration may differ
 * from the owner's, so they are checked against the owner's channel levels
 * before dispatch.
 */

import type { LogRecord } from '@tributary/sdk';
import type { Dispatcher } from './dispatcher.js';
import type { RecordQueue } from './queue.js';

export type CollectorState = 'not-started' | 'running' | 'draining' | 'stopped';

export class CollectorLoop {
	private readonly queue: RecordQueue;
	private readonly dispatcher: Dispatcher;
	private current: CollectorState = 'not-started';
	private loop: Promise<void> | null = null;
	private stopping: Promise<void> | null = null;
	private filteredCount = 0;

	constructor(queue: RecordQueue, dispatcher: Dispatcher) {
		this.queue = queue;
		this.dispatcher = dispatcher;
	}

	get state(): CollectorState {
		return this.current;
	}

	/** Queued records below the owner's level for their channel */
	get filtered(): number {
		return this.filteredCount;
	}

	/** Begin draining the queue. Only the first call has any effect. */
	start(): void {
		if (this.current !== 'not-started') return;
		this.current = 'running';
		this.loop = this.run();
	}

	/** Route one record on the caller's thread, bypassing the queue */
	dispatch(record: LogRecord): number {
		if (this.current === 'stopped') return 0;
		return this.dispatcher.dispatch(record);
	}

	/**
	 * Close the queue, drain what is left, then close every sink.
	 * Repeated calls return the same promise.
	 */
	stop(): Promise<void> {
		this.stopping ??= this.shutdown();
		return this.stopping;
	}

	private async shutdown(): Promise<void> {
		// Records queued before a start still have to reach the sinks
		this.start();
		this.current = 'draining';
		this.queue.close();
		await this.loop;
		this.dispatcher.close();
		this.current = 'stopped';
	}

	private async run(): Promise<void> {
		let record: LogRecord | null;
		while ((record = await this.queue.receive()) !== null) {
			if (!this.dispatcher.registry.isEnabledFor(record.name, record.severity)) {
				this.filteredCount++;
				continue;
			}
			this.dispatcher.dispatch(record);
		}
	}
}
