/**
 * RecordQueue — the owner's single-consumer record channel.
 *
 * Unbounded by default. With a capacity, `send` rejects the newest record
 * when full (returning ChannelFullError, never blocking), while `sendWait`
 * waits for room. Closing rejects later sends but keeps queued records
 * receivable until drained.
 */

import { ChannelClosedError, ChannelFullError, type LogRecord } from '@tributary/sdk';

export type SendResult = { ok: true } | { ok: false; error: ChannelClosedError | ChannelFullError };

/** Producer-side view of a channel */
export interface RecordSender {
	/** Enqueue one record without blocking */
	send(record: LogRecord): SendResult;
	/** Signal that this producer will send nothing more */
	end(): void;
	readonly closed: boolean;
}

const OK: SendResult = { ok: true };

/** Normalize a configured capacity; anything not positive and finite means unbounded */
export function normalizeCapacity(capacity: number | undefined): number {
	if (capacity === undefined || !Number.isFinite(capacity) || capacity <= 0) {
		return Number.POSITIVE_INFINITY;
	}
	return Math.floor(capacity);
}

export class RecordQueue {
	readonly capacity: number;
	private items: LogRecord[] = [];
	private head = 0;
	private readonly receivers: Array<(record: LogRecord | null) => void> = [];
	private readonly spaceWaiters: Array<() => void> = [];
	private isClosed = false;
	private droppedCount = 0;

	constructor(capacity?: number) {
		this.capacity = normalizeCapacity(capacity);
	}

	get size(): number {
		return this.items.length - this.head;
	}

	get closed(): boolean {
		return this.isClosed;
	}

	/** Records rejected because the queue was full */
	get dropped(): number {
		return this.droppedCount;
	}

	send(record: LogRecord): SendResult {
		if (this.isClosed) return { ok: false, error: new ChannelClosedError() };

		const receiver = this.receivers.shift();
		if (receiver) {
			receiver(record);
			return OK;
		}

		if (this.size >= this.capacity) {
			this.droppedCount++;
			return { ok: false, error: new ChannelFullError(this.capacity) };
		}

		this.items.push(record);
		return OK;
	}

	/**
	 * Enqueue, waiting for room when the queue is bounded and full.
	 * Resolves with ChannelClosedError if the queue closes while waiting.
	 */
	async sendWait(record: LogRecord): Promise<SendResult> {
		while (!this.isClosed && this.receivers.length === 0 && this.size >= this.capacity) {
			await new Promise<void>((resolve) => this.spaceWaiters.push(resolve));
		}
		return this.send(record);
	}

	/**
	 * Take the next record, waiting if none is queued.
	 * Resolves null only once the queue is closed and empty.
	 */
	receive(): Promise<LogRecord | null> {
		if (this.size > 0) {
			const record = this.take();
			this.spaceWaiters.shift()?.();
			return Promise.resolve(record);
		}
		if (this.isClosed) return Promise.resolve(null);
		return new Promise((resolve) => this.receivers.push(resolve));
	}

	close(): void {
		if (this.isClosed) return;
		this.isClosed = true;
		// Receivers only wait while the queue is empty
		for (const receiver of this.receivers.splice(0)) receiver(null);
		for (const waiter of this.spaceWaiters.splice(0)) waiter();
	}

	/** In-process producer handle; ending it leaves the queue open */
	sender(): RecordSender {
		const queue = this;
		return {
			send: (record) => queue.send(record),
			end: () => {},
			get closed() {
				return queue.closed;
			},
		};
	}

	private take(): LogRecord {
		const record = this.items[this.head];
		this.head++;
		if (this.head > 1024 && this.head * 2 > this.items.length) {
			this.items = this.items.slice(this.head);
			this.head = 0;
		}
		return record;
	}
}
