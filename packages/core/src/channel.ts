/**
 * Channel — the named handle application code logs through.
 */

import { type RecordMetadata, type Severity, meetsThreshold } from '@tributary/sdk';
import { ROOT_CHANNEL } from './registry.js';

/**
 * Outcome of one emit.
 *
 * - `written`  — routed through the dispatcher on this thread
 * - `queued`   — handed to the owner's channel
 * - `filtered` — below the channel's effective level
 * - `closed`   — the facade or its channel is closed
 * - `dropped`  — a bounded channel was full
 */
export type EmitStatus = 'written' | 'queued' | 'filtered' | 'closed' | 'dropped';

export interface EmitResult {
	status: EmitStatus;
	error?: Error;
}

/** What a Channel needs from the facade that created it */
export interface ChannelHost {
	emit(name: string, severity: Severity, message: string, metadata?: RecordMetadata): EmitResult;
	getChannel(name: string): Channel;
	effectiveLevel(name: string): Severity;
	setChannelLevel(name: string, level: Severity | undefined): void;
}

export class Channel {
	readonly name: string;
	private readonly host: ChannelHost;

	constructor(name: string, host: ChannelHost) {
		this.name = name;
		this.host = host;
	}

	/** Effective level: this channel's own, or the nearest ancestor's */
	get level(): Severity {
		return this.host.effectiveLevel(this.name);
	}

	/** Set this channel's level; `undefined` makes it inherit again */
	setLevel(level: Severity | undefined): void {
		this.host.setChannelLevel(this.name, level);
	}

	isEnabledFor(severity: Severity): boolean {
		return meetsThreshold(severity, this.level);
	}

	/** Channel named `<this>.<suffix>` */
	child(suffix: string): Channel {
		return this.host.getChannel(this.name === ROOT_CHANNEL ? suffix : `${this.name}.${suffix}`);
	}

	log(severity: Severity, message: string, metadata?: RecordMetadata): EmitResult {
		return this.host.emit(this.name, severity, message, metadata);
	}

	debug(message: string, metadata?: RecordMetadata): EmitResult {
		return this.log('DEBUG', message, metadata);
	}

	info(message: string, metadata?: RecordMetadata): EmitResult {
		return this.log('INFO', message, metadata);
	}

	warning(message: string, metadata?: RecordMetadata): EmitResult {
		return this.log('WARNING', message, metadata);
	}

	error(message: string, metadata?: RecordMetadata): EmitResult {
		return this.log('ERROR', message, metadata);
	}

	critical(message: string, metadata?: RecordMetadata): EmitResult {
		return this.log('CRITICAL', message, metadata);
	}
}
