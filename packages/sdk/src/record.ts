/**
 * Record builder, validators and the wire format used between producers
 * and the aggregation owner.
 */

import { isSeverity } from './severity.js';
import type { LogRecord, RecordMetadata, Severity } from './types.js';

/** Options for building a record */
export interface BuildRecordOptions {
	name: string;
	severity: Severity;
	message: string;
	metadata?: RecordMetadata;
	timestamp?: number;
	pid?: number;
}

/**
 * Build an immutable record.
 * Fills in the timestamp and pid, and freezes the record and its metadata.
 */
export function buildRecord(options: BuildRecordOptions): LogRecord {
	const metadata = options.metadata ? freezeMetadata(options.metadata) : undefined;
	return Object.freeze({
		timestamp: options.timestamp ?? Date.now(),
		name: options.name,
		severity: options.severity,
		message: options.message,
		pid: options.pid ?? process.pid,
		...(metadata ? { metadata } : {}),
	});
}

function freezeMetadata(metadata: RecordMetadata): RecordMetadata {
	const copy: RecordMetadata = {};
	if (metadata.file !== undefined) copy.file = metadata.file;
	if (metadata.line !== undefined) copy.line = metadata.line;
	if (metadata.fn !== undefined) copy.fn = metadata.fn;
	if (metadata.extra !== undefined) copy.extra = Object.freeze({ ...metadata.extra });
	return Object.freeze(copy);
}

// ─── Validation ───────────────────────────────────────────────────────────────

/** Validation error */
export interface ValidationError {
	field: string;
	message: string;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateMetadata(value: unknown, errors: ValidationError[]): void {
	if (!isPlainObject(value)) {
		errors.push({ field: 'metadata', message: 'must be an object if present' });
		return;
	}
	if (value.file !== undefined && typeof value.file !== 'string') {
		errors.push({ field: 'metadata.file', message: 'must be a string if present' });
	}
	if (value.line !== undefined && !Number.isInteger(value.line)) {
		errors.push({ field: 'metadata.line', message: 'must be an integer if present' });
	}
	if (value.fn !== undefined && typeof value.fn !== 'string') {
		errors.push({ field: 'metadata.fn', message: 'must be a string if present' });
	}
	if (value.extra !== undefined) {
		const extra = value.extra;
		if (!isPlainObject(extra) || Object.values(extra).some((v) => typeof v !== 'string')) {
			errors.push({ field: 'metadata.extra', message: 'must be a map of strings if present' });
		}
	}
}

/**
 * Validate that a value has the shape of a LogRecord.
 * Returns an array of errors (empty if valid).
 */
export function validateRecord(value: unknown): ValidationError[] {
	const errors: ValidationError[] = [];
	if (!isPlainObject(value)) {
		errors.push({ field: 'record', message: 'must be an object' });
		return errors;
	}

	if (typeof value.timestamp !== 'number' || !Number.isFinite(value.timestamp)) {
		errors.push({ field: 'timestamp', message: 'must be a finite number' });
	}
	if (typeof value.name !== 'string' || value.name.length === 0) {
		errors.push({ field: 'name', message: 'must be a non-empty string' });
	}
	if (!isSeverity(value.severity)) {
		errors.push({ field: 'severity', message: 'must be a known severity' });
	}
	if (typeof value.message !== 'string') {
		errors.push({ field: 'message', message: 'must be a string' });
	}
	if (!Number.isInteger(value.pid)) {
		errors.push({ field: 'pid', message: 'must be an integer' });
	}
	if (value.metadata !== undefined) {
		validateMetadata(value.metadata, errors);
	}

	return errors;
}

export function isLogRecord(value: unknown): value is LogRecord {
	return validateRecord(value).length === 0;
}

// ─── Wire Format ──────────────────────────────────────────────────────────────

/**
 * Messages exchanged over a worker port or IPC channel.
 *
 * - `record` — producer → owner, one log record
 * - `end`    — producer → owner, the producer will send nothing more
 * - `closed` — owner → producer, the owner has stopped accepting records
 */
export type WireMessage =
	| { tributary: 'record'; record: LogRecord }
	| { tributary: 'end' }
	| { tributary: 'closed' };

/** True when a message carries the Tributary tag, well-formed or not */
export function isTributaryMessage(value: unknown): value is { tributary: unknown } {
	return isPlainObject(value) && 'tributary' in value;
}

/**
 * Parse an incoming wire message.
 * Returns null when the message is tagged but malformed.
 */
export function parseWireMessage(value: unknown): WireMessage | null {
	if (!isPlainObject(value)) return null;
	switch (value.tributary) {
		case 'record': {
			const record = value.record;
			return isLogRecord(record) ? { tributary: 'record', record } : null;
		}
		case 'end':
			return { tributary: 'end' };
		case 'closed':
			return { tributary: 'closed' };
		default:
			return null;
	}
}

export function recordMessage(record: LogRecord): WireMessage {
	return { tributary: 'record', record };
}
