/**
 * Test harness for sink authors and facade users.
 */

import { type BuildRecordOptions, buildRecord } from './record.js';
import type { Sink } from './sink.js';
import type { LogRecord, Severity } from './types.js';

// ─── Mock Sink ────────────────────────────────────────────────────────────────

/**
 * Mock sink for testing.
 * Records every written line for assertion.
 */
export class MockSink implements Sink {
	readonly kind = 'custom';
	readonly lines: Array<{ line: string; severity: Severity }> = [];
	closeCount = 0;
	private failure: Error | null = null;

	/** Make subsequent writes throw the given error (null to recover) */
	setFailure(error: Error | null): void {
		this.failure = error;
	}

	write(line: string, severity: Severity): void {
		if (this.failure) throw this.failure;
		this.lines.push({ line, severity });
	}

	close(): void {
		this.closeCount++;
	}

	/** Written lines without severities */
	get written(): string[] {
		return this.lines.map((l) => l.line);
	}
}

// ─── Test Record Factory ──────────────────────────────────────────────────────

/**
 * Create a test record with sensible defaults.
 */
export function createTestRecord(overrides?: Partial<BuildRecordOptions>): LogRecord {
	return buildRecord({
		name: 'test',
		severity: 'INFO',
		message: 'test message',
		timestamp: Date.UTC(2024, 0, 15, 10, 30, 45, 123),
		pid: 4242,
		...overrides,
	});
}
