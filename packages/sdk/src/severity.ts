/**
 * Severity ranking and parsing.
 */

import type { Severity } from './types.js';

/** Numeric rank of each severity; higher is more severe */
export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
	DEBUG: 10,
	INFO: 20,
	WARNING: 30,
	ERROR: 40,
	CRITICAL: 50,
};

/** All severities, lowest first */
export const SEVERITIES: readonly Severity[] = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'];

const ALIASES: Record<string, Severity> = {
	WARN: 'WARNING',
	FATAL: 'CRITICAL',
};

export function isSeverity(value: unknown): value is Severity {
	return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value);
}

/**
 * Parse a severity name case-insensitively.
 * Accepts `WARN` and `FATAL` as aliases. Returns null for anything else.
 */
export function parseSeverity(value: unknown): Severity | null {
	if (typeof value !== 'string') return null;
	const upper = value.trim().toUpperCase();
	if (isSeverity(upper)) return upper;
	return ALIASES[upper] ?? null;
}

/** True when `severity` is at or above `threshold` */
export function meetsThreshold(severity: Severity, threshold: Severity): boolean {
	return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}
