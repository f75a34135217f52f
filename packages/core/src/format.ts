/**
 * Record formatting — printf-style templates over record fields.
 *
 *   %(asctime)s - %(name)s - %(levelname)-8s - %(message)s
 */

import { basename } from 'node:path';
import { type LogRecord, SEVERITY_RANK, TributaryError, strftime } from '@tributary/sdk';

export const DEFAULT_FORMAT = '%(asctime)s - %(name)s - %(levelname)s - %(message)s';
export const DEFAULT_DATEFMT = '%Y-%m-%d %H:%M:%S';

type Conversion = 's' | 'd' | 'f' | 'r';

interface Directive {
	field: string;
	flags: string;
	width: number | undefined;
	precision: number | undefined;
	conversion: Conversion;
}

type Part = string | Directive;

const DIRECTIVE_RE = /%(?:\((\w+)\)([-#0 +]*)(\d+)?(?:\.(\d+))?([sdfr])|%)/g;

export class FormatError extends TributaryError {
	constructor(message: string) {
		super('FORMAT', message);
		this.name = 'FormatError';
	}
}

/**
 * Split a template into literal text and directives.
 * A `%` that starts no directive is an error.
 */
export function parseTemplate(template: string): Part[] {
	const parts: Part[] = [];
	let literal = '';
	let last = 0;

	for (const match of template.matchAll(DIRECTIVE_RE)) {
		const index = match.index ?? 0;
		literal += literalSegment(template, last, index);
		last = index + match[0].length;

		if (match[0] === '%%') {
			literal += '%';
			continue;
		}
		if (literal) parts.push(literal);
		literal = '';
		parts.push({
			field: match[1] ?? '',
			flags: match[2] ?? '',
			width: match[3] === undefined ? undefined : Number(match[3]),
			precision: match[4] === undefined ? undefined : Number(match[4]),
			conversion: toConversion(match[5]),
		});
	}

	literal += literalSegment(template, last, template.length);
	if (literal) parts.push(literal);
	return parts;
}

function literalSegment(template: string, start: number, end: number): string {
	const text = template.slice(start, end);
	if (text.includes('%')) {
		throw new FormatError(`invalid format directive at offset ${start + text.indexOf('%')} in "${template}"`);
	}
	return text;
}

function toConversion(value: string | undefined): Conversion {
	switch (value) {
		case 'd':
		case 'f':
		case 'r':
			return value;
		default:
			return 's';
	}
}

/** Names referenced by a template, in order of appearance */
export function templateFields(template: string): string[] {
	return parseTemplate(template).flatMap((part) => (typeof part === 'string' ? [] : [part.field]));
}

// ─── Formatter ────────────────────────────────────────────────────────────────

export interface FormatterOptions {
	/** strftime pattern for `asctime` */
	datefmt?: string;
	/** Render `asctime` in UTC instead of local time */
	utc?: boolean;
}

/**
 * Renders records with a compiled template.
 *
 * Fields outside the standard set are looked up in `metadata.extra`;
 * a field the record does not carry renders as an empty string.
 */
export class RecordFormatter {
	readonly template: string;
	readonly datefmt: string;
	readonly utc: boolean;
	private readonly parts: Part[];

	constructor(template: string = DEFAULT_FORMAT, options: FormatterOptions = {}) {
		this.template = template;
		this.datefmt = options.datefmt ?? DEFAULT_DATEFMT;
		this.utc = options.utc ?? false;
		this.parts = parseTemplate(template);
	}

	format(record: LogRecord): string {
		let out = '';
		for (const part of this.parts) {
			out += typeof part === 'string' ? part : renderDirective(part, this.fieldValue(record, part.field));
		}
		return out;
	}

	private fieldValue(record: LogRecord, field: string): string | number {
		switch (field) {
			case 'name':
				return record.name;
			case 'levelname':
				return record.severity;
			case 'levelno':
				return SEVERITY_RANK[record.severity];
			case 'message':
				return record.message;
			case 'asctime':
				return strftime(this.datefmt, new Date(record.timestamp), this.utc);
			case 'created':
				return record.timestamp / 1000;
			case 'msecs':
				return record.timestamp % 1000;
			case 'process':
				return record.pid;
			case 'pathname':
				return record.metadata?.file ?? '(unknown file)';
			case 'filename':
				return record.metadata?.file === undefined ? '(unknown file)' : basename(record.metadata.file);
			case 'lineno':
				return record.metadata?.line ?? 0;
			case 'funcName':
				return record.metadata?.fn ?? '(unknown function)';
			default: {
				const extra = record.metadata?.extra;
				return extra !== undefined && Object.hasOwn(extra, field) ? extra[field] : '';
			}
		}
	}
}

// ─── Directive rendering ──────────────────────────────────────────────────────

function renderDirective(directive: Directive, value: string | number): string {
	switch (directive.conversion) {
		case 's': {
			const text = String(value);
			return pad(directive.precision === undefined ? text : text.slice(0, directive.precision), directive, false);
		}
		case 'r': {
			const text = typeof value === 'string' ? `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'` : String(value);
			return pad(directive.precision === undefined ? text : text.slice(0, directive.precision), directive, false);
		}
		case 'd': {
			const num = toNumber(value);
			return pad(signed(Number.isFinite(num) ? Math.trunc(num).toString() : String(num), num, directive), directive, true);
		}
		case 'f': {
			const num = toNumber(value);
			return pad(signed(num.toFixed(directive.precision ?? 6), num, directive), directive, true);
		}
	}
}

function toNumber(value: string | number): number {
	return typeof value === 'number' ? value : Number(value);
}

function signed(text: string, num: number, directive: Directive): string {
	if (num < 0) return text;
	if (directive.flags.includes('+')) return `+${text}`;
	if (directive.flags.includes(' ')) return ` ${text}`;
	return text;
}

function pad(text: string, directive: Directive, numeric: boolean): string {
	const width = directive.width ?? 0;
	if (text.length >= width) return text;
	if (directive.flags.includes('-')) return text.padEnd(width);
	if (numeric && directive.flags.includes('0')) {
		const sign = /^[-+ ]/.test(text) ? text.charAt(0) : '';
		return sign + text.slice(sign.length).padStart(width - sign.length, '0');
	}
	return text.padStart(width);
}
