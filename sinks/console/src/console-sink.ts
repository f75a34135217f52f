/**
 * Console sink — writes formatted lines to stderr (default) or stdout.
 *
 * The stream belongs to the process, so close() leaves it open.
 */

import type { ConsoleSinkConfig, Severity, Sink } from '@tributary/sdk';
import chalk from 'chalk';

function colorize(line: string, severity: Severity): string {
	switch (severity) {
		case 'DEBUG':
			return chalk.dim(line);
		case 'WARNING':
			return chalk.yellow(line);
		case 'ERROR':
			return chalk.red(line);
		case 'CRITICAL':
			return chalk.bold.red(line);
		default:
			return line;
	}
}

export class ConsoleSink implements Sink {
	readonly kind = 'console';
	private readonly stream: 'stdout' | 'stderr';
	private readonly useColor: boolean;

	constructor(config: Pick<ConsoleSinkConfig, 'stream' | 'color'>) {
		this.stream = config.stream;
		this.useColor = config.color;
	}

	write(line: string, severity: Severity): void {
		const text = this.useColor ? colorize(line, severity) : line;
		process[this.stream].write(`${text}\n`);
	}

	close(): void {
		// Stream is not owned
	}
}
