/**
 * Fallback reporter — where Tributary's own diagnostics go.
 *
 * The library never logs through itself: a failing sink would otherwise
 * report its failure back into the sink that failed.
 */

import { ChannelFullError, SinkConstructionError, TributaryError } from '@tributary/sdk';
import chalk from 'chalk';

export type ErrorReporter = (error: TributaryError) => void;

/** Drops and construction failures are warnings; everything else is an error */
export function isWarning(error: TributaryError): boolean {
	return error instanceof ChannelFullError || error instanceof SinkConstructionError;
}

export function formatReport(error: TributaryError): string {
	const prefix = isWarning(error) ? chalk.yellow('!') : chalk.red('✗');
	const cause = error.cause instanceof Error ? chalk.dim(` (${error.cause.message})`) : '';
	return `${prefix} tributary: ${error.message}${cause}`;
}

/** Default reporter: one styled line per problem on stderr */
export const stderrReporter: ErrorReporter = (error) => {
	process.stderr.write(`${formatReport(error)}\n`);
};

/**
 * Wrap a reporter so a throwing reporter cannot break the caller.
 * A reporter that throws falls back to stderr.
 */
export function guardReporter(reporter: ErrorReporter): ErrorReporter {
	return (error) => {
		try {
			reporter(error);
		} catch (err) {
			stderrReporter(error);
			stderrReporter(new TributaryError('REPORTER', 'error reporter threw', { cause: err }));
		}
	};
}
