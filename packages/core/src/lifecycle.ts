/**
 * Scoped facade lifetime.
 */

import type { TributaryConfig } from '@tributary/sdk';
import { LoggerFacade, type LoggerFacadeOptions } from './facade.js';

/**
 * Build a facade, run `fn` with it, and stop the facade however `fn` exits.
 * Resolves with `fn`'s result; a thrown error propagates after the stop.
 *
 *   await withLogger('logging.yaml', { useMultiprocess: true }, async (logger) => {
 *     await runWorkers(logger.getChannelHandleForWorkers());
 *   });
 */
export async function withLogger<T>(
	config: string | TributaryConfig,
	options: LoggerFacadeOptions,
	fn: (facade: LoggerFacade) => Promise<T> | T,
): Promise<T> {
	const facade =
		typeof config === 'string' ? await LoggerFacade.create(config, options) : LoggerFacade.fromConfig(config, options);
	try {
		return await fn(facade);
	} finally {
		await facade.stop();
	}
}
