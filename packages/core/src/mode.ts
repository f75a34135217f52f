/**
 * Operating-mode resolution.
 */

import type { OperatingMode } from '@tributary/sdk';

/**
 * Decide how a facade routes records.
 *
 * Precedence:
 * 1. multi-process not requested → `standalone` (a supplied channel is ignored)
 * 2. requested, no channel       → `aggregation-owner`
 * 3. requested, channel supplied → `worker`
 */
export function resolveMode(wantsMultiprocess: boolean, suppliedChannel?: unknown): OperatingMode {
	if (!wantsMultiprocess) return 'standalone';
	if (suppliedChannel === undefined || suppliedChannel === null) return 'aggregation-owner';
	return 'worker';
}
