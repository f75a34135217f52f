/**
 * @tributary/sdk — contracts shared by the core and every sink package.
 */

export * from './errors.js';
export * from './record.js';
export * from './severity.js';
export type { Sink, SinkBuildOptions } from './sink.js';
export * from './testing.js';
export * from './time.js';
export type * from './types.js';
