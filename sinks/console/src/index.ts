/**
 * @tributary/sink-console — console sink entry point.
 */

export { ConsoleSink } from './console-sink.js';
