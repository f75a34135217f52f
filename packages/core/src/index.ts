/**
 * @tributary/core — routing, aggregation and the logger facade.
 */

export { Channel, type ChannelHost, type EmitResult, type EmitStatus } from './channel.js';
export { CollectorLoop, type CollectorState } from './collector.js';
export { HANDLER_TYPES, loadConfig, parseConfig } from './config.js';
export { createRegistry, Dispatcher, type DispatchStats } from './dispatcher.js';
export {
	DEFAULT_DRAIN_TIMEOUT_MS,
	type FacadeStats,
	LoggerFacade,
	type LoggerFacadeOptions,
	type WorkerFacadeOptions,
} from './facade.js';
export { type ErrorReporter, formatReport, guardReporter, stderrReporter } from './fallback.js';
export {
	DEFAULT_DATEFMT,
	DEFAULT_FORMAT,
	FormatError,
	type FormatterOptions,
	parseTemplate,
	RecordFormatter,
	templateFields,
} from './format.js';
export { withLogger } from './lifecycle.js';
export { resolveMode } from './mode.js';
export { normalizeCapacity, RecordQueue, type RecordSender, type SendResult } from './queue.js';
export { type ChannelNode, ChannelRegistry, normalizeChannelName, ROOT_CHANNEL } from './registry.js';
export { type BoundSink, buildSink, buildSinks, type BuildSinksOptions } from './sink-factory.js';
export {
	type ChannelHandle,
	ChannelHub,
	type ChildEndpoint,
	type HubStats,
	type IpcEndpoint,
	IpcSender,
	isMessagePort,
	PortSender,
	processChannel,
} from './transport.js';
