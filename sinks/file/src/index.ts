/**
 * @tributary/sink-file — file, size-rotating and time-rotating sinks.
 */

export { assertTargetDirectory, FileSink, type FileTargetConfig } from './file-sink.js';
export {
	backupSuffixPattern,
	backupSuffixRegex,
	computeRollover,
	rotationIntervalMs,
} from './rotation.js';
export { SizeRotatingFileSink } from './size-rotating-sink.js';
export { TimeRotatingFileSink } from './time-rotating-sink.js';
