export type { Sink } from './sink.js';
export { ConsoleSink } from './console-sink.js';
export { StoreSink } from './store-sink.js';
export { MultiChannelFileSink, SYSTEM_LOG_NAME, UNKNOWN_CHANNEL_PREFIX } from './file-sink.js';
export type { MultiChannelFileSinkOptions } from './file-sink.js';
export { DailyLogFile, SizeRotatedLogFile, DEFAULT_ROTATE_LENGTH, dayKey } from './log-file.js';
export type { LogFile, SizeRotationOptions } from './log-file.js';
export { BufferedSink, DEFAULT_FLUSH_INTERVAL_MS } from './buffered-sink.js';
export type { BufferedSinkOptions } from './buffered-sink.js';
