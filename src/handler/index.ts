/**
 * CloudWatch Logs Handler Module
 *
 * @module handler
 */

export { CloudWatchLogsHandler, dailyStreamName } from './handler.js';
export type { LogSink } from './sink.js';
