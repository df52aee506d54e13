/**
 * CloudWatch Logs Handler Types
 *
 * @module types
 */

export type { InputLogEvent, RejectedLogEventsInfo } from './logEvent.js';
export type { LogGroupDescriptor } from './logGroup.js';
export type { LogStreamDescriptor } from './logStream.js';
export type { RetentionDays } from './retention.js';
export { VALID_RETENTION_DAYS, isRetentionDays } from './retention.js';
export type { LogLevel, LogRecord } from './record.js';
export { LOG_LEVELS, LOG_LEVEL_PRIORITY, createLogRecord, isLevelEnabled } from './record.js';
