/**
 * CloudWatch Logs Handler
 *
 * A logging sink that batches log records into AWS CloudWatch Logs streams.
 *
 * ## Features
 *
 * - **Batching**: Records are buffered and sent in PutLogEvents batches that
 *   respect the service's count, size, ordering and time-span limits
 * - **Provisioning**: Log groups and streams are created on demand, with an
 *   optional retention policy for new groups
 * - **Daily Streams**: Without a fixed stream name, records go to a stream
 *   named after the current date (YYYY-MM-DD)
 * - **Truncation**: Oversized messages are cut at a character boundary
 *
 * ## Quick Start
 *
 * ```typescript
 * import { CloudWatchLogsHandler, JsonFormatter, createLogRecord } from 'cloudwatch-logs-handler';
 *
 * const handler = await CloudWatchLogsHandler.create({
 *   logGroup: '/my-app/api',
 *   retainDays: 30,
 *   formatter: new JsonFormatter(),
 *   aws: { region: 'us-east-1' },
 * });
 *
 * await handler.emit(createLogRecord('api', 'info', 'Request received', { path: '/users' }));
 * await handler.close();
 * ```
 *
 * Flushes happen only when the next record would break a batch limit, on
 * `flush()` and on `close()`. Failures are never retried internally.
 *
 * @module cloudwatch-logs-handler
 */

// ============================================================================
// Handler
// ============================================================================

export { CloudWatchLogsHandler, dailyStreamName } from './handler/index.js';
export type { LogSink } from './handler/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  HandlerConfigBuilder,
  DEFAULT_CONFIG,
  configBuilder,
  resolveHandlerConfig,
  validateLogGroupName,
  validateLogStreamName,
} from './config/index.js';

export type { HandlerConfig, HandlerOptions, RejectPolicy } from './config/index.js';

// ============================================================================
// Formatting
// ============================================================================

export { PatternFormatter, JsonFormatter, DEFAULT_PATTERN } from './formatting/index.js';
export type { Formatter } from './formatting/index.js';

// ============================================================================
// Types
// ============================================================================

export type {
  InputLogEvent,
  RejectedLogEventsInfo,
  LogGroupDescriptor,
  LogStreamDescriptor,
  RetentionDays,
  LogLevel,
  LogRecord,
} from './types/index.js';

export {
  VALID_RETENTION_DAYS,
  isRetentionDays,
  LOG_LEVELS,
  LOG_LEVEL_PRIORITY,
  createLogRecord,
  isLevelEnabled,
} from './types/index.js';

// ============================================================================
// Batching
// ============================================================================

export {
  MAX_BATCH_BYTES,
  MAX_BATCH_COUNT,
  MAX_BATCH_SPAN_MS,
  PER_EVENT_OVERHEAD,
  DEFAULT_CAPACITY,
  DEFAULT_TRUNCATION_SUFFIX,
  EVENT_BYTE_LIMIT,
  EventBuffer,
  formatEvent,
  validateCapacity,
  batchLimits,
} from './batch/index.js';

export type { BatchLimits, BatchMetrics, FlushReason, FormattedEvent } from './batch/index.js';

// ============================================================================
// Remote Client
// ============================================================================

export {
  SdkRemoteStreamClient,
  buildSdkClientConfig,
  clientFaultStatus,
  hasRejectedEvents,
  isEmptyResponse,
  INITIAL_SEQUENCE_TOKEN,
  ensureGroup,
  ensureStream,
  findGroup,
  findStream,
  listGroups,
  listStreams,
} from './remote/index.js';

export type {
  AppendResponse,
  Page,
  RemoteStreamClient,
  GroupEnsureResult,
  StreamCursor,
  SdkClientOptions,
  SdkCredentials,
} from './remote/index.js';

// ============================================================================
// Error Types
// ============================================================================

export {
  LogsHandlerError,
  ConfigurationError,
  ProvisioningError,
  DeliveryError,
  HandlerClosedError,
  isClientError,
  isAlreadyExists,
} from './error/index.js';

export type {
  LogsHandlerErrorCode,
  RemoteStatus,
  ProvisioningOperation,
  DeliveryFailureReason,
} from './error/index.js';

// ============================================================================
// Observability
// ============================================================================

export { ConsoleLogger, NoopLogger, formatDiagnostic } from './observability/index.js';
export type { Logger, DiagnosticLevel, DiagnosticContext } from './observability/index.js';
