/**
 * CloudWatch Logs Batch Module
 *
 * Event sizing, truncation and size-bounded buffering for PutLogEvents.
 */

export {
  MAX_BATCH_BYTES,
  MAX_BATCH_COUNT,
  MAX_BATCH_SPAN_MS,
  PER_EVENT_OVERHEAD,
  DEFAULT_CAPACITY,
  DEFAULT_TRUNCATION_SUFFIX,
  EVENT_BYTE_LIMIT,
  validateCapacity,
  batchLimits,
} from './config.js';
export type { BatchLimits } from './config.js';
export { EventBuffer } from './buffer.js';
export type { BatchMetrics, FlushReason } from './buffer.js';
export { formatEvent } from './format.js';
export type { FormattedEvent } from './format.js';
