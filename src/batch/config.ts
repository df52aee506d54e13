/**
 * CloudWatch Logs Batch Limits
 *
 * PutLogEvents constraints the buffer must respect. See the
 * PutLogEvents API reference for the service-side definitions.
 */

import { ConfigurationError } from '../error/index.js';

/** Maximum batch size in bytes: sum of UTF-8 message lengths plus per-event overhead */
export const MAX_BATCH_BYTES = 1_048_576;

/** Fixed overhead CloudWatch Logs adds to every event when sizing a batch */
export const PER_EVENT_OVERHEAD = 26;

/** Maximum number of events in one PutLogEvents call */
export const MAX_BATCH_COUNT = 10_000;

/** Events in one batch may not span more than 24 hours */
export const MAX_BATCH_SPAN_MS = 24 * 60 * 60 * 1000;

/** Buffer capacity used when none is configured */
export const DEFAULT_CAPACITY = 10;

/** Appended to messages cut down to fit in a batch */
export const DEFAULT_TRUNCATION_SUFFIX = ' ...';

/** Largest encoded message a single event may carry */
export const EVENT_BYTE_LIMIT = MAX_BATCH_BYTES - PER_EVENT_OVERHEAD;

/**
 * Limits applied to one buffer.
 */
export interface BatchLimits {
  /** Maximum number of buffered events */
  capacity: number;
  /** Maximum buffered bytes (messages plus overhead) */
  maxBytes: number;
  /** Maximum distance between the first and last buffered timestamps */
  maxSpanMs: number;
}

/**
 * Resolve the configured capacity.
 *
 * `undefined` and `0` fall back to {@link DEFAULT_CAPACITY}.
 *
 * @throws {ConfigurationError} if capacity is not an integer in [0, MAX_BATCH_COUNT]
 */
export function validateCapacity(capacity?: number): number {
  if (capacity === undefined) {
    return DEFAULT_CAPACITY;
  }
  if (!Number.isInteger(capacity) || capacity < 0 || capacity > MAX_BATCH_COUNT) {
    throw new ConfigurationError(`Maximum capacity not in range 0 ... ${MAX_BATCH_COUNT}: ${capacity}`);
  }
  return capacity === 0 ? DEFAULT_CAPACITY : capacity;
}

/**
 * Build the limits for a buffer of the given capacity.
 */
export function batchLimits(capacity: number): BatchLimits {
  return {
    capacity,
    maxBytes: MAX_BATCH_BYTES,
    maxSpanMs: MAX_BATCH_SPAN_MS,
  };
}
