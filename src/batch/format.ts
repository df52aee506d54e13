/**
 * Log record to CloudWatch Logs event conversion.
 */

import { ConfigurationError } from '../error/index.js';
import type { Formatter } from '../formatting/formatter.js';
import type { InputLogEvent } from '../types/logEvent.js';
import type { LogRecord } from '../types/record.js';
import { DEFAULT_TRUNCATION_SUFFIX, EVENT_BYTE_LIMIT, PER_EVENT_OVERHEAD } from './config.js';

/**
 * A formatted event together with its batch-accounted size.
 */
export interface FormattedEvent {
  /** Encoded message length plus {@link PER_EVENT_OVERHEAD} */
  size: number;
  event: InputLogEvent;
}

/**
 * Length of the longest prefix of UTF-8 `bytes` not exceeding `limit`
 * that ends on a character boundary.
 */
function boundaryAt(bytes: Buffer, limit: number): number {
  let end = Math.max(0, Math.min(limit, bytes.length));
  // A continuation byte right after the cut means a character straddles it
  while (end > 0 && end < bytes.length && (bytes[end] & 0xc0) === 0x80) {
    end--;
  }
  return end;
}

/**
 * Format a log record as a CloudWatch Logs event.
 *
 * Messages whose encoded form exceeds the per-event byte limit are cut
 * and `suffix` is appended, so the result including the suffix always
 * fits. The record's creation time becomes the event timestamp.
 *
 * @param record - Log record
 * @param formatter - Renders the record to text
 * @param suffix - Appended to truncated messages
 * @param encoding - Encoding used to measure and cut the message; CloudWatch
 *   Logs sizes batches in UTF-8, so nothing else is accepted
 * @throws {ConfigurationError} for any encoding other than UTF-8
 */
export function formatEvent(
  record: LogRecord,
  formatter: Formatter,
  suffix: string = DEFAULT_TRUNCATION_SUFFIX,
  encoding: BufferEncoding = 'utf8'
): FormattedEvent {
  if (encoding !== 'utf8' && encoding !== 'utf-8') {
    throw new ConfigurationError(
      `Unsupported event encoding "${encoding}": CloudWatch Logs events are UTF-8`
    );
  }

  let encoded = Buffer.from(formatter.format(record), encoding);

  if (encoded.length > EVENT_BYTE_LIMIT) {
    const suffixBytes = Buffer.from(suffix, encoding);
    const keep = boundaryAt(encoded, EVENT_BYTE_LIMIT - suffixBytes.length);
    encoded = Buffer.concat([encoded.subarray(0, keep), suffixBytes]);
  }

  return {
    size: encoded.length + PER_EVENT_OVERHEAD,
    event: {
      timestamp: Math.floor(record.created),
      message: encoded.toString(encoding),
    },
  };
}
