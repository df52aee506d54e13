/**
 * Log record formatters
 *
 * A formatter renders one {@link LogRecord} into the message text shipped
 * to CloudWatch Logs.
 *
 * @module formatting
 */

import type { LogRecord } from '../types/record.js';

/**
 * Renders a log record to text.
 */
export interface Formatter {
  format(record: LogRecord): string;
}

/**
 * Pattern used when none is configured.
 */
export const DEFAULT_PATTERN = '{message}';

const PLACEHOLDER = /\{(timestamp|name|level|message|context)\}/g;

/**
 * Formatter driven by a pattern with `{placeholder}` fields.
 *
 * Supported placeholders:
 * - `{timestamp}`: creation time as ISO-8601
 * - `{name}`: logger name
 * - `{level}`: upper-cased level
 * - `{message}`: the record's message
 * - `{context}`: context fields as JSON, empty when there are none
 *
 * Anything else in the pattern, including unknown placeholders, is copied
 * verbatim.
 *
 * @example
 * ```typescript
 * const formatter = new PatternFormatter('{timestamp} - {name} - {level} - {message}');
 * formatter.format(createLogRecord('app', 'info', 'started'));
 * // '2024-01-15T10:00:00.000Z - app - INFO - started'
 * ```
 */
export class PatternFormatter implements Formatter {
  private readonly pattern: string;

  constructor(pattern: string = DEFAULT_PATTERN) {
    this.pattern = pattern;
  }

  format(record: LogRecord): string {
    return this.pattern.replace(PLACEHOLDER, (_match, field: string) => {
      switch (field) {
        case 'timestamp':
          return new Date(record.created).toISOString();
        case 'name':
          return record.name;
        case 'level':
          return record.level.toUpperCase();
        case 'message':
          return record.message;
        default:
          return record.context && Object.keys(record.context).length > 0
            ? JSON.stringify(record.context)
            : '';
      }
    });
  }
}

/**
 * Formatter producing one JSON object per record.
 *
 * Context fields are merged at the top level; they cannot override the
 * `timestamp`, `level`, `logger` and `message` keys.
 */
export class JsonFormatter implements Formatter {
  format(record: LogRecord): string {
    return JSON.stringify({
      ...record.context,
      timestamp: new Date(record.created).toISOString(),
      level: record.level,
      logger: record.name,
      message: record.message,
    });
  }
}
