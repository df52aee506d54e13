/**
 * Log Record Types
 *
 * The records an application hands to the handler, before formatting.
 */

/**
 * Log level enumeration.
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = [
  'trace',
  'debug',
  'info',
  'warn',
  'error',
  'fatal',
];

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

/**
 * One log record emitted by application code.
 */
export interface LogRecord {
  /** Name of the logger that produced the record */
  name: string;
  /** Severity */
  level: LogLevel;
  /** Unformatted message */
  message: string;
  /** Creation time in milliseconds since epoch (fractional values allowed) */
  created: number;
  /** Additional structured fields */
  context?: Record<string, unknown>;
}

/**
 * Create a log record stamped with the current time.
 */
export function createLogRecord(
  name: string,
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>,
  created: number = Date.now()
): LogRecord {
  return context ? { name, level, message, created, context } : { name, level, message, created };
}

/**
 * Whether a record at `level` passes a `threshold`.
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[threshold];
}
