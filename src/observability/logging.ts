/**
 * Diagnostics for the handler itself: group and stream provisioning,
 * batch limits being hit, delivered batches, and client release failures.
 *
 * These never go to CloudWatch Logs. They are off unless a logger is
 * passed in the options or CLOUDWATCH_LOGS_HANDLER_DEBUG names a level.
 */

import { LOG_LEVEL_PRIORITY, type LogLevel } from '../types/record.js';

export type DiagnosticLevel = Exclude<LogLevel, 'fatal'>;

export type DiagnosticContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: DiagnosticContext): void;
  warn(message: string, context?: DiagnosticContext): void;
  info(message: string, context?: DiagnosticContext): void;
  debug(message: string, context?: DiagnosticContext): void;
  trace(message: string, context?: DiagnosticContext): void;
}

const CONSOLE_METHOD: Record<DiagnosticLevel, 'error' | 'warn' | 'log' | 'debug'> = {
  error: 'error',
  warn: 'warn',
  info: 'log',
  debug: 'debug',
  trace: 'debug',
};

/**
 * Render one diagnostic line.
 *
 * @example
 * formatDiagnostic('info', 'Log group created', { logGroup: 'app' }, new Date(0))
 * // '[1970-01-01T00:00:00.000Z] [INFO] Log group created {"logGroup":"app"}'
 */
export function formatDiagnostic(
  level: DiagnosticLevel,
  message: string,
  context: DiagnosticContext | undefined,
  at: Date
): string {
  const suffix = context ? ` ${JSON.stringify(context)}` : '';
  return `[${at.toISOString()}] [${level.toUpperCase()}] ${message}${suffix}`;
}

/**
 * Writes diagnostics to the console at or above `minLevel`.
 */
export class ConsoleLogger implements Logger {
  readonly minLevel: DiagnosticLevel;

  constructor(minLevel: DiagnosticLevel = 'info') {
    this.minLevel = minLevel;
  }

  isEnabled(level: DiagnosticLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
  }

  error(message: string, context?: DiagnosticContext): void {
    this.write('error', message, context);
  }

  warn(message: string, context?: DiagnosticContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: DiagnosticContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: DiagnosticContext): void {
    this.write('debug', message, context);
  }

  trace(message: string, context?: DiagnosticContext): void {
    this.write('trace', message, context);
  }

  private write(level: DiagnosticLevel, message: string, context?: DiagnosticContext): void {
    if (this.isEnabled(level)) {
      console[CONSOLE_METHOD[level]](formatDiagnostic(level, message, context, new Date()));
    }
  }
}

/**
 * Discards every diagnostic.
 */
export class NoopLogger implements Logger {
  error(): void {}
  warn(): void {}
  info(): void {}
  debug(): void {}
  trace(): void {}
}
