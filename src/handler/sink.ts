/**
 * Log sink contract.
 *
 * Anything a logging pipeline can hand records to.
 */

import type { LogRecord } from '../types/record.js';

export interface LogSink {
  /**
   * Accept one record. May deliver earlier records first.
   */
  emit(record: LogRecord): Promise<void>;

  /**
   * Deliver every accepted record.
   */
  flush(): Promise<void>;

  /**
   * Deliver what is left and release resources.
   */
  close(): Promise<void>;
}
