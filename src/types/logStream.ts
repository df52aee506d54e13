/**
 * CloudWatch Logs Stream Types
 */

/**
 * A log stream as reported by a prefix listing.
 */
export interface LogStreamDescriptor {
  /** The name of the log stream */
  logStreamName?: string;
  /**
   * The token the next PutLogEvents call must present.
   * Absent for streams that never received an event.
   */
  uploadSequenceToken?: string;
}
