/**
 * CloudWatch Logs Group Types
 */

/**
 * A log group as reported by a prefix listing.
 */
export interface LogGroupDescriptor {
  /** The name of the log group */
  logGroupName?: string;
  /** The number of days to retain the log events in the log group */
  retentionInDays?: number;
}
