/**
 * CloudWatch Logs Event Types
 *
 * Wire shapes exchanged with the PutLogEvents API.
 */

/**
 * A single event in a PutLogEvents batch.
 */
export interface InputLogEvent {
  /** The time the event occurred, expressed as the number of milliseconds since Jan 1, 1970 00:00:00 UTC */
  timestamp: number;
  /** The formatted event message */
  message: string;
}

/**
 * Information about events the service refused in an otherwise successful call.
 *
 * Indices refer to positions in the submitted batch.
 */
export interface RejectedLogEventsInfo {
  /** Events from this index onwards were more than 2 hours in the future */
  tooNewLogEventStartIndex?: number;
  /** Events up to this index were older than 14 days */
  tooOldLogEventEndIndex?: number;
  /** Events up to this index were older than the group's retention period */
  expiredLogEventEndIndex?: number;
}
