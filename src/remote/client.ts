/**
 * Remote Stream Client
 *
 * The narrow set of CloudWatch Logs capabilities the handler depends on.
 * Implementations own the transport; they hold no buffering logic.
 *
 * @module remote/client
 */

import type { RemoteStatus } from '../error/index.js';
import type { InputLogEvent, RejectedLogEventsInfo } from '../types/logEvent.js';
import type { LogGroupDescriptor } from '../types/logGroup.js';
import type { LogStreamDescriptor } from '../types/logStream.js';

/**
 * One page of a prefix listing.
 */
export interface Page<T> {
  /** Entries on this page; prefix matches, not only exact ones */
  items: T[];
  /** Token for the next page, absent on the last page */
  nextToken?: string;
}

/**
 * Response of an append (PutLogEvents) call.
 */
export interface AppendResponse {
  /** HTTP-style status code */
  statusCode?: number;
  /** Request ID for tracking */
  requestId?: string;
  /** Token for the next append to this stream */
  nextSequenceToken?: string;
  /** Events refused by the service even though the call succeeded */
  rejectedLogEventsInfo?: RejectedLogEventsInfo;
}

/**
 * Remote Stream Client interface.
 *
 * Create and retention calls report client-side failures through the
 * returned {@link RemoteStatus}; transport failures reject the promise.
 */
export interface RemoteStreamClient {
  /**
   * List log groups whose name starts with `prefix`.
   *
   * @param prefix - Log group name prefix
   * @param pageToken - Token from the previous page
   */
  listGroupsByPrefix(prefix: string, pageToken?: string): Promise<Page<LogGroupDescriptor>>;

  /**
   * Create a log group.
   */
  createGroup(name: string): Promise<RemoteStatus>;

  /**
   * Set the retention policy of a log group.
   */
  setRetention(name: string, days: number): Promise<RemoteStatus>;

  /**
   * List log streams of `group` whose name starts with `prefix`.
   *
   * @param group - Parent log group
   * @param prefix - Log stream name prefix
   * @param pageToken - Token from the previous page
   */
  listStreamsByPrefix(
    group: string,
    prefix: string,
    pageToken?: string
  ): Promise<Page<LogStreamDescriptor>>;

  /**
   * Create a log stream in `group`.
   */
  createStream(group: string, name: string): Promise<RemoteStatus>;

  /**
   * Append a batch of events to a stream.
   *
   * @param group - Log group name
   * @param stream - Log stream name
   * @param events - Events in chronological order
   * @param token - Sequence token of the stream's last accepted write
   * @returns The service response, or undefined if it returned nothing
   */
  append(
    group: string,
    stream: string,
    events: InputLogEvent[],
    token: string
  ): Promise<AppendResponse | undefined>;

  /**
   * Release transport resources.
   */
  close(): Promise<void>;
}

/**
 * Whether an append response carries any rejection detail.
 */
export function hasRejectedEvents(response: AppendResponse): boolean {
  const info = response.rejectedLogEventsInfo;
  return (
    info !== undefined &&
    Object.values(info).some((index) => index !== undefined && index !== null)
  );
}

/**
 * Whether an append response carries no fields at all.
 */
export function isEmptyResponse(response: AppendResponse): boolean {
  return Object.keys(response).length === 0;
}
