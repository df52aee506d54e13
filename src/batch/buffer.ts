/**
 * CloudWatch Logs Event Buffer
 *
 * Accumulates events for one log stream in emission order and tracks the
 * batch-accounted byte total.
 */

import type { InputLogEvent } from '../types/logEvent.js';
import type { BatchLimits } from './config.js';

/**
 * Why the buffer has to be flushed before an event can be appended.
 *
 * - `capacity`: the event count would exceed the configured capacity
 * - `bytes`: the byte total would exceed the batch size limit
 * - `out-of-order`: the event is older than the last buffered one
 * - `span`: the batch would span more than the allowed time window
 */
export type FlushReason = 'capacity' | 'bytes' | 'out-of-order' | 'span';

/**
 * Batch buffer metrics.
 */
export interface BatchMetrics {
  /** Number of events currently buffered */
  eventsBuffered: number;
  /** Number of bytes currently buffered */
  bytesBuffered: number;
  /** Number of flushes completed successfully */
  flushesCompleted: number;
  /** Number of flushes that failed */
  flushesFailed: number;
  /** Number of events accepted by the service */
  eventsDelivered: number;
  /** Number of events discarded after a rejection */
  eventsDropped: number;
}

/**
 * Ordered event buffer for a single PutLogEvents batch.
 *
 * Events are never reordered: an event that would break the chronological
 * order of the batch is reported as a flush reason instead.
 */
export class EventBuffer {
  private readonly limits: BatchLimits;
  private buffered: InputLogEvent[];
  private size: number;

  /**
   * Creates a new event buffer.
   * @param limits - Count, byte and time-span limits of one batch
   */
  constructor(limits: BatchLimits) {
    this.limits = limits;
    this.buffered = [];
    this.size = 0;
  }

  /** Number of buffered events */
  get count(): number {
    return this.buffered.length;
  }

  /** Buffered bytes, messages plus per-event overhead */
  get bytes(): number {
    return this.size;
  }

  /** Buffered events in emission order */
  get events(): readonly InputLogEvent[] {
    return [...this.buffered];
  }

  isEmpty(): boolean {
    return this.buffered.length === 0;
  }

  /**
   * Check whether an event can join the current batch.
   *
   * @param event - Event about to be appended
   * @param size - Its batch-accounted size
   * @returns The first limit the append would break, or undefined if it fits
   */
  flushReasonFor(event: InputLogEvent, size: number): FlushReason | undefined {
    if (this.buffered.length === 0) {
      return undefined;
    }

    if (this.buffered.length + 1 > this.limits.capacity) {
      return 'capacity';
    }
    if (this.size + size > this.limits.maxBytes) {
      return 'bytes';
    }

    const first = this.buffered[0];
    const last = this.buffered[this.buffered.length - 1];
    if (event.timestamp < last.timestamp) {
      return 'out-of-order';
    }
    if (event.timestamp - first.timestamp > this.limits.maxSpanMs) {
      return 'span';
    }

    return undefined;
  }

  /**
   * Adds an event to the end of the buffer.
   */
  append(event: InputLogEvent, size: number): void {
    this.buffered.push(event);
    this.size += size;
  }

  /**
   * Drops every buffered event and resets the byte total.
   */
  clear(): void {
    this.buffered = [];
    this.size = 0;
  }
}
