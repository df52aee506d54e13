/**
 * CloudWatch Logs Handler Error Types
 *
 * Every failure the handler raises itself is a {@link LogsHandlerError}.
 * Transport failures (network, credentials, server faults) are passed
 * through untouched.
 *
 * @module error
 */

import type { RejectedLogEventsInfo } from '../types/logEvent.js';

/**
 * Handler error codes.
 */
export type LogsHandlerErrorCode =
  | 'CONFIGURATION' // Invalid handler options
  | 'PROVISIONING' // Group/stream creation or retention call refused
  | 'DELIVERY' // PutLogEvents rejected events or returned nothing
  | 'CLOSED'; // Operation on a closed handler

/**
 * Outcome of a provisioning call as reported by the remote service.
 */
export interface RemoteStatus {
  /** HTTP-style status code */
  statusCode: number;
  /** Service error code (e.g. "ResourceAlreadyExistsException") */
  errorCode?: string;
  /** Service error message */
  message?: string;
  /** Request ID for tracking */
  requestId?: string;
}

/**
 * Provisioning operations that can be refused.
 */
export type ProvisioningOperation = 'createGroup' | 'setRetention' | 'createStream';

/**
 * Base handler error class.
 *
 * @example
 * ```typescript
 * try {
 *   await handler.flush();
 * } catch (error) {
 *   if (error instanceof LogsHandlerError && error.code === 'DELIVERY') {
 *     // inspect handler.getMetrics() and retry later
 *   }
 * }
 * ```
 */
export class LogsHandlerError extends Error {
  /**
   * Error code identifying the error type.
   */
  public readonly code: LogsHandlerErrorCode;

  constructor(message: string, code: LogsHandlerErrorCode) {
    super(message);
    this.name = 'LogsHandlerError';
    this.code = code;

    // Maintain proper stack trace in V8 engines
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get error code from an error.
   *
   * @param error - Error to extract code from
   * @returns Error code, or undefined for errors not raised by the handler
   */
  static getCode(error: unknown): LogsHandlerErrorCode | undefined {
    if (error instanceof LogsHandlerError) {
      return error.code;
    }
    return undefined;
  }

  /**
   * Convert error to a plain object for serialization.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
    };
  }
}

/**
 * Invalid handler options. Raised before any remote call is made.
 */
export class ConfigurationError extends LogsHandlerError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}

/**
 * A group/stream creation or retention call reported a client error.
 */
export class ProvisioningError extends LogsHandlerError {
  public readonly operation: ProvisioningOperation;
  public readonly status: RemoteStatus;

  constructor(operation: ProvisioningOperation, target: string, status: RemoteStatus) {
    const detail = status.errorCode
      ? `${status.errorCode}: ${status.message ?? 'no message'}`
      : status.message ?? 'no message';
    super(`${operation} failed for ${target} (HTTP ${status.statusCode}): ${detail}`, 'PROVISIONING');
    this.name = 'ProvisioningError';
    this.operation = operation;
    this.status = status;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      operation: this.operation,
      status: this.status,
    };
  }
}

/**
 * Why a batch was not delivered.
 */
export type DeliveryFailureReason = 'rejected' | 'empty-response';

/**
 * PutLogEvents rejected events or returned an empty response.
 *
 * Whether the batch is still buffered depends on the handler's
 * reject policy; an empty response always leaves it buffered.
 */
export class DeliveryError extends LogsHandlerError {
  public readonly reason: DeliveryFailureReason;
  public readonly eventCount: number;
  public readonly rejectedLogEventsInfo?: RejectedLogEventsInfo;

  constructor(
    reason: DeliveryFailureReason,
    eventCount: number,
    rejectedLogEventsInfo?: RejectedLogEventsInfo
  ) {
    const message =
      reason === 'rejected'
        ? `These events are rejected: ${JSON.stringify(rejectedLogEventsInfo ?? {})}`
        : 'CloudWatch Logs API call response is empty';
    super(message, 'DELIVERY');
    this.name = 'DeliveryError';
    this.reason = reason;
    this.eventCount = eventCount;
    this.rejectedLogEventsInfo = rejectedLogEventsInfo;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      reason: this.reason,
      eventCount: this.eventCount,
      rejectedLogEventsInfo: this.rejectedLogEventsInfo,
    };
  }
}

/**
 * The handler was closed before the operation was requested.
 */
export class HandlerClosedError extends LogsHandlerError {
  constructor(operation: string) {
    super(`Cannot ${operation}: handler is closed`, 'CLOSED');
    this.name = 'HandlerClosedError';
  }
}

/**
 * Whether a remote status reports a client-side failure.
 *
 * CloudWatch Logs reports every client fault of the provisioning calls
 * with HTTP 400; any 4xx is treated the same way.
 */
export function isClientError(status: RemoteStatus): boolean {
  return status.statusCode >= 400 && status.statusCode < 500;
}

/**
 * Whether a remote status reports that the resource already exists.
 */
export function isAlreadyExists(status: RemoteStatus): boolean {
  return status.errorCode === 'ResourceAlreadyExistsException';
}
