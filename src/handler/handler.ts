/**
 * CloudWatch Logs Handler
 *
 * Buffers formatted log records and delivers them to a CloudWatch Logs
 * stream in batches that respect the PutLogEvents limits.
 *
 * @module handler
 */

import { EventBuffer, type BatchMetrics } from '../batch/buffer.js';
import { batchLimits } from '../batch/config.js';
import { formatEvent } from '../batch/format.js';
import {
  configBuilder,
  resolveHandlerConfig,
  type HandlerConfig,
  type HandlerOptions,
} from '../config/index.js';
import { DeliveryError, HandlerClosedError } from '../error/index.js';
import type { Logger } from '../observability/logging.js';
import { hasRejectedEvents, isEmptyResponse, type RemoteStreamClient } from '../remote/client.js';
import { ensureGroup, ensureStream } from '../remote/provisioning.js';
import { SdkRemoteStreamClient } from '../remote/sdk.js';
import type { InputLogEvent } from '../types/logEvent.js';
import { isLevelEnabled, type LogRecord } from '../types/record.js';
import type { LogSink } from './sink.js';

/**
 * Name of the daily stream for `date`, in local time.
 *
 * @example
 * dailyStreamName(new Date(2024, 0, 5)) // '2024-01-05'
 */
export function dailyStreamName(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Close `client` after `cause` has already failed the operation.
 *
 * A failure to close is logged; `cause` stays the error the caller sees.
 */
async function releaseAfterFailure(
  client: RemoteStreamClient,
  logger: Logger,
  cause: unknown
): Promise<void> {
  try {
    await client.close();
  } catch (error) {
    logger.warn('Failed to release remote client', {
      error: error instanceof Error ? error.message : String(error),
      cause: cause instanceof Error ? cause.message : String(cause),
    });
  }
}

/**
 * Log handler that batches records into a CloudWatch Logs stream.
 *
 * Records are buffered until the next one would break a batch limit
 * (event count, byte size, chronological order or 24 hour span), an
 * explicit {@link flush}, or {@link close}. There is no timer and no
 * internal retry: every remote failure rejects the call that caused it.
 *
 * Operations on one handler run one at a time in call order.
 *
 * @example
 * ```typescript
 * const handler = await CloudWatchLogsHandler.create({
 *   logGroup: 'my-service',
 *   retainDays: 30,
 *   capacity: 100,
 * });
 *
 * await handler.emit(createLogRecord('app', 'info', 'Started'));
 * await handler.close();
 * ```
 */
export class CloudWatchLogsHandler implements LogSink {
  private readonly config: HandlerConfig;
  private readonly client: RemoteStreamClient;
  private readonly logger: Logger;
  private readonly buffer: EventBuffer;
  private queue: Promise<void>;
  private closed: boolean;
  private counters: Omit<BatchMetrics, 'eventsBuffered' | 'bytesBuffered'>;

  private constructor(config: HandlerConfig, client: RemoteStreamClient) {
    this.config = config;
    this.client = client;
    this.logger = config.logger;
    this.buffer = new EventBuffer(batchLimits(config.capacity));
    this.queue = Promise.resolve();
    this.closed = false;
    this.counters = {
      flushesCompleted: 0,
      flushesFailed: 0,
      eventsDelivered: 0,
      eventsDropped: 0,
    };
  }

  /**
   * Create a handler, making sure its log group exists.
   *
   * @param options - Handler options
   * @param client - Remote client; an AWS SDK client built from `options.aws` if omitted
   * @throws {ConfigurationError} if the options are invalid
   * @throws {ProvisioningError} if the log group cannot be created
   */
  static async create(
    options: HandlerOptions,
    client?: RemoteStreamClient
  ): Promise<CloudWatchLogsHandler> {
    return CloudWatchLogsHandler.fromConfig(resolveHandlerConfig(options), client);
  }

  /**
   * Create a handler from an already resolved configuration.
   */
  static async fromConfig(
    config: HandlerConfig,
    client?: RemoteStreamClient
  ): Promise<CloudWatchLogsHandler> {
    const remote = client ?? new SdkRemoteStreamClient(config.aws);

    try {
      await ensureGroup(remote, config.logGroup, config.retainDays, config.logger);
    } catch (error) {
      await releaseAfterFailure(remote, config.logger, error);
      throw error;
    }

    return new CloudWatchLogsHandler(config, remote);
  }

  /**
   * Create a handler configured from environment variables.
   *
   * @see HandlerConfigBuilder.fromEnv
   */
  static async fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    client?: RemoteStreamClient
  ): Promise<CloudWatchLogsHandler> {
    return CloudWatchLogsHandler.fromConfig(configBuilder().fromEnv(env).build(), client);
  }

  /**
   * Buffer a record, flushing first if it does not fit in the current batch.
   *
   * Records below the configured level are ignored. If the flush fails
   * the record is not buffered.
   */
  emit(record: LogRecord): Promise<void> {
    return this.enqueue(async () => {
      this.assertOpen('emit');

      if (!isLevelEnabled(record.level, this.config.level)) {
        return;
      }

      const { size, event } = formatEvent(record, this.config.formatter, this.config.truncationSuffix);

      const reason = this.buffer.flushReasonFor(event, size);
      if (reason) {
        this.logger.debug('Batch limit reached', {
          reason,
          eventsBuffered: this.buffer.count,
          bytesBuffered: this.buffer.bytes,
        });
        await this.deliver();
      }

      this.buffer.append(event, size);
    });
  }

  /**
   * Deliver the buffered events.
   *
   * @throws {ProvisioningError} if the log stream cannot be created
   * @throws {DeliveryError} if events were rejected or the response was empty
   */
  flush(): Promise<void> {
    return this.enqueue(async () => {
      this.assertOpen('flush');
      await this.deliver();
    });
  }

  /**
   * Flush once more and release the remote client.
   *
   * The client is released even if the flush fails; the caller then sees
   * the flush error, not a failure to release. Calling close again has no
   * effect.
   */
  close(): Promise<void> {
    return this.enqueue(async () => {
      if (this.closed) {
        return;
      }
      this.closed = true;

      try {
        await this.deliver();
      } catch (error) {
        await this.release(error);
        throw error;
      }
      await this.client.close();
      this.logger.debug('Handler closed', { logGroup: this.config.logGroup });
    });
  }

  /**
   * Whether {@link close} has been called.
   */
  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Events waiting for delivery, in emission order.
   */
  get pendingEvents(): readonly InputLogEvent[] {
    return this.buffer.events;
  }

  /**
   * Gets current buffer metrics.
   */
  getMetrics(): BatchMetrics {
    return {
      eventsBuffered: this.buffer.count,
      bytesBuffered: this.buffer.bytes,
      ...this.counters,
    };
  }

  /**
   * Stream the next flush writes to.
   */
  currentStreamName(): string {
    return this.config.logStream ?? dailyStreamName(this.config.clock());
  }

  private async release(cause: unknown): Promise<void> {
    await releaseAfterFailure(this.client, this.logger, cause);
    this.logger.debug('Handler closed', { logGroup: this.config.logGroup });
  }

  private assertOpen(operation: string): void {
    if (this.closed) {
      throw new HandlerClosedError(operation);
    }
  }

  /**
   * Run `task` after every previously requested operation has settled.
   */
  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task);
    // The caller receives the failure through `run`; the chain itself moves on
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async deliver(): Promise<void> {
    if (this.buffer.isEmpty()) {
      return;
    }

    const group = this.config.logGroup;
    const stream = this.currentStreamName();
    const events = [...this.buffer.events];

    try {
      const cursor = await ensureStream(this.client, group, stream, this.logger);
      const response = await this.client.append(group, stream, events, cursor.sequenceToken);

      if (!response || isEmptyResponse(response)) {
        throw new DeliveryError('empty-response', events.length);
      }

      if (hasRejectedEvents(response)) {
        if (this.config.rejectPolicy === 'drop') {
          this.buffer.clear();
          this.counters.eventsDropped += events.length;
        }
        throw new DeliveryError('rejected', events.length, response.rejectedLogEventsInfo);
      }
    } catch (error) {
      this.counters.flushesFailed++;
      throw error;
    }

    this.buffer.clear();
    this.counters.flushesCompleted++;
    this.counters.eventsDelivered += events.length;
    this.logger.debug('Batch delivered', {
      logGroup: group,
      logStream: stream,
      events: events.length,
    });
  }
}
