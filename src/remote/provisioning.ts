/**
 * Log group and log stream provisioning.
 *
 * Find-or-create protocols run by the handler: the group once at
 * construction, the stream before every flush. Prefix listings also
 * return non-exact matches, so every lookup filters on the exact name.
 *
 * @module remote/provisioning
 */

import { ProvisioningError, isAlreadyExists, isClientError } from '../error/index.js';
import { NoopLogger, type Logger } from '../observability/logging.js';
import type { LogGroupDescriptor } from '../types/logGroup.js';
import type { LogStreamDescriptor } from '../types/logStream.js';
import type { RemoteStreamClient } from './client.js';

/**
 * Sequence token of a stream that has never been written to.
 */
export const INITIAL_SEQUENCE_TOKEN = '0';

/**
 * Result of ensuring a log group.
 */
export interface GroupEnsureResult {
  /** True if this call created the group */
  created: boolean;
}

/**
 * Append position for a specific (group, stream) pair.
 *
 * Resolved fresh before every flush: another writer may have advanced
 * the stream since the last one.
 */
export interface StreamCursor {
  logGroupName: string;
  logStreamName: string;
  sequenceToken: string;
  /** True if this call created the stream */
  created: boolean;
}

/**
 * Iterate all log groups matching a prefix, page by page.
 *
 * Stops fetching as soon as the consumer stops iterating.
 */
export async function* listGroups(
  client: RemoteStreamClient,
  prefix: string
): AsyncIterable<LogGroupDescriptor> {
  let nextToken: string | undefined;

  do {
    const page = await client.listGroupsByPrefix(prefix, nextToken);

    for (const group of page.items) {
      yield group;
    }

    nextToken = page.nextToken;
  } while (nextToken);
}

/**
 * Iterate all log streams of a group matching a prefix, page by page.
 */
export async function* listStreams(
  client: RemoteStreamClient,
  group: string,
  prefix: string
): AsyncIterable<LogStreamDescriptor> {
  let nextToken: string | undefined;

  do {
    const page = await client.listStreamsByPrefix(group, prefix, nextToken);

    for (const stream of page.items) {
      yield stream;
    }

    nextToken = page.nextToken;
  } while (nextToken);
}

/**
 * Find a log group by exact name.
 */
export async function findGroup(
  client: RemoteStreamClient,
  group: string
): Promise<LogGroupDescriptor | undefined> {
  for await (const candidate of listGroups(client, group)) {
    if (candidate.logGroupName === group) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Find a log stream by exact name.
 */
export async function findStream(
  client: RemoteStreamClient,
  group: string,
  stream: string
): Promise<LogStreamDescriptor | undefined> {
  for await (const candidate of listStreams(client, group, stream)) {
    if (candidate.logStreamName === stream) {
      return candidate;
    }
  }
  return undefined;
}

/**
 * Check presence of a log group, creating it if missing.
 *
 * The retention policy is only applied to a group this call created; an
 * existing group keeps whatever policy its first writer set.
 *
 * @param client - Remote stream client
 * @param group - Log group name
 * @param retainDays - Retention for a newly created group
 * @param logger - Diagnostic logger
 * @throws {ProvisioningError} if creation or the retention call reports a client error
 */
export async function ensureGroup(
  client: RemoteStreamClient,
  group: string,
  retainDays?: number,
  logger: Logger = new NoopLogger()
): Promise<GroupEnsureResult> {
  if (await findGroup(client, group)) {
    logger.debug('Log group found', { logGroup: group });
    return { created: false };
  }

  const status = await client.createGroup(group);
  if (isClientError(status)) {
    if (isAlreadyExists(status)) {
      // Lost a creation race; the winner owns the retention policy
      logger.debug('Log group created by another writer', { logGroup: group });
      return { created: false };
    }
    throw new ProvisioningError('createGroup', group, status);
  }
  logger.debug('Log group created', { logGroup: group });

  if (retainDays !== undefined) {
    const retention = await client.setRetention(group, retainDays);
    if (isClientError(retention)) {
      throw new ProvisioningError('setRetention', group, retention);
    }
    logger.debug('Retention policy set', { logGroup: group, retentionInDays: retainDays });
  }

  return { created: true };
}

/**
 * Check presence of a log stream, creating it if missing, and resolve the
 * sequence token for the next append.
 *
 * @param client - Remote stream client
 * @param group - Log group name
 * @param stream - Log stream name
 * @param logger - Diagnostic logger
 * @throws {ProvisioningError} if stream creation reports a client error
 */
export async function ensureStream(
  client: RemoteStreamClient,
  group: string,
  stream: string,
  logger: Logger = new NoopLogger()
): Promise<StreamCursor> {
  const cursor = (found: LogStreamDescriptor | undefined, created: boolean): StreamCursor => ({
    logGroupName: group,
    logStreamName: stream,
    sequenceToken: found?.uploadSequenceToken ?? INITIAL_SEQUENCE_TOKEN,
    created,
  });

  const existing = await findStream(client, group, stream);
  if (existing) {
    return cursor(existing, false);
  }

  const status = await client.createStream(group, stream);
  if (isClientError(status)) {
    if (isAlreadyExists(status)) {
      logger.debug('Log stream created by another writer', { logGroup: group, logStream: stream });
      return cursor(await findStream(client, group, stream), false);
    }
    throw new ProvisioningError('createStream', `${group}/${stream}`, status);
  }
  logger.debug('Log stream created', { logGroup: group, logStream: stream });

  return cursor(undefined, true);
}
