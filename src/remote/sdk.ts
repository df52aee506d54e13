/**
 * AWS SDK Remote Stream Client
 *
 * {@link RemoteStreamClient} backed by the AWS SDK CloudWatch Logs client.
 *
 * @module remote/sdk
 */

import {
  CloudWatchLogsClient,
  CloudWatchLogsServiceException,
  CreateLogGroupCommand,
  CreateLogStreamCommand,
  DescribeLogGroupsCommand,
  DescribeLogStreamsCommand,
  PutLogEventsCommand,
  PutRetentionPolicyCommand,
  type CloudWatchLogsClientConfig,
} from '@aws-sdk/client-cloudwatch-logs';
import { fromIni } from '@aws-sdk/credential-providers';

import type { RemoteStatus } from '../error/index.js';
import type { InputLogEvent } from '../types/logEvent.js';
import type { LogGroupDescriptor } from '../types/logGroup.js';
import type { LogStreamDescriptor } from '../types/logStream.js';
import type { AppendResponse, Page, RemoteStreamClient } from './client.js';

/**
 * Credential sources for the SDK client.
 */
export type SdkCredentials =
  | {
      type: 'static';
      accessKeyId: string;
      secretAccessKey: string;
      sessionToken?: string;
    }
  | { type: 'profile'; profileName: string }
  | { type: 'environment' };

/**
 * Options for building the SDK client.
 */
export interface SdkClientOptions {
  /** AWS region; the SDK falls back to AWS_REGION and shared config */
  region?: string;
  /** Custom endpoint URL (LocalStack, VPC endpoints) */
  endpoint?: string;
  /** Credential source; the SDK default chain is used when absent */
  credentials?: SdkCredentials;
}

interface ResponseMetadataLike {
  httpStatusCode?: number;
  requestId?: string;
}

/**
 * Build the SDK client configuration.
 */
export function buildSdkClientConfig(options: SdkClientOptions): CloudWatchLogsClientConfig {
  const awsConfig: CloudWatchLogsClientConfig = {
    region: options.region,
    endpoint: options.endpoint,
  };

  if (options.credentials) {
    switch (options.credentials.type) {
      case 'static':
        awsConfig.credentials = {
          accessKeyId: options.credentials.accessKeyId,
          secretAccessKey: options.credentials.secretAccessKey,
          sessionToken: options.credentials.sessionToken,
        };
        break;
      case 'profile':
        awsConfig.credentials = fromIni({
          profile: options.credentials.profileName,
        });
        break;
      case 'environment':
        // AWS SDK automatically uses environment variables
        break;
    }
  }

  return awsConfig;
}

function statusFromMetadata(metadata: ResponseMetadataLike): RemoteStatus {
  return {
    statusCode: metadata.httpStatusCode ?? 200,
    requestId: metadata.requestId,
  };
}

/**
 * Convert a client-fault service exception into a {@link RemoteStatus}.
 *
 * Server faults and transport errors are rethrown unchanged.
 */
export function clientFaultStatus(error: unknown): RemoteStatus {
  if (error instanceof CloudWatchLogsServiceException && error.$fault === 'client') {
    return {
      statusCode: error.$metadata.httpStatusCode ?? 400,
      errorCode: error.name,
      message: error.message,
      requestId: error.$metadata.requestId,
    };
  }
  throw error;
}

/**
 * CloudWatch Logs client over the AWS SDK.
 *
 * @example
 * ```typescript
 * const client = new SdkRemoteStreamClient({
 *   region: 'us-east-1',
 *   credentials: { type: 'profile', profileName: 'logging' },
 * });
 * const handler = await CloudWatchLogsHandler.create({ logGroup: 'my-app' }, client);
 * ```
 */
export class SdkRemoteStreamClient implements RemoteStreamClient {
  private readonly client: CloudWatchLogsClient;

  /**
   * @param clientOrOptions - A configured SDK client, or options to build one
   */
  constructor(clientOrOptions: CloudWatchLogsClient | SdkClientOptions = {}) {
    this.client =
      clientOrOptions instanceof CloudWatchLogsClient
        ? clientOrOptions
        : new CloudWatchLogsClient(buildSdkClientConfig(clientOrOptions));
  }

  async listGroupsByPrefix(prefix: string, pageToken?: string): Promise<Page<LogGroupDescriptor>> {
    const output = await this.client.send(
      new DescribeLogGroupsCommand({
        logGroupNamePrefix: prefix,
        nextToken: pageToken,
      })
    );

    return {
      items: (output.logGroups ?? []).map((group) => ({
        logGroupName: group.logGroupName,
        retentionInDays: group.retentionInDays,
      })),
      nextToken: output.nextToken,
    };
  }

  async createGroup(name: string): Promise<RemoteStatus> {
    try {
      const output = await this.client.send(new CreateLogGroupCommand({ logGroupName: name }));
      return statusFromMetadata(output.$metadata);
    } catch (error) {
      return clientFaultStatus(error);
    }
  }

  async setRetention(name: string, days: number): Promise<RemoteStatus> {
    try {
      const output = await this.client.send(
        new PutRetentionPolicyCommand({ logGroupName: name, retentionInDays: days })
      );
      return statusFromMetadata(output.$metadata);
    } catch (error) {
      return clientFaultStatus(error);
    }
  }

  async listStreamsByPrefix(
    group: string,
    prefix: string,
    pageToken?: string
  ): Promise<Page<LogStreamDescriptor>> {
    const output = await this.client.send(
      new DescribeLogStreamsCommand({
        logGroupName: group,
        logStreamNamePrefix: prefix,
        nextToken: pageToken,
      })
    );

    return {
      items: (output.logStreams ?? []).map((stream) => ({
        logStreamName: stream.logStreamName,
        uploadSequenceToken: stream.uploadSequenceToken,
      })),
      nextToken: output.nextToken,
    };
  }

  async createStream(group: string, name: string): Promise<RemoteStatus> {
    try {
      const output = await this.client.send(
        new CreateLogStreamCommand({ logGroupName: group, logStreamName: name })
      );
      return statusFromMetadata(output.$metadata);
    } catch (error) {
      return clientFaultStatus(error);
    }
  }

  async append(
    group: string,
    stream: string,
    events: InputLogEvent[],
    token: string
  ): Promise<AppendResponse | undefined> {
    const output = await this.client.send(
      new PutLogEventsCommand({
        logGroupName: group,
        logStreamName: stream,
        logEvents: events,
        sequenceToken: token,
      })
    );

    const response: AppendResponse = statusFromMetadata(output.$metadata);
    if (output.nextSequenceToken) {
      response.nextSequenceToken = output.nextSequenceToken;
    }
    if (output.rejectedLogEventsInfo) {
      response.rejectedLogEventsInfo = output.rejectedLogEventsInfo;
    }
    return response;
  }

  async close(): Promise<void> {
    this.client.destroy();
  }
}
