/**
 * Tests for the AWS SDK remote stream client
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  CloudWatchLogsClient,
  CreateLogGroupCommand,
  DescribeLogGroupsCommand,
  DescribeLogStreamsCommand,
  PutLogEventsCommand,
  PutRetentionPolicyCommand,
  ResourceAlreadyExistsException,
  ServiceUnavailableException,
} from '@aws-sdk/client-cloudwatch-logs';
import { SdkRemoteStreamClient, buildSdkClientConfig, clientFaultStatus } from './sdk.js';

function createSdkClient(): CloudWatchLogsClient {
  return new CloudWatchLogsClient({
    region: 'us-east-1',
    credentials: { accessKeyId: 'test', secretAccessKey: 'test-secret' },
  });
}

describe('buildSdkClientConfig', () => {
  it('should pass region and endpoint through', () => {
    const config = buildSdkClientConfig({ region: 'eu-west-1', endpoint: 'http://localhost:4566' });

    expect(config.region).toBe('eu-west-1');
    expect(config.endpoint).toBe('http://localhost:4566');
    expect(config.credentials).toBeUndefined();
  });

  it('should use static credentials as given', () => {
    const config = buildSdkClientConfig({
      credentials: { type: 'static', accessKeyId: 'test', secretAccessKey: 'test-secret' },
    });

    expect(config.credentials).toEqual({
      accessKeyId: 'test',
      secretAccessKey: 'test-secret',
      sessionToken: undefined,
    });
  });

  it('should resolve profile credentials lazily', () => {
    const config = buildSdkClientConfig({ credentials: { type: 'profile', profileName: 'logging' } });

    expect(typeof config.credentials).toBe('function');
  });

  it('should leave environment credentials to the default chain', () => {
    const config = buildSdkClientConfig({ credentials: { type: 'environment' } });

    expect(config.credentials).toBeUndefined();
  });
});

describe('clientFaultStatus', () => {
  it('should convert client faults to a status', () => {
    const error = new ResourceAlreadyExistsException({
      message: 'The specified log group already exists',
      $metadata: { httpStatusCode: 400, requestId: 'req-1' },
    });

    expect(clientFaultStatus(error)).toEqual({
      statusCode: 400,
      errorCode: 'ResourceAlreadyExistsException',
      message: 'The specified log group already exists',
      requestId: 'req-1',
    });
  });

  it('should rethrow server faults', () => {
    const error = new ServiceUnavailableException({
      message: 'Service unavailable',
      $metadata: { httpStatusCode: 503 },
    });

    expect(() => clientFaultStatus(error)).toThrow(error);
  });

  it('should rethrow errors that are not service exceptions', () => {
    const error = new Error('socket hang up');

    expect(() => clientFaultStatus(error)).toThrow(error);
  });
});

describe('SdkRemoteStreamClient', () => {
  let sdk: CloudWatchLogsClient;
  let client: SdkRemoteStreamClient;

  beforeEach(() => {
    sdk = createSdkClient();
    client = new SdkRemoteStreamClient(sdk);
  });

  it('should list log groups by prefix', async () => {
    const send = vi.spyOn(sdk, 'send').mockImplementation(async () => ({
      $metadata: { httpStatusCode: 200 },
      logGroups: [{ logGroupName: 'my-group', retentionInDays: 7, arn: 'arn:test' }],
      nextToken: 'page-2',
    }));

    const page = await client.listGroupsByPrefix('my-group', 'page-1');

    expect(page).toEqual({
      items: [{ logGroupName: 'my-group', retentionInDays: 7 }],
      nextToken: 'page-2',
    });
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(DescribeLogGroupsCommand);
    expect(command.input).toEqual({ logGroupNamePrefix: 'my-group', nextToken: 'page-1' });
  });

  it('should list log streams by prefix', async () => {
    const send = vi.spyOn(sdk, 'send').mockImplementation(async () => ({
      $metadata: { httpStatusCode: 200 },
      logStreams: [{ logStreamName: 'app', uploadSequenceToken: 'tok-1', storedBytes: 0 }],
    }));

    const page = await client.listStreamsByPrefix('my-group', 'app');

    expect(page).toEqual({
      items: [{ logStreamName: 'app', uploadSequenceToken: 'tok-1' }],
      nextToken: undefined,
    });
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(DescribeLogStreamsCommand);
    expect(command.input).toEqual({ logGroupName: 'my-group', logStreamNamePrefix: 'app' });
  });

  it('should return the response status of a create call', async () => {
    const send = vi.spyOn(sdk, 'send').mockImplementation(async () => ({
      $metadata: { httpStatusCode: 200, requestId: 'req-2' },
    }));

    const status = await client.createGroup('my-group');

    expect(status).toEqual({ statusCode: 200, requestId: 'req-2' });
    expect(send.mock.calls[0][0]).toBeInstanceOf(CreateLogGroupCommand);
  });

  it('should report a client fault of a create call as a status', async () => {
    vi.spyOn(sdk, 'send').mockImplementation(async () => {
      throw new ResourceAlreadyExistsException({
        message: 'The specified log stream already exists',
        $metadata: { httpStatusCode: 400 },
      });
    });

    const status = await client.createStream('my-group', 'app');

    expect(status).toMatchObject({
      statusCode: 400,
      errorCode: 'ResourceAlreadyExistsException',
    });
  });

  it('should reject when a create call fails in transport', async () => {
    const failure = new Error('socket hang up');
    vi.spyOn(sdk, 'send').mockImplementation(async () => {
      throw failure;
    });

    await expect(client.createGroup('my-group')).rejects.toBe(failure);
  });

  it('should send the retention policy', async () => {
    const send = vi.spyOn(sdk, 'send').mockImplementation(async () => ({
      $metadata: { httpStatusCode: 200 },
    }));

    await client.setRetention('my-group', 14);

    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutRetentionPolicyCommand);
    expect(command.input).toEqual({ logGroupName: 'my-group', retentionInDays: 14 });
  });

  it('should append events with the sequence token', async () => {
    const send = vi.spyOn(sdk, 'send').mockImplementation(async () => ({
      $metadata: { httpStatusCode: 200, requestId: 'req-3' },
      nextSequenceToken: 'tok-2',
      rejectedLogEventsInfo: { tooOldLogEventEndIndex: 0 },
    }));
    const events = [{ timestamp: 1_700_000_000_000, message: 'hello' }];

    const response = await client.append('my-group', 'app', events, 'tok-1');

    expect(response).toEqual({
      statusCode: 200,
      requestId: 'req-3',
      nextSequenceToken: 'tok-2',
      rejectedLogEventsInfo: { tooOldLogEventEndIndex: 0 },
    });
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PutLogEventsCommand);
    expect(command.input).toEqual({
      logGroupName: 'my-group',
      logStreamName: 'app',
      logEvents: events,
      sequenceToken: 'tok-1',
    });
  });

  it('should destroy the SDK client on close', async () => {
    const destroy = vi.spyOn(sdk, 'destroy');

    await client.close();

    expect(destroy).toHaveBeenCalledTimes(1);
  });

  it('should build its own SDK client from options', () => {
    const built = new SdkRemoteStreamClient({
      region: 'us-east-1',
      credentials: { type: 'static', accessKeyId: 'test', secretAccessKey: 'test-secret' },
    });

    expect(built).toBeInstanceOf(SdkRemoteStreamClient);
  });
});
