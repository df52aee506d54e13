/**
 * Tests for log group and log stream provisioning
 */

import { describe, it, expect, vi } from 'vitest';
import { ensureGroup, ensureStream, findGroup, findStream } from './provisioning.js';
import { ProvisioningError } from '../error/index.js';
import {
  MemoryRemoteStreamClient,
  accessDenied,
  alreadyExists,
} from '../__tests__/helpers/memory-remote.js';

describe('findGroup', () => {
  it('should page through prefix matches until the exact name', async () => {
    const client = new MemoryRemoteStreamClient(1)
      .seedGroup('my-group-a')
      .seedGroup('my-group-b')
      .seedGroup('my-group');

    const group = await findGroup(client, 'my-group');

    expect(group).toEqual({ logGroupName: 'my-group', retentionInDays: undefined });
    expect(client.callsTo('listGroupsByPrefix').map((c) => c.args)).toEqual([
      ['my-group', undefined],
      ['my-group', '1'],
      ['my-group', '2'],
    ]);
  });

  it('should stop paging once the group is found', async () => {
    const client = new MemoryRemoteStreamClient(1).seedGroup('my-group').seedGroup('my-group-a');

    await findGroup(client, 'my-group');

    expect(client.callsTo('listGroupsByPrefix')).toHaveLength(1);
  });

  it('should return undefined when only prefix matches exist', async () => {
    const client = new MemoryRemoteStreamClient(1).seedGroup('my-group-a').seedGroup('my-group-b');

    expect(await findGroup(client, 'my-group')).toBeUndefined();
    expect(client.callsTo('listGroupsByPrefix')).toHaveLength(2);
  });
});

describe('findStream', () => {
  it('should match the exact stream name', async () => {
    const client = new MemoryRemoteStreamClient(1)
      .seedStream('my-group', '2024-01-01-backup', 'tok-1')
      .seedStream('my-group', '2024-01-01', 'tok-2');

    const stream = await findStream(client, 'my-group', '2024-01-01');

    expect(stream).toEqual({ logStreamName: '2024-01-01', uploadSequenceToken: 'tok-2' });
  });
});

describe('ensureGroup', () => {
  it('should not create or change an existing group', async () => {
    const client = new MemoryRemoteStreamClient().seedGroup('my-group', 30);

    const first = await ensureGroup(client, 'my-group', 7);
    const second = await ensureGroup(client, 'my-group', 14);

    expect(first).toEqual({ created: false });
    expect(second).toEqual({ created: false });
    expect(client.callsTo('createGroup')).toHaveLength(0);
    expect(client.callsTo('setRetention')).toHaveLength(0);
    expect(client.groups.get('my-group')?.retentionInDays).toBe(30);
  });

  it('should create a missing group and set its retention', async () => {
    const client = new MemoryRemoteStreamClient().seedGroup('my-group-a');

    const result = await ensureGroup(client, 'my-group', 7);

    expect(result).toEqual({ created: true });
    expect(client.callsTo('createGroup').map((c) => c.args)).toEqual([['my-group']]);
    expect(client.callsTo('setRetention').map((c) => c.args)).toEqual([['my-group', 7]]);
    expect(client.groups.get('my-group')?.retentionInDays).toBe(7);
  });

  it('should skip the retention call when no retention is given', async () => {
    const client = new MemoryRemoteStreamClient();

    await ensureGroup(client, 'my-group');

    expect(client.callsTo('createGroup')).toHaveLength(1);
    expect(client.callsTo('setRetention')).toHaveLength(0);
  });

  it('should keep retention unchanged on a second call with different retention', async () => {
    const client = new MemoryRemoteStreamClient();

    await ensureGroup(client, 'my-group', 7);
    await ensureGroup(client, 'my-group', 90);

    expect(client.callsTo('createGroup')).toHaveLength(1);
    expect(client.callsTo('setRetention')).toHaveLength(1);
    expect(client.groups.get('my-group')?.retentionInDays).toBe(7);
  });

  it('should treat a lost creation race as an existing group', async () => {
    const client = new MemoryRemoteStreamClient().scriptStatus('createGroup', alreadyExists());

    const result = await ensureGroup(client, 'my-group', 7);

    expect(result).toEqual({ created: false });
    expect(client.callsTo('setRetention')).toHaveLength(0);
  });

  it('should raise ProvisioningError when creation is refused', async () => {
    const client = new MemoryRemoteStreamClient().scriptStatus('createGroup', accessDenied());

    const error = await ensureGroup(client, 'my-group').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProvisioningError);
    expect(error).toMatchObject({ code: 'PROVISIONING', operation: 'createGroup' });
    expect(error).toHaveProperty(
      'message',
      'createGroup failed for my-group (HTTP 400): AccessDeniedException: User is not authorized to perform this action'
    );
  });

  it('should raise ProvisioningError when the retention call is refused', async () => {
    const client = new MemoryRemoteStreamClient().scriptStatus('setRetention', {
      statusCode: 400,
      errorCode: 'InvalidParameterException',
      message: 'Invalid retention',
    });

    await expect(ensureGroup(client, 'my-group', 7)).rejects.toMatchObject({
      name: 'ProvisioningError',
      operation: 'setRetention',
      status: { statusCode: 400, errorCode: 'InvalidParameterException' },
    });
  });

  it('should let transport failures through unchanged', async () => {
    const client = new MemoryRemoteStreamClient();
    const failure = new Error('connect ECONNREFUSED');
    vi.spyOn(client, 'listGroupsByPrefix').mockRejectedValueOnce(failure);

    await expect(ensureGroup(client, 'my-group')).rejects.toBe(failure);
  });
});

describe('ensureStream', () => {
  it('should create a missing stream and start from the initial token', async () => {
    const client = new MemoryRemoteStreamClient().seedGroup('my-group');

    const cursor = await ensureStream(client, 'my-group', 'app');

    expect(cursor).toEqual({
      logGroupName: 'my-group',
      logStreamName: 'app',
      sequenceToken: '0',
      created: true,
    });
    expect(client.callsTo('createStream').map((c) => c.args)).toEqual([['my-group', 'app']]);
  });

  it('should use the initial token for an existing stream without one', async () => {
    const client = new MemoryRemoteStreamClient().seedStream('my-group', 'app');

    const cursor = await ensureStream(client, 'my-group', 'app');

    expect(cursor.sequenceToken).toBe('0');
    expect(cursor.created).toBe(false);
    expect(client.callsTo('createStream')).toHaveLength(0);
  });

  it('should use the upload token of an existing stream', async () => {
    const client = new MemoryRemoteStreamClient().seedStream('my-group', 'app', 'tok-42');

    const cursor = await ensureStream(client, 'my-group', 'app');

    expect(cursor.sequenceToken).toBe('tok-42');
  });

  it('should look the stream up again after a lost creation race', async () => {
    const client = new MemoryRemoteStreamClient().seedGroup('my-group');
    vi.spyOn(client, 'createStream').mockImplementationOnce(async () => {
      client.seedStream('my-group', 'app', 'tok-7');
      return alreadyExists();
    });

    const cursor = await ensureStream(client, 'my-group', 'app');

    expect(cursor).toEqual({
      logGroupName: 'my-group',
      logStreamName: 'app',
      sequenceToken: 'tok-7',
      created: false,
    });
    expect(client.callsTo('listStreamsByPrefix')).toHaveLength(2);
  });

  it('should raise ProvisioningError when creation is refused', async () => {
    const client = new MemoryRemoteStreamClient()
      .seedGroup('my-group')
      .scriptStatus('createStream', accessDenied());

    await expect(ensureStream(client, 'my-group', 'app')).rejects.toThrow(
      'createStream failed for my-group/app (HTTP 400): AccessDeniedException: User is not authorized to perform this action'
    );
  });
});
