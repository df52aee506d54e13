/**
 * Remote Stream Client Module
 *
 * @module remote
 */

export type { AppendResponse, Page, RemoteStreamClient } from './client.js';
export { hasRejectedEvents, isEmptyResponse } from './client.js';
export {
  INITIAL_SEQUENCE_TOKEN,
  ensureGroup,
  ensureStream,
  findGroup,
  findStream,
  listGroups,
  listStreams,
} from './provisioning.js';
export type { GroupEnsureResult, StreamCursor } from './provisioning.js';
export { SdkRemoteStreamClient, buildSdkClientConfig, clientFaultStatus } from './sdk.js';
export type { SdkClientOptions, SdkCredentials } from './sdk.js';
