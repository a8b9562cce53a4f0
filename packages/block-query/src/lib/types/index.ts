// SPDX-License-Identifier: Apache-2.0

export type { BlockHandle, ChainClient, EventHandle, ExtrinsicHandle, Hasher } from './chainClient';
export type { QueryOptions } from './queryOptions';
export type { IRequestDetails } from './RequestDetails';
export { RequestDetails } from './RequestDetails';
