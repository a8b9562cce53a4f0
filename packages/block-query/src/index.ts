// SPDX-License-Identifier: Apache-2.0
import { BlockCache } from './lib/clients/cache/blockCache';
import { CacheConfig } from './lib/clients/cache/cacheConfig';
import { BlockQueryError, BlockQueryErrorKind, predefined } from './lib/errors/BlockQueryError';
import { BlockRecordFactory } from './lib/factories/blockRecordFactory';
import { BlockResolverFactory } from './lib/factories/blockResolverFactory';
import { RegistryFactory } from './lib/factories/registryFactory';
import { BlockRecord, DetailedBlockRecord, EventRecord, ExtrinsicRecord } from './lib/model';
import {
  deserializeBlockRecord,
  fromBlockRecordPayload,
  serializeBlockRecord,
  toBlockRecordPayload,
} from './lib/serialization/blockRecordSerialization';
import { BlockResolver } from './lib/services/blockResolver';
import { RequestDetails } from './lib/types';
import { blake2Hash256 } from './lib/utils/hash';

export { BlockQueryError, BlockQueryErrorKind, predefined };

export { BlockRecord, DetailedBlockRecord, EventRecord, ExtrinsicRecord };

export { BlockCache, CacheConfig };

export { BlockRecordFactory, BlockResolver, BlockResolverFactory, RegistryFactory };

export { deserializeBlockRecord, fromBlockRecordPayload, serializeBlockRecord, toBlockRecordPayload };

export { RequestDetails, blake2Hash256 };

export type { BlockQueryErrorData } from './lib/errors/BlockQueryError';
export type { BlockRecordFactoryOptions } from './lib/factories/blockRecordFactory';
export type { BlockResolverFactoryOptions } from './lib/factories/blockResolverFactory';
export type { IBlockRecord, IEventRecord, IExtrinsicRecord } from './lib/model';
export type { BlockRecordPayload } from './lib/serialization/blockRecordSerialization';
export type { BlockResolverOptions, IBlockResolver } from './lib/services/blockResolver';
export type {
  BlockHandle,
  ChainClient,
  EventHandle,
  ExtrinsicHandle,
  Hasher,
  IRequestDetails,
  QueryOptions,
} from './lib/types';
