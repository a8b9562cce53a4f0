// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@blockquery/config-service';
import type { Logger } from 'pino';
import { Registry } from 'prom-client';

import { BlockCache } from '../clients/cache/blockCache';
import { CacheConfig } from '../clients/cache/cacheConfig';
import { predefined } from '../errors/BlockQueryError';
import { BlockResolver } from '../services/blockResolver/BlockResolver';
import type { ChainClient, Hasher } from '../types';
import { BlockRecordFactory } from './blockRecordFactory';
import { RegistryFactory } from './registryFactory';

export interface BlockResolverFactoryOptions {
  cacheConfig?: CacheConfig;
  /** Shares an existing cache between resolvers instead of creating one. */
  cache?: BlockCache;
  hasher?: Hasher;
  maxTraverseDepth?: number;
  finalityDepth?: number;
}

export class BlockResolverFactory {
  /**
   * Wires a resolver, its record factory and its cache into one explicitly owned graph.
   * Depth limits default to the `MAX_TRAVERSE_DEPTH` and `FINALITY_DEPTH` entries.
   *
   * @throws {BlockQueryError} `InvalidInput` when a depth limit is not a non-negative integer.
   */
  static create(
    client: ChainClient,
    logger: Logger,
    register: Registry = RegistryFactory.getInstance(),
    options: BlockResolverFactoryOptions = {},
  ): BlockResolver {
    const finalityDepth = BlockResolverFactory.requireDepth(
      'finalityDepth',
      options.finalityDepth ?? ConfigService.get('FINALITY_DEPTH'),
    );
    const maxTraverseDepth = BlockResolverFactory.requireDepth(
      'maxTraverseDepth',
      options.maxTraverseDepth ?? ConfigService.get('MAX_TRAVERSE_DEPTH'),
    );

    const cache =
      options.cache ?? new BlockCache(logger.child({ name: 'blockCache' }), register, options.cacheConfig);
    const factory = new BlockRecordFactory(client, logger.child({ name: 'blockRecordFactory' }), {
      finalityDepth,
      hasher: options.hasher,
    });

    return new BlockResolver(client, cache, factory, logger.child({ name: 'blockResolver' }), register, {
      maxTraverseDepth,
    });
  }

  private static requireDepth(option: string, value: number): number {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw predefined.INVALID_DEPTH_CONFIG(option, value);
    }
    return value;
  }
}
