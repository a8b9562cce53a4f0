// SPDX-License-Identifier: Apache-2.0

import { Logger } from 'pino';
import { Histogram, Registry } from 'prom-client';

import { isValidHash32, toHash32 } from '../../../formatters';
import { BlockCache } from '../../clients/cache/blockCache';
import constants from '../../constants';
import { predefined } from '../../errors/BlockQueryError';
import { BlockRecordFactory } from '../../factories/blockRecordFactory';
import { RegistryFactory } from '../../factories/registryFactory';
import { BlockRecord, DetailedBlockRecord } from '../../model';
import type { BlockHandle, ChainClient, QueryOptions } from '../../types';
import { IBlockResolver } from './IBlockResolver';

export interface BlockResolverOptions {
  /** Furthest a number lookup may walk back from head before giving up with TooFar. */
  maxTraverseDepth?: number;
}

/**
 * A resolved handle plus the head number it was resolved against.
 */
interface ResolvedBlock {
  block: BlockHandle;
  headNumber: number;
}

export class BlockResolver implements IBlockResolver {
  /**
   * The interface through which we interact with the chain node
   * @private
   */
  private readonly client: ChainClient;

  /**
   * The cache shared by every query of this resolver.
   * @private
   */
  private readonly cache: BlockCache;

  private readonly factory: BlockRecordFactory;

  /**
   * The logger used for logging all output from this class.
   * @private
   */
  private readonly logger: Logger;

  private readonly maxTraverseDepth: number;

  private readonly traversalHops: Histogram<string>;

  /** Constructor */
  constructor(
    client: ChainClient,
    cache: BlockCache,
    factory: BlockRecordFactory,
    logger: Logger,
    register: Registry = RegistryFactory.getInstance(),
    options: BlockResolverOptions = {},
  ) {
    this.client = client;
    this.cache = cache;
    this.factory = factory;
    this.logger = logger;
    this.maxTraverseDepth = options.maxTraverseDepth ?? constants.DEFAULT_MAX_TRAVERSE_DEPTH;

    const metricName = 'block_resolver_traversal_hops';
    register.removeSingleMetric(metricName);
    this.traversalHops = new Histogram({
      name: metricName,
      help: 'Parent-hash hops taken to resolve a block by number',
      registers: [register],
      buckets: [0, 1, 5, 10, 25, 50, 100],
    });
  }

  /**
   * Gets the block with the given number by walking back from head.
   *
   * Only blocks within `maxTraverseDepth` of head can be reached; older blocks
   * must be requested by hash.
   *
   * @param blockNumber - The block number
   * @param options - cancellation signal and request details
   * @throws BlockQueryError NotFound (future block or broken ancestry), TooFar, Connection, Cancelled, InvalidInput
   */
  public async getBlockByNumber(blockNumber: number, options: QueryOptions = {}): Promise<BlockRecord> {
    BlockResolver.assertBlockNumber(blockNumber);
    const requestIdPrefix = options.requestDetails?.formattedRequestId ?? '';
    this.logger.debug(`${requestIdPrefix} Fetching block by number: ${blockNumber}`);

    const cached = this.cache.getBlockByNumber(blockNumber);
    if (cached) {
      return cached;
    }

    const { block, headNumber } = await this.resolveByNumber(
      blockNumber,
      options,
      constants.CALLING_METHODS.GET_BLOCK_BY_NUMBER,
    );
    const record = await this.factory.createBlockRecord(block, headNumber, options.requestDetails);
    this.cache.putBlock(record);
    return record;
  }

  /**
   * Gets the block with the given hash in a single lookup, whatever its depth.
   *
   * @param hash - 32-byte hex hash, with or without `0x`
   * @param options - cancellation signal and request details
   */
  public async getBlockByHash(hash: string, options: QueryOptions = {}): Promise<BlockRecord> {
    const blockHash = BlockResolver.normaliseHash(hash);
    const requestIdPrefix = options.requestDetails?.formattedRequestId ?? '';
    this.logger.debug(`${requestIdPrefix} Fetching block by hash: ${blockHash}`);

    const cached = this.cache.getBlockByHash(blockHash);
    if (cached) {
      return cached;
    }

    const { block, headNumber } = await this.resolveByHash(blockHash, options);
    const record = await this.factory.createBlockRecord(block, headNumber, options.requestDetails);
    this.cache.putBlock(record);
    return record;
  }

  /**
   * Gets the block with the given number along with all of its extrinsics and events.
   * Resolution follows the same bounds as {@link getBlockByNumber}; the detailed
   * view itself is never served from the cache.
   */
  public async getDetailedBlock(blockNumber: number, options: QueryOptions = {}): Promise<DetailedBlockRecord> {
    BlockResolver.assertBlockNumber(blockNumber);
    const requestIdPrefix = options.requestDetails?.formattedRequestId ?? '';
    this.logger.debug(`${requestIdPrefix} Fetching detailed block info for block: ${blockNumber}`);

    const { block, headNumber } = await this.resolveByNumber(
      blockNumber,
      options,
      constants.CALLING_METHODS.GET_DETAILED_BLOCK,
    );
    const detailed = await this.factory.createDetailedBlockRecord(block, headNumber, options.requestDetails);
    this.cache.putBlock(detailed.basic);
    return detailed;
  }

  /**
   * Detailed view of a block addressed by hash.
   */
  public async getDetailedBlockByHash(hash: string, options: QueryOptions = {}): Promise<DetailedBlockRecord> {
    const blockHash = BlockResolver.normaliseHash(hash);
    const requestIdPrefix = options.requestDetails?.formattedRequestId ?? '';
    this.logger.debug(`${requestIdPrefix} Fetching detailed block info for hash: ${blockHash}`);

    const { block, headNumber } = await this.resolveByHash(blockHash, options);
    const detailed = await this.factory.createDetailedBlockRecord(block, headNumber, options.requestDetails);
    this.cache.putBlock(detailed.basic);
    return detailed;
  }

  /**
   * Walks back from head through parent hashes, one hop at a time, until the
   * requested number is reached.
   */
  private async resolveByNumber(
    blockNumber: number,
    options: QueryOptions,
    callingMethod: string,
  ): Promise<ResolvedBlock> {
    BlockResolver.throwIfCancelled(options.signal, blockNumber);
    const head = await this.fetchHead();

    if (blockNumber > head.number) {
      throw predefined.BLOCK_IN_FUTURE(blockNumber, head.number);
    }

    if (blockNumber === head.number) {
      this.traversalHops.observe(0);
      return { block: head, headNumber: head.number };
    }

    const depth = head.number - blockNumber;
    if (depth > this.maxTraverseDepth) {
      throw predefined.TOO_FAR(blockNumber, head.number, this.maxTraverseDepth);
    }

    let current = head;
    for (let hop = 1; hop <= depth; hop++) {
      BlockResolver.throwIfCancelled(options.signal, blockNumber);

      let parent: BlockHandle | null;
      try {
        parent = await this.client.blockAt(current.parentHash);
      } catch (e) {
        throw predefined.TRAVERSAL_FAILED(blockNumber, e);
      }
      if (parent === null) {
        throw predefined.TRAVERSAL_FAILED(
          blockNumber,
          new Error(`parent ${current.parentHash} of block ${current.number} is unknown to the node`),
        );
      }

      if (parent.number === blockNumber) {
        this.traversalHops.observe(hop);
        if (this.logger.isLevelEnabled('trace')) {
          const requestIdPrefix = options.requestDetails?.formattedRequestId ?? '';
          this.logger.trace(
            `${requestIdPrefix} Reached block ${blockNumber} from head ${head.number} in ${hop} hops on ${callingMethod} call`,
          );
        }
        return { block: parent, headNumber: head.number };
      }
      if (parent.number < blockNumber) {
        throw predefined.INCONSISTENT_ANCESTRY(blockNumber, head.number, parent.number);
      }
      current = parent;
    }

    throw predefined.INCONSISTENT_ANCESTRY(blockNumber, head.number, current.number);
  }

  private async resolveByHash(blockHash: string, options: QueryOptions): Promise<ResolvedBlock> {
    BlockResolver.throwIfCancelled(options.signal);

    const [block, head] = await Promise.all([this.fetchBlock(blockHash), this.fetchHead()]);
    if (block === null) {
      throw predefined.BLOCK_HASH_NOT_FOUND(blockHash);
    }
    return { block, headNumber: head.number };
  }

  private async fetchHead(): Promise<BlockHandle> {
    try {
      return await this.client.head();
    } catch (e) {
      throw predefined.HEAD_UNAVAILABLE(e);
    }
  }

  private async fetchBlock(blockHash: string): Promise<BlockHandle | null> {
    try {
      return await this.client.blockAt(blockHash);
    } catch (e) {
      throw predefined.BLOCK_UNAVAILABLE(blockHash, e);
    }
  }

  private static throwIfCancelled(signal: AbortSignal | undefined, blockNumber?: number): void {
    if (signal?.aborted) {
      throw predefined.CANCELLED(blockNumber);
    }
  }

  private static assertBlockNumber(blockNumber: number): void {
    if (!Number.isSafeInteger(blockNumber) || blockNumber < 0) {
      throw predefined.INVALID_BLOCK_NUMBER(blockNumber);
    }
  }

  private static normaliseHash(hash: string): string {
    if (!isValidHash32(hash)) {
      throw predefined.INVALID_BLOCK_HASH(hash);
    }
    return toHash32(hash);
  }
}
