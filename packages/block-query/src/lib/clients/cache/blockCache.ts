// SPDX-License-Identifier: Apache-2.0

import { LRUCache } from 'lru-cache';
import { Logger } from 'pino';
import { Counter, Gauge, Registry } from 'prom-client';

import { toHash32 } from '../../../formatters';
import { BlockRecord } from '../../model';
import { CacheConfig } from './cacheConfig';

/**
 * A cached block together with the TTL clock it was stored under.
 * The TTL is fixed at insertion and never re-evaluated.
 */
interface CacheEntry {
  readonly record: BlockRecord;
  readonly insertedAt: number;
  readonly ttl: number;
}

type LookupIndex = 'number' | 'hash';

/**
 * Process-local block cache keyed by both block number and block hash.
 *
 * Entries live in one LRU store keyed by hash; the number index only maps to
 * hashes, so both keys of a record share a single entry and a single TTL clock.
 * Reads never refresh recency, which keeps the LRU order equal to insertion order.
 * Every operation is synchronous and therefore atomic with respect to other
 * callers on the event loop.
 */
export class BlockCache {
  /**
   * Entries keyed by normalised block hash.
   *
   * @private
   */
  private readonly entries: LRUCache<string, CacheEntry>;

  /**
   * Block number to block hash.
   *
   * @private
   */
  private readonly numberIndex = new Map<number, string>();

  private readonly ttlFinalized: number;

  private readonly ttlRecent: number;

  /**
   * The logger used for logging all output from this class.
   * @private
   */
  private readonly logger: Logger;

  /**
   * The gauge used for tracking the size of the cache.
   * @private
   */
  private readonly entriesGauge: Gauge<string>;

  private readonly lookupCounter: Counter<'index' | 'result'>;

  /**
   * @param logger - The logger instance to be used for logging.
   * @param register - The registry instance used for metrics tracking.
   * @param config - TTLs and capacity; defaults come from configuration.
   * @throws {BlockQueryError} `InvalidInput` when a configured TTL or capacity is not a positive integer.
   */
  public constructor(logger: Logger, register: Registry, config: CacheConfig = new CacheConfig()) {
    this.logger = logger;
    this.ttlFinalized = config.blockTtlFinalized;
    this.ttlRecent = config.blockTtlRecent;
    this.entries = new LRUCache<string, CacheEntry>({
      max: config.maxEntries,
      dispose: (entry, hash) => this.unlinkNumber(entry.record.number, hash),
    });

    const cacheSizeCollect = (): void => {
      this.purgeStale();
      this.entriesGauge.set(this.entries.size);
    };

    const entriesGaugeName = 'block_cache_entries';
    register.removeSingleMetric(entriesGaugeName);
    this.entriesGauge = new Gauge({
      name: entriesGaugeName,
      help: 'Number of blocks held by the block cache',
      registers: [register],
      collect(): void {
        cacheSizeCollect();
      },
    });

    const lookupCounterName = 'block_cache_lookups_total';
    register.removeSingleMetric(lookupCounterName);
    this.lookupCounter = new Counter({
      name: lookupCounterName,
      help: 'Block cache lookups by index and outcome',
      registers: [register],
      labelNames: ['index', 'result'],
    });
  }

  /**
   * Number of cached blocks, expired ones included until they are touched or purged.
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Stores a block under its number and its hash. The TTL is chosen from the
   * record's finality flag at this moment. At capacity, expired entries are
   * purged first and then the oldest entries are evicted.
   */
  public putBlock(record: BlockRecord): void {
    const hash = toHash32(record.hash);
    const ttl = record.isFinalized ? this.ttlFinalized : this.ttlRecent;

    if (!this.entries.has(hash) && this.entries.size >= this.entries.max) {
      this.purgeStale();
    }

    this.entries.set(hash, { record, insertedAt: Date.now(), ttl });
    this.numberIndex.set(record.number, hash);

    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(
        `Caching block %s (%s) for %s ms (cache size: %s, max: %s)`,
        record.number,
        hash,
        ttl,
        this.entries.size,
        this.entries.max,
      );
    }
  }

  public getBlockByNumber(blockNumber: number): BlockRecord | undefined {
    const hash = this.numberIndex.get(blockNumber);
    if (hash === undefined) {
      this.lookupCounter.labels('number', 'miss').inc(1);
      return undefined;
    }
    const record = this.lookup(hash, 'number');
    if (record === undefined) {
      this.unlinkNumber(blockNumber, hash);
    }
    return record;
  }

  public getBlockByHash(hash: string): BlockRecord | undefined {
    return this.lookup(toHash32(hash), 'hash');
  }

  /**
   * Removes every expired entry from both indices.
   *
   * @returns the number of removed entries
   */
  public purgeStale(): number {
    const now = Date.now();
    const expired: string[] = [];
    for (const [hash, entry] of this.entries.entries()) {
      if (BlockCache.isExpired(entry, now)) {
        expired.push(hash);
      }
    }
    for (const hash of expired) {
      this.entries.delete(hash);
    }
    if (expired.length > 0) {
      this.logger.trace(`Purged %s expired blocks`, expired.length);
    }
    return expired.length;
  }

  /**
   * Clears the entire cache, removing all entries from both indices.
   */
  public clear(): void {
    this.entries.clear();
    this.numberIndex.clear();
  }

  private lookup(hash: string, index: LookupIndex): BlockRecord | undefined {
    const entry = this.entries.peek(hash);
    if (entry === undefined) {
      this.lookupCounter.labels(index, 'miss').inc(1);
      return undefined;
    }

    if (BlockCache.isExpired(entry, Date.now())) {
      this.entries.delete(hash);
      this.lookupCounter.labels(index, 'expired').inc(1);
      return undefined;
    }

    this.lookupCounter.labels(index, 'hit').inc(1);
    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(`Returning cached block %s by %s`, entry.record.number, index);
    }
    return entry.record;
  }

  /**
   * Drops the number mapping of a removed entry, unless the number has since
   * been re-pointed at another hash.
   */
  private unlinkNumber(blockNumber: number, hash: string): void {
    if (this.numberIndex.get(blockNumber) === hash) {
      this.numberIndex.delete(blockNumber);
    }
  }

  private static isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.insertedAt > entry.ttl;
  }
}
