// SPDX-License-Identifier: Apache-2.0

import { ConfigService } from '@blockquery/config-service';

import { predefined } from '../../errors/BlockQueryError';

/**
 * Options of the {@link BlockCache}. Every option is optional; unset ones fall back
 * to the `CACHE_BLOCK_*` configuration entries.
 *
 * @example
 * const config = new CacheConfig().withBlockTtlFinalized(7_200_000).withBlockTtlRecent(6_000);
 */
export class CacheConfig {
  private blockTtlFinalizedMs?: number;
  private blockTtlRecentMs?: number;
  private maxEntriesLimit?: number;

  /** TTL in milliseconds for blocks reported as finalized. */
  get blockTtlFinalized(): number {
    return (
      this.blockTtlFinalizedMs ??
      CacheConfig.requirePositiveInteger('blockTtlFinalized', ConfigService.get('CACHE_BLOCK_TTL_FINALIZED_MS'))
    );
  }

  /** TTL in milliseconds for blocks still within the finality depth of head. */
  get blockTtlRecent(): number {
    return (
      this.blockTtlRecentMs ??
      CacheConfig.requirePositiveInteger('blockTtlRecent', ConfigService.get('CACHE_BLOCK_TTL_RECENT_MS'))
    );
  }

  /** Upper bound on the number of cached blocks. */
  get maxEntries(): number {
    return (
      this.maxEntriesLimit ??
      CacheConfig.requirePositiveInteger('maxEntries', ConfigService.get('CACHE_BLOCK_MAX_ENTRIES'))
    );
  }

  public withBlockTtlFinalized(ttlMs: number): this {
    this.blockTtlFinalizedMs = CacheConfig.requirePositiveInteger('blockTtlFinalized', ttlMs);
    return this;
  }

  public withBlockTtlRecent(ttlMs: number): this {
    this.blockTtlRecentMs = CacheConfig.requirePositiveInteger('blockTtlRecent', ttlMs);
    return this;
  }

  public withMaxEntries(maxEntries: number): this {
    this.maxEntriesLimit = CacheConfig.requirePositiveInteger('maxEntries', maxEntries);
    return this;
  }

  private static requirePositiveInteger(option: string, value: number): number {
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw predefined.INVALID_CACHE_CONFIG(option, value);
    }
    return value;
  }
}
