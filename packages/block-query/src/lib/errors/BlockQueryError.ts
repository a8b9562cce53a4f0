// SPDX-License-Identifier: Apache-2.0

/**
 * Distinct failure outcomes of a block query.
 */
export enum BlockQueryErrorKind {
  CONNECTION = 'Connection',
  NOT_FOUND = 'NotFound',
  TOO_FAR = 'TooFar',
  INVALID_INPUT = 'InvalidInput',
  CANCELLED = 'Cancelled',
}

export interface BlockQueryErrorData {
  /** Block number the query was aiming for */
  blockNumber?: number;
  /** Head number observed while resolving */
  headNumber?: number;
  /** Set when the chain client reported ancestry that does not lead to the target */
  inconsistentAncestry?: boolean;
}

export class BlockQueryError extends Error {
  public readonly kind: BlockQueryErrorKind;
  public readonly data: BlockQueryErrorData;

  constructor(kind: BlockQueryErrorKind, message: string, data: BlockQueryErrorData = {}, cause?: unknown) {
    super(message, { cause });
    this.name = 'BlockQueryError';
    this.kind = kind;
    this.data = data;
    Object.setPrototypeOf(this, BlockQueryError.prototype);
  }

  public isConnection(): boolean {
    return this.kind === BlockQueryErrorKind.CONNECTION;
  }

  public isNotFound(): boolean {
    return this.kind === BlockQueryErrorKind.NOT_FOUND;
  }

  /**
   * The block lies deeper behind head than the resolver is allowed to walk;
   * the caller should look it up by hash instead.
   */
  public isTooFar(): boolean {
    return this.kind === BlockQueryErrorKind.TOO_FAR;
  }

  public isInvalidInput(): boolean {
    return this.kind === BlockQueryErrorKind.INVALID_INPUT;
  }

  public isCancelled(): boolean {
    return this.kind === BlockQueryErrorKind.CANCELLED;
  }

  public isInconsistentAncestry(): boolean {
    return this.data.inconsistentAncestry === true;
  }
}

const describeCause = (cause: unknown): string => (cause instanceof Error ? cause.message : String(cause));

export const predefined = {
  HEAD_UNAVAILABLE: (cause: unknown) =>
    new BlockQueryError(
      BlockQueryErrorKind.CONNECTION,
      `Failed to get latest block: ${describeCause(cause)}`,
      {},
      cause,
    ),
  TRAVERSAL_FAILED: (blockNumber: number, cause: unknown) =>
    new BlockQueryError(
      BlockQueryErrorKind.CONNECTION,
      `Failed to traverse to block ${blockNumber}: ${describeCause(cause)}`,
      { blockNumber },
      cause,
    ),
  BLOCK_UNAVAILABLE: (hash: string, cause: unknown) =>
    new BlockQueryError(BlockQueryErrorKind.CONNECTION, `Failed to get block ${hash}: ${describeCause(cause)}`, {}, cause),
  ENUMERATION_FAILED: (blockNumber: number, what: string, cause: unknown) =>
    new BlockQueryError(
      BlockQueryErrorKind.CONNECTION,
      `Failed to get ${what} of block ${blockNumber}: ${describeCause(cause)}`,
      { blockNumber },
      cause,
    ),
  BLOCK_IN_FUTURE: (blockNumber: number, headNumber: number) =>
    new BlockQueryError(BlockQueryErrorKind.NOT_FOUND, `Block ${blockNumber} not found (latest: ${headNumber})`, {
      blockNumber,
      headNumber,
    }),
  BLOCK_HASH_NOT_FOUND: (hash: string) =>
    new BlockQueryError(BlockQueryErrorKind.NOT_FOUND, `Block ${hash} not found`),
  INCONSISTENT_ANCESTRY: (blockNumber: number, headNumber: number, reachedNumber: number) =>
    new BlockQueryError(
      BlockQueryErrorKind.NOT_FOUND,
      `Block ${blockNumber} was not reached walking back from ${headNumber}: ancestry ended at ${reachedNumber}`,
      { blockNumber, headNumber, inconsistentAncestry: true },
    ),
  TOO_FAR: (blockNumber: number, headNumber: number, maxDepth: number) =>
    new BlockQueryError(
      BlockQueryErrorKind.TOO_FAR,
      `Block ${blockNumber} is more than ${maxDepth} blocks behind current height ${headNumber}. Use getBlockByHash if the hash is known.`,
      { blockNumber, headNumber },
    ),
  INVALID_BLOCK_HASH: (hash: string) =>
    new BlockQueryError(
      BlockQueryErrorKind.INVALID_INPUT,
      `Invalid block hash ${JSON.stringify(hash)}: expected 32 bytes of hex`,
    ),
  INVALID_BLOCK_NUMBER: (blockNumber: number) =>
    new BlockQueryError(
      BlockQueryErrorKind.INVALID_INPUT,
      `Invalid block number ${blockNumber}: expected a non-negative safe integer`,
    ),
  INVALID_CACHE_CONFIG: (option: string, value: number) =>
    new BlockQueryError(BlockQueryErrorKind.INVALID_INPUT, `Invalid cache option ${option}: ${value}`),
  INVALID_DEPTH_CONFIG: (option: string, value: number) =>
    new BlockQueryError(BlockQueryErrorKind.INVALID_INPUT, `Invalid depth option ${option}: ${value}`),
  INVALID_RECORD_PAYLOAD: (reason: string) =>
    new BlockQueryError(BlockQueryErrorKind.INVALID_INPUT, `Invalid block record payload: ${reason}`),
  CANCELLED: (blockNumber?: number) =>
    new BlockQueryError(
      BlockQueryErrorKind.CANCELLED,
      blockNumber === undefined ? 'Block query cancelled' : `Block query for ${blockNumber} cancelled`,
      { blockNumber },
    ),
};
