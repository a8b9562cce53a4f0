// SPDX-License-Identifier: Apache-2.0

/**
 * Header-level view of a block as returned by the node.
 */
export interface BlockHandle {
  readonly number: number;
  /** 0x-prefixed hex */
  readonly hash: string;
  readonly parentHash: string;
  readonly stateRoot?: string;
  readonly extrinsicsRoot?: string;
}

/**
 * One extrinsic of a block, already decoded far enough to name its call.
 */
export interface ExtrinsicHandle {
  /** Position in the block */
  readonly index: number;
  /** Raw SCALE-encoded extrinsic */
  readonly bytes: Uint8Array;
  readonly signed: boolean;
  /** Signer address, 0x-prefixed hex */
  readonly signer?: string;
  /** Undefined when the client could not resolve the pallet from metadata */
  readonly pallet?: string;
  readonly call?: string;
  /** Decoded call arguments keyed by name, when the client decodes them */
  readonly args?: Readonly<Record<string, unknown>>;
}

export interface EventHandle {
  readonly pallet: string;
  readonly event: string;
}

/**
 * Capability through which block data is read from the remote node.
 * Transport, retries and decoding belong to the implementation.
 */
export interface ChainClient {
  /** The most recent block known to the node. */
  head(): Promise<BlockHandle>;

  /** The block with the given hash, or `null` when the node does not know it. */
  blockAt(hash: string): Promise<BlockHandle | null>;

  extrinsics(block: BlockHandle): Promise<ExtrinsicHandle[]>;

  /** Events emitted while applying the extrinsic, in emission order. */
  events(block: BlockHandle, extrinsic: ExtrinsicHandle): Promise<EventHandle[]>;

  /** Block-level events not attributed to any extrinsic. */
  blockEvents?(block: BlockHandle): Promise<EventHandle[]>;

  /** Milliseconds stored by the timestamp pallet at this block, when readable. */
  timestampAt?(block: BlockHandle): Promise<number | undefined>;
}

/**
 * 32-byte digest used for extrinsic hashes.
 */
export type Hasher = (bytes: Uint8Array) => Uint8Array;
