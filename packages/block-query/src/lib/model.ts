// SPDX-License-Identifier: Apache-2.0

/**
 * Plain shape of a block summary, used to hydrate {@link BlockRecord}.
 */
export interface IBlockRecord {
  number: number;
  hash: string;
  parentHash: string;
  timestamp: number;
  transactions: readonly string[];
  stateRoot?: string;
  extrinsicsRoot?: string;
  extrinsicCount: number;
  eventCount?: number;
  isFinalized: boolean;
}

/**
 * Summary of a single block.
 *
 * Instances are immutable; the cache hands the same instance to every reader and
 * replaces entries wholesale instead of patching them.
 */
export class BlockRecord implements IBlockRecord {
  /** Block number */
  public readonly number: number;

  /** Block hash, 0x-prefixed lower-case hex */
  public readonly hash: string;

  /** Parent block hash */
  public readonly parentHash: string;

  /** Seconds since epoch */
  public readonly timestamp: number;

  /** Extrinsic hashes in on-chain order */
  public readonly transactions: readonly string[];

  /** State trie root, when the header carried one */
  public readonly stateRoot?: string;

  /** Extrinsics trie root, when the header carried one */
  public readonly extrinsicsRoot?: string;

  /** Number of extrinsics in the block */
  public readonly extrinsicCount: number;

  /** Best-effort event count; absent when enumeration failed */
  public readonly eventCount?: number;

  /** Depth-based finality heuristic, not a finality proof */
  public readonly isFinalized: boolean;

  constructor(args: IBlockRecord) {
    this.number = args.number;
    this.hash = args.hash;
    this.parentHash = args.parentHash;
    this.timestamp = args.timestamp;
    this.transactions = Object.freeze([...args.transactions]);
    this.stateRoot = args.stateRoot;
    this.extrinsicsRoot = args.extrinsicsRoot;
    this.extrinsicCount = args.extrinsicCount;
    this.eventCount = args.eventCount;
    this.isFinalized = args.isFinalized;
    Object.freeze(this);
  }
}

export interface IExtrinsicRecord {
  index: number;
  hash: string;
  signed: boolean;
  signer?: string;
  pallet: string;
  call: string;
  success: boolean;
}

/**
 * One extrinsic of a detailed block.
 */
export class ExtrinsicRecord implements IExtrinsicRecord {
  public readonly index: number;
  public readonly hash: string;
  public readonly signed: boolean;
  /** Present only for signed extrinsics */
  public readonly signer?: string;
  public readonly pallet: string;
  public readonly call: string;
  /** True only when a `System.ExtrinsicSuccess` event was observed */
  public readonly success: boolean;

  constructor(args: IExtrinsicRecord) {
    this.index = args.index;
    this.hash = args.hash;
    this.signed = args.signed;
    this.signer = args.signed ? args.signer : undefined;
    this.pallet = args.pallet;
    this.call = args.call;
    this.success = args.success;
    Object.freeze(this);
  }
}

export interface IEventRecord {
  index: number;
  extrinsicIndex?: number;
  pallet: string;
  event: string;
}

/**
 * One event of a detailed block.
 */
export class EventRecord implements IEventRecord {
  /** Position among all events of the block */
  public readonly index: number;
  /** Emitting extrinsic; absent for block-level events */
  public readonly extrinsicIndex?: number;
  public readonly pallet: string;
  public readonly event: string;

  constructor(args: IEventRecord) {
    this.index = args.index;
    this.extrinsicIndex = args.extrinsicIndex;
    this.pallet = args.pallet;
    this.event = args.event;
    Object.freeze(this);
  }
}

/**
 * A block summary with its full extrinsic and event lists. Never cached.
 */
export class DetailedBlockRecord {
  public readonly basic: BlockRecord;
  public readonly extrinsics: readonly ExtrinsicRecord[];
  public readonly events: readonly EventRecord[];

  constructor(basic: BlockRecord, extrinsics: ExtrinsicRecord[], events: EventRecord[]) {
    this.basic = basic;
    this.extrinsics = Object.freeze([...extrinsics]);
    this.events = Object.freeze([...events]);
  }
}
