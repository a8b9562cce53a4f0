// SPDX-License-Identifier: Apache-2.0

import { Logger } from 'pino';

import { bytesToHex, millisToSeconds, toHash32 } from '../../formatters';
import constants from '../constants';
import { predefined } from '../errors/BlockQueryError';
import { BlockRecord, DetailedBlockRecord, EventRecord, ExtrinsicRecord } from '../model';
import type { BlockHandle, ChainClient, EventHandle, ExtrinsicHandle, Hasher, RequestDetails } from '../types';
import { blake2Hash256 } from '../utils/hash';

export interface BlockRecordFactoryOptions {
  /** Blocks more than this many blocks behind head are reported as finalized. */
  finalityDepth?: number;
  hasher?: Hasher;
  /** Wall clock in milliseconds, used only when the chain yields no timestamp. */
  now?: () => number;
}

/**
 * Turns block handles from the {@link ChainClient} into {@link BlockRecord} and
 * {@link DetailedBlockRecord} values.
 */
export class BlockRecordFactory {
  private readonly client: ChainClient;
  private readonly logger: Logger;
  private readonly finalityDepth: number;
  private readonly hasher: Hasher;
  private readonly now: () => number;

  constructor(client: ChainClient, logger: Logger, options: BlockRecordFactoryOptions = {}) {
    this.client = client;
    this.logger = logger;
    this.finalityDepth = options.finalityDepth ?? constants.DEFAULT_FINALITY_DEPTH;
    this.hasher = options.hasher ?? blake2Hash256;
    this.now = options.now ?? Date.now;
  }

  /**
   * Best-effort finality: a block is taken as final once it is more than
   * `finalityDepth` blocks behind head. No finality gadget is consulted, so this
   * is an approximation and not a consensus guarantee.
   */
  static isFinalized(
    blockNumber: number,
    headNumber: number,
    finalityDepth: number = constants.DEFAULT_FINALITY_DEPTH,
  ): boolean {
    return headNumber - blockNumber > finalityDepth;
  }

  /**
   * Builds the summary record of a block.
   *
   * @param block - handle fetched from the chain client
   * @param headNumber - head observed by the caller, anchors the finality flag
   * @param requestDetails - used for log correlation only
   * @throws BlockQueryError (Connection) when the extrinsics cannot be listed
   */
  public async createBlockRecord(
    block: BlockHandle,
    headNumber: number,
    requestDetails?: RequestDetails,
  ): Promise<BlockRecord> {
    const extrinsics = await this.fetchExtrinsics(block);
    const eventCount = await this.countEvents(block, extrinsics, requestDetails);
    return this.toBlockRecord(block, headNumber, extrinsics, eventCount, requestDetails);
  }

  /**
   * Builds the summary together with every extrinsic and event of the block.
   * Event lists are fetched in parallel per extrinsic; any failure fails the whole call.
   */
  public async createDetailedBlockRecord(
    block: BlockHandle,
    headNumber: number,
    requestDetails?: RequestDetails,
  ): Promise<DetailedBlockRecord> {
    const extrinsics = await this.fetchExtrinsics(block);

    let eventsPerExtrinsic: EventHandle[][];
    let blockEvents: EventHandle[];
    try {
      [eventsPerExtrinsic, blockEvents] = await Promise.all([
        Promise.all(extrinsics.map((extrinsic) => this.client.events(block, extrinsic))),
        this.client.blockEvents ? this.client.blockEvents(block) : Promise.resolve([]),
      ]);
    } catch (e) {
      throw predefined.ENUMERATION_FAILED(block.number, 'events', e);
    }

    const eventCount = eventsPerExtrinsic.reduce((sum, events) => sum + events.length, 0);
    const basic = await this.toBlockRecord(block, headNumber, extrinsics, eventCount, requestDetails);

    const extrinsicRecords = extrinsics.map((extrinsic, i) => this.toExtrinsicRecord(extrinsic, eventsPerExtrinsic[i]));

    const eventRecords: EventRecord[] = [];
    extrinsics.forEach((extrinsic, i) => {
      for (const event of eventsPerExtrinsic[i]) {
        eventRecords.push(
          new EventRecord({
            index: eventRecords.length,
            extrinsicIndex: extrinsic.index,
            pallet: event.pallet,
            event: event.event,
          }),
        );
      }
    });
    for (const event of blockEvents) {
      eventRecords.push(new EventRecord({ index: eventRecords.length, pallet: event.pallet, event: event.event }));
    }

    return new DetailedBlockRecord(basic, extrinsicRecords, eventRecords);
  }

  /**
   * Hex digest of the raw extrinsic bytes.
   */
  public extrinsicHash(extrinsic: ExtrinsicHandle): string {
    return bytesToHex(this.hasher(extrinsic.bytes));
  }

  private async fetchExtrinsics(block: BlockHandle): Promise<ExtrinsicHandle[]> {
    try {
      return await this.client.extrinsics(block);
    } catch (e) {
      throw predefined.ENUMERATION_FAILED(block.number, 'extrinsics', e);
    }
  }

  /**
   * Sum of events over all extrinsics, or undefined if any list could not be read.
   */
  private async countEvents(
    block: BlockHandle,
    extrinsics: ExtrinsicHandle[],
    requestDetails?: RequestDetails,
  ): Promise<number | undefined> {
    try {
      const counts = await Promise.all(
        extrinsics.map(async (extrinsic) => (await this.client.events(block, extrinsic)).length),
      );
      return counts.reduce((sum, count) => sum + count, 0);
    } catch (e) {
      this.logger.debug(
        `${requestDetails?.formattedRequestId ?? ''} Omitting event count of block ${block.number}: ${
          e instanceof Error ? e.message : String(e)
        }`,
      );
      return undefined;
    }
  }

  private async toBlockRecord(
    block: BlockHandle,
    headNumber: number,
    extrinsics: ExtrinsicHandle[],
    eventCount: number | undefined,
    requestDetails?: RequestDetails,
  ): Promise<BlockRecord> {
    const timestamp = await this.resolveTimestamp(block, extrinsics, requestDetails);

    return new BlockRecord({
      number: block.number,
      hash: toHash32(block.hash),
      parentHash: toHash32(block.parentHash),
      timestamp,
      transactions: extrinsics.map((extrinsic) => this.extrinsicHash(extrinsic)),
      stateRoot: block.stateRoot,
      extrinsicsRoot: block.extrinsicsRoot,
      extrinsicCount: extrinsics.length,
      eventCount,
      isFinalized: BlockRecordFactory.isFinalized(block.number, headNumber, this.finalityDepth),
    });
  }

  private toExtrinsicRecord(extrinsic: ExtrinsicHandle, events: EventHandle[]): ExtrinsicRecord {
    return new ExtrinsicRecord({
      index: extrinsic.index,
      hash: this.extrinsicHash(extrinsic),
      signed: extrinsic.signed,
      signer: extrinsic.signed ? extrinsic.signer : undefined,
      pallet: extrinsic.pallet ?? constants.UNKNOWN_NAME,
      call: extrinsic.call ?? constants.UNKNOWN_NAME,
      success: events.some(
        (event) => event.pallet === constants.SYSTEM_PALLET && event.event === constants.EXTRINSIC_SUCCESS_EVENT,
      ),
    });
  }

  /**
   * Block production time in seconds. Tries the timestamp storage first, then the
   * `Timestamp.set` inherent, and only then falls back to the wall clock, which
   * attributes the block to query time rather than production time.
   */
  private async resolveTimestamp(
    block: BlockHandle,
    extrinsics: ExtrinsicHandle[],
    requestDetails?: RequestDetails,
  ): Promise<number> {
    const requestIdPrefix = requestDetails?.formattedRequestId ?? '';

    if (this.client.timestampAt) {
      try {
        const millis = await this.client.timestampAt(block);
        if (millis !== undefined && Number.isFinite(millis)) {
          return millisToSeconds(millis);
        }
      } catch (e) {
        this.logger.debug(
          `${requestIdPrefix} Timestamp storage unreadable at block ${block.number}: ${
            e instanceof Error ? e.message : String(e)
          }`,
        );
      }
    }

    const inherent = extrinsics.find(
      (extrinsic) => extrinsic.pallet === constants.TIMESTAMP_PALLET && extrinsic.call === constants.TIMESTAMP_SET_CALL,
    );
    const millis = BlockRecordFactory.parseMillis(inherent?.args?.[constants.TIMESTAMP_ARG]);
    if (millis !== undefined) {
      return millisToSeconds(millis);
    }

    this.logger.warn(
      `${requestIdPrefix} No on-chain timestamp for block ${block.number}, using wall-clock time; the value reflects query time, not block production time`,
    );
    return millisToSeconds(this.now());
  }

  private static parseMillis(value: unknown): number | undefined {
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === 'bigint') {
      return Number(value);
    }
    if (typeof value === 'string' && /^\d+$/.test(value)) {
      return Number(value);
    }
    return undefined;
  }
}
