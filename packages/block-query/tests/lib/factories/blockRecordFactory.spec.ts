// SPDX-License-Identifier: Apache-2.0

import { expect } from 'chai';
import { pino } from 'pino';
import sinon from 'sinon';

import { BlockQueryErrorKind, RequestDetails } from '../../../src';
import { bytesToHex } from '../../../src/formatters';
import { BlockRecordFactory } from '../../../src/lib/factories/blockRecordFactory';
import type { BlockHandle, ChainClient, EventHandle } from '../../../src/lib/types';
import { blake2Hash256 } from '../../../src/lib/utils/hash';
import { expectBlockQueryError } from '../../helpers';
import { extrinsicOf, failedEvent, InMemoryChainClient, successEvent } from '../../mocks/inMemoryChainClient';

describe('BlockRecordFactory', function () {
  this.timeout(10000);

  const logger = pino({ level: 'silent' });
  const requestDetails = new RequestDetails({ requestId: 'blockRecordFactoryTest' });
  const HEAD = 1000;
  const WALL_CLOCK_MILLIS = 1_800_000_000_500;
  const transferEvent: EventHandle = { pallet: 'Balances', event: 'Transfer' };
  const sessionEvent: EventHandle = { pallet: 'Session', event: 'NewSession' };
  const signer = `0x${'12'.repeat(32)}`;

  let client: InMemoryChainClient;
  let factory: BlockRecordFactory;
  let block: BlockHandle;

  const hashOfBytes = (bytes: number[]): string => bytesToHex(blake2Hash256(Uint8Array.from(bytes)));

  beforeEach(async () => {
    client = InMemoryChainClient.linear(HEAD);
    factory = new BlockRecordFactory(client, logger, { now: () => WALL_CLOCK_MILLIS });

    const target = await client.blockAt(InMemoryChainClient.hashOf(950));
    if (target === null) throw new Error('fixture block 950 missing');
    block = target;

    client.setBody(block.hash, {
      extrinsics: [
        extrinsicOf(0, { pallet: 'Timestamp', call: 'set', args: { now: 1_700_005_700_123 } }),
        extrinsicOf(1, { signed: true, signer }),
      ],
      events: [[successEvent], [failedEvent, transferEvent]],
      blockEvents: [sessionEvent],
      timestamp: InMemoryChainClient.timestampOf(950),
    });
  });

  afterEach(() => {
    sinon.restore();
  });

  describe('isFinalized', () => {
    it('reports blocks more than the finality depth behind head as finalized', () => {
      expect(BlockRecordFactory.isFinalized(850, HEAD)).to.be.true;
      expect(BlockRecordFactory.isFinalized(899, HEAD)).to.be.true;
    });

    it('reports blocks within the finality depth as not finalized', () => {
      expect(BlockRecordFactory.isFinalized(950, HEAD)).to.be.false;
      expect(BlockRecordFactory.isFinalized(900, HEAD)).to.be.false;
      expect(BlockRecordFactory.isFinalized(HEAD, HEAD)).to.be.false;
    });

    it('honours a custom depth', () => {
      expect(BlockRecordFactory.isFinalized(989, HEAD, 10)).to.be.true;
      expect(BlockRecordFactory.isFinalized(990, HEAD, 10)).to.be.false;
    });

    it('applies the depth it was built with', async () => {
      const shallow = new BlockRecordFactory(client, logger, { finalityDepth: 10, now: () => WALL_CLOCK_MILLIS });

      expect((await shallow.createBlockRecord(block, HEAD)).isFinalized).to.be.true;
      expect((await factory.createBlockRecord(block, HEAD)).isFinalized).to.be.false;
    });
  });

  describe('createBlockRecord', () => {
    it('builds the summary of a block', async () => {
      const record = await factory.createBlockRecord(block, HEAD, requestDetails);

      expect(record.number).to.eq(950);
      expect(record.hash).to.eq(InMemoryChainClient.hashOf(950));
      expect(record.parentHash).to.eq(InMemoryChainClient.hashOf(949));
      expect(record.timestamp).to.eq(1_700_005_700);
      expect(record.transactions).to.deep.eq([hashOfBytes([0x04, 0]), hashOfBytes([0x04, 1])]);
      expect(record.stateRoot).to.eq(InMemoryChainClient.hashOf(950, 'c'));
      expect(record.extrinsicsRoot).to.eq(InMemoryChainClient.hashOf(950, 'd'));
      expect(record.extrinsicCount).to.eq(2);
      expect(record.eventCount).to.eq(3);
      expect(record.isFinalized).to.be.false;
    });

    it('marks deep blocks as finalized', async () => {
      const deep = await client.blockAt(InMemoryChainClient.hashOf(850));
      if (deep === null) throw new Error('fixture block 850 missing');

      const record = await factory.createBlockRecord(deep, HEAD);

      expect(record.isFinalized).to.be.true;
      expect(record.extrinsicCount).to.eq(0);
      expect(record.eventCount).to.eq(0);
    });

    it('normalises hashes reported in upper case', async () => {
      const upper: BlockHandle = {
        ...block,
        hash: `0x${block.hash.slice(2).toUpperCase()}`,
        parentHash: `0x${block.parentHash.slice(2).toUpperCase()}`,
      };

      const record = await factory.createBlockRecord(upper, HEAD);

      expect(record.hash).to.eq(InMemoryChainClient.hashOf(950));
      expect(record.parentHash).to.eq(InMemoryChainClient.hashOf(949));
    });

    it('omits the event count when events cannot be read', async () => {
      sinon.stub(client, 'events').rejects(new Error('boom'));

      const record = await factory.createBlockRecord(block, HEAD);

      expect(record.eventCount).to.be.undefined;
      expect(record.extrinsicCount).to.eq(2);
    });

    it('fails with a connection error when extrinsics cannot be listed', async () => {
      sinon.stub(client, 'extrinsics').rejects(new Error('boom'));

      const err = await expectBlockQueryError(factory.createBlockRecord(block, HEAD), BlockQueryErrorKind.CONNECTION);
      expect(err.message).to.eq('Failed to get extrinsics of block 950: boom');
    });

    it('returns an immutable record', async () => {
      const record = await factory.createBlockRecord(block, HEAD);

      expect(Object.isFrozen(record)).to.be.true;
      expect(Object.isFrozen(record.transactions)).to.be.true;
    });
  });

  describe('timestamp', () => {
    it('uses the timestamp storage first', async () => {
      client.setBody(block.hash, {
        extrinsics: [extrinsicOf(0, { pallet: 'Timestamp', call: 'set', args: { now: 1_600_000_000_000 } })],
        timestamp: 1_700_005_700_999,
      });

      const record = await factory.createBlockRecord(block, HEAD);
      expect(record.timestamp).to.eq(1_700_005_700);
    });

    it('falls back to the timestamp inherent when storage is empty', async () => {
      client.setBody(block.hash, {
        extrinsics: [extrinsicOf(0, { pallet: 'Timestamp', call: 'set', args: { now: '1600000000123' } })],
      });

      const record = await factory.createBlockRecord(block, HEAD);
      expect(record.timestamp).to.eq(1_600_000_000);
    });

    it('falls back to the timestamp inherent when storage cannot be read', async () => {
      sinon.stub(client, 'timestampAt').rejects(new Error('storage unavailable'));
      client.setBody(block.hash, {
        extrinsics: [extrinsicOf(0, { pallet: 'Timestamp', call: 'set', args: { now: 1_600_000_000_000n } })],
      });

      const record = await factory.createBlockRecord(block, HEAD);
      expect(record.timestamp).to.eq(1_600_000_000);
    });

    it('falls back to the wall clock and warns', async () => {
      const warnSpy = sinon.spy(logger, 'warn');
      client.setBody(block.hash, { extrinsics: [extrinsicOf(0)] });

      const record = await factory.createBlockRecord(block, HEAD, requestDetails);

      expect(record.timestamp).to.eq(1_800_000_000);
      expect(warnSpy.calledOnce).to.be.true;
    });
  });

  describe('createDetailedBlockRecord', () => {
    it('lists extrinsics and events in block order', async () => {
      const detailed = await factory.createDetailedBlockRecord(block, HEAD, requestDetails);

      expect(detailed.basic.eventCount).to.eq(3);
      expect(detailed.extrinsics.map((e) => ({ ...e }))).to.deep.eq([
        {
          index: 0,
          hash: hashOfBytes([0x04, 0]),
          signed: false,
          signer: undefined,
          pallet: 'Timestamp',
          call: 'set',
          success: true,
        },
        {
          index: 1,
          hash: hashOfBytes([0x04, 1]),
          signed: true,
          signer,
          pallet: 'Balances',
          call: 'transfer',
          success: false,
        },
      ]);
      expect(detailed.events.map((e) => ({ ...e }))).to.deep.eq([
        { index: 0, extrinsicIndex: 0, pallet: 'System', event: 'ExtrinsicSuccess' },
        { index: 1, extrinsicIndex: 1, pallet: 'System', event: 'ExtrinsicFailed' },
        { index: 2, extrinsicIndex: 1, pallet: 'Balances', event: 'Transfer' },
        { index: 3, extrinsicIndex: undefined, pallet: 'Session', event: 'NewSession' },
      ]);
    });

    it('names unresolved pallets and calls Unknown and drops signers of unsigned extrinsics', async () => {
      client.setBody(block.hash, {
        extrinsics: [extrinsicOf(0, { pallet: undefined, call: undefined, signed: false, signer })],
        timestamp: InMemoryChainClient.timestampOf(950),
      });

      const detailed = await factory.createDetailedBlockRecord(block, HEAD);

      expect(detailed.extrinsics[0].pallet).to.eq('Unknown');
      expect(detailed.extrinsics[0].call).to.eq('Unknown');
      expect(detailed.extrinsics[0].signer).to.be.undefined;
      expect(detailed.extrinsics[0].success).to.be.false;
    });

    it('fails as a whole when any event list cannot be read', async () => {
      sinon.stub(client, 'events').callsFake(async (_block, extrinsic) => {
        if (extrinsic.index === 1) throw new Error('boom');
        return [successEvent];
      });

      const err = await expectBlockQueryError(
        factory.createDetailedBlockRecord(block, HEAD),
        BlockQueryErrorKind.CONNECTION,
      );
      expect(err.message).to.eq('Failed to get events of block 950: boom');
    });

    it('works with clients that expose no block-level events', async () => {
      const minimal: ChainClient = {
        head: () => client.head(),
        blockAt: (hash) => client.blockAt(hash),
        extrinsics: (b) => client.extrinsics(b),
        events: (b, e) => client.events(b, e),
      };

      const detailed = await new BlockRecordFactory(minimal, logger).createDetailedBlockRecord(block, HEAD);

      expect(detailed.events).to.have.length(3);
      expect(detailed.basic.timestamp).to.eq(1_700_005_700);
    });
  });
});
