// SPDX-License-Identifier: Apache-2.0

/**
 * JSON form of {@link BlockRecord}.
 *
 * Field names are snake_case for compatibility with existing payloads. The fields
 * `state_root`, `extrinsics_root`, `extrinsic_count`, `event_count` and
 * `is_finalized` were added after the first release; payloads without them decode
 * to absent roots, a zero extrinsic count, an absent event count and `false`.
 */

import { predefined } from '../errors/BlockQueryError';
import { BlockRecord } from '../model';

export interface BlockRecordPayload {
  number: number;
  hash: string;
  parent_hash: string;
  timestamp: number;
  transactions: string[];
  state_root?: string | null;
  extrinsics_root?: string | null;
  extrinsic_count?: number;
  event_count?: number | null;
  is_finalized?: boolean;
}

type JsonObject = Record<string, unknown>;

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function requireCount(payload: JsonObject, field: string): number {
  const value = payload[field];
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw predefined.INVALID_RECORD_PAYLOAD(`${field} must be a non-negative integer`);
  }
  return value;
}

function requireString(payload: JsonObject, field: string): string {
  const value = payload[field];
  if (typeof value !== 'string') {
    throw predefined.INVALID_RECORD_PAYLOAD(`${field} must be a string`);
  }
  return value;
}

function optionalString(payload: JsonObject, field: string): string | undefined {
  const value = payload[field];
  if (value === undefined || value === null) return undefined;
  return requireString(payload, field);
}

function optionalCount(payload: JsonObject, field: string): number | undefined {
  const value = payload[field];
  if (value === undefined || value === null) return undefined;
  return requireCount(payload, field);
}

export function toBlockRecordPayload(record: BlockRecord): BlockRecordPayload {
  return {
    number: record.number,
    hash: record.hash,
    parent_hash: record.parentHash,
    timestamp: record.timestamp,
    transactions: [...record.transactions],
    state_root: record.stateRoot ?? null,
    extrinsics_root: record.extrinsicsRoot ?? null,
    extrinsic_count: record.extrinsicCount,
    event_count: record.eventCount ?? null,
    is_finalized: record.isFinalized,
  };
}

/**
 * Builds a record from an already parsed payload. Counts are taken as given and
 * never reconciled with the transaction list.
 *
 * @throws BlockQueryError (InvalidInput) when a field has the wrong type
 */
export function fromBlockRecordPayload(payload: unknown): BlockRecord {
  if (!isJsonObject(payload)) {
    throw predefined.INVALID_RECORD_PAYLOAD('expected a JSON object');
  }

  const transactions = payload.transactions;
  if (!Array.isArray(transactions) || !transactions.every((tx): tx is string => typeof tx === 'string')) {
    throw predefined.INVALID_RECORD_PAYLOAD('transactions must be an array of strings');
  }

  const rawIsFinalized = payload.is_finalized;
  let isFinalized = false;
  if (rawIsFinalized !== undefined) {
    if (typeof rawIsFinalized !== 'boolean') {
      throw predefined.INVALID_RECORD_PAYLOAD('is_finalized must be a boolean');
    }
    isFinalized = rawIsFinalized;
  }

  return new BlockRecord({
    number: requireCount(payload, 'number'),
    hash: requireString(payload, 'hash'),
    parentHash: requireString(payload, 'parent_hash'),
    timestamp: requireCount(payload, 'timestamp'),
    transactions,
    stateRoot: optionalString(payload, 'state_root'),
    extrinsicsRoot: optionalString(payload, 'extrinsics_root'),
    extrinsicCount: optionalCount(payload, 'extrinsic_count') ?? 0,
    eventCount: optionalCount(payload, 'event_count'),
    isFinalized,
  });
}

export function serializeBlockRecord(record: BlockRecord): string {
  return JSON.stringify(toBlockRecordPayload(record));
}

/**
 * @throws BlockQueryError (InvalidInput) on malformed JSON or fields
 */
export function deserializeBlockRecord(json: string): BlockRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    throw predefined.INVALID_RECORD_PAYLOAD(e instanceof Error ? e.message : String(e));
  }
  return fromBlockRecordPayload(parsed);
}
