// SPDX-License-Identifier: Apache-2.0

import { isHex, u8aToHex } from '@polkadot/util';

import constants from './lib/constants';

const HASH_HEX_LENGTH = constants.HASH_BYTE_LENGTH * 2;

/**
 * Format message prefix for logger.
 */
const formatRequestIdMessage = (requestId?: string): string => {
  return requestId ? `[Request ID: ${requestId}]` : '';
};

const prepend0x = (input: string): string => {
  return input.startsWith(constants.HEX_PREFIX) ? input : constants.HEX_PREFIX + input;
};

const strip0x = (input: string): string => {
  return input.startsWith(constants.HEX_PREFIX) ? input.substring(2) : input;
};

/**
 * Checks that the input is exactly 32 bytes of hex, with or without the `0x` prefix.
 */
const isValidHash32 = (input: string): boolean => {
  const body = strip0x(input);
  return body.length === HASH_HEX_LENGTH && isHex(prepend0x(body), constants.HASH_BYTE_LENGTH * 8);
};

/**
 * Canonical form of a 32-byte hash: lower case with the `0x` prefix.
 * Callers are expected to have validated the input with {@link isValidHash32}.
 */
const toHash32 = (input: string): string => {
  return prepend0x(strip0x(input).toLowerCase());
};

const bytesToHex = (bytes: Uint8Array): string => u8aToHex(bytes);

const millisToSeconds = (millis: number): number => Math.floor(millis / 1000);

export { bytesToHex, formatRequestIdMessage, isValidHash32, millisToSeconds, prepend0x, strip0x, toHash32 };
