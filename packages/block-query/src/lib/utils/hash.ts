// SPDX-License-Identifier: Apache-2.0

import { blake2AsU8a } from '@polkadot/util-crypto';

import type { Hasher } from '../types';

/**
 * BLAKE2b-256, the digest Substrate chains use for extrinsic hashes.
 */
export const blake2Hash256: Hasher = (bytes: Uint8Array): Uint8Array => blake2AsU8a(bytes, 256);
