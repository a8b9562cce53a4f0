// SPDX-License-Identifier: Apache-2.0

export default {
  HASH_BYTE_LENGTH: 32,
  HEX_PREFIX: '0x',

  // One bounds RPC fan-out, the other is the finality assumption; keep them independent.
  DEFAULT_MAX_TRAVERSE_DEPTH: 100,
  DEFAULT_FINALITY_DEPTH: 100,

  UNKNOWN_NAME: 'Unknown',

  SYSTEM_PALLET: 'System',
  EXTRINSIC_SUCCESS_EVENT: 'ExtrinsicSuccess',

  TIMESTAMP_PALLET: 'Timestamp',
  TIMESTAMP_SET_CALL: 'set',
  TIMESTAMP_ARG: 'now',

  CALLING_METHODS: {
    GET_BLOCK_BY_NUMBER: 'getBlockByNumber',
    GET_DETAILED_BLOCK: 'getDetailedBlock',
  },
} as const;
