// SPDX-License-Identifier: Apache-2.0

import type { RequestDetails } from './RequestDetails';

export interface QueryOptions {
  /** Checked before the head fetch and before every traversal hop. */
  signal?: AbortSignal;
  requestDetails?: RequestDetails;
}
