// SPDX-License-Identifier: Apache-2.0

import { BlockRecord, DetailedBlockRecord } from '../../model';
import type { QueryOptions } from '../../types';

export interface IBlockResolver {
  getBlockByNumber: (blockNumber: number, options?: QueryOptions) => Promise<BlockRecord>;
  getBlockByHash: (hash: string, options?: QueryOptions) => Promise<BlockRecord>;
  getDetailedBlock: (blockNumber: number, options?: QueryOptions) => Promise<DetailedBlockRecord>;
  getDetailedBlockByHash: (hash: string, options?: QueryOptions) => Promise<DetailedBlockRecord>;
}
