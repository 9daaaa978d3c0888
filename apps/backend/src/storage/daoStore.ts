import { getAddress } from 'viem';
import { z } from 'zod';
import { zAddress, zBytes32, zUint256 } from '@crossvote/shared';
import type { DaoRecord } from '../governance/types.js';
import { amount, normalizeId } from '../lib/hex.js';
import { createKeyedStore, type KeyedStore } from './keyedStore.js';

const PersistedDaoSchema = z.object({
  id: zBytes32,
  controller: zAddress,
  name: z.string(),
  description: z.string(),
  metadataRef: z.string(),
  governanceToken: zAddress,
  minimumTokens: zUint256,
  createdAt: z.number(),
});

export type DaoStore = KeyedStore<DaoRecord>;

/** DAO records by id. Append-only at the registry level; `put` also carries updates. */
export function createDaoStore(options: { file?: string } = {}): DaoStore {
  return createKeyedStore<DaoRecord, z.output<typeof PersistedDaoSchema>>({
    file: options.file,
    entrySchema: PersistedDaoSchema,
    keyOf: (dao) => dao.id,
    encode: (dao) => ({ ...dao, minimumTokens: amount(dao.minimumTokens) }),
    decode: (entry) => ({
      ...entry,
      id: normalizeId(entry.id),
      controller: getAddress(entry.controller),
      governanceToken: getAddress(entry.governanceToken),
    }),
  });
}
