import { getAddress, type Address, type Hex } from 'viem';
import { z } from 'zod';
import { zBytes32, zDomainId, zUint256 } from '@crossvote/shared';
import type { ProposalRecord } from '../governance/types.js';
import { sumTally } from '../governance/lifecycle.js';
import { amount, normalizeId } from '../lib/hex.js';
import { createKeyedStore, type KeyedStore } from './keyedStore.js';

const PersistedProposalSchema = z.object({
  id: zBytes32,
  daoId: zBytes32,
  description: z.string(),
  start: z.number(),
  end: z.number(),
  quorum: zUint256,
  tally: z.record(zUint256),
  totalWeight: zUint256,
  appliedMessages: z.array(zBytes32),
  origin: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('local') }),
    z.object({ kind: z.literal('remote'), domain: zDomainId }),
  ]),
  finalized: z.object({ at: z.number(), outcome: z.enum(['PASSED', 'FAILED']) }).nullable(),
  createdAt: z.number(),
});

export type ProposalStore = KeyedStore<ProposalRecord>;

function encode(p: ProposalRecord): unknown {
  const tally: Record<string, string> = {};
  for (const [voter, weight] of p.tally) tally[voter] = amount(weight);
  return {
    ...p,
    quorum: amount(p.quorum),
    tally,
    totalWeight: amount(p.totalWeight),
    appliedMessages: [...p.appliedMessages],
  };
}

function decode(entry: z.output<typeof PersistedProposalSchema>): ProposalRecord {
  const tally = new Map<Address, bigint>();
  for (const [voter, weight] of Object.entries(entry.tally)) tally.set(getAddress(voter), weight);
  if (sumTally(tally) !== entry.totalWeight) {
    throw new Error(`proposal ${entry.id}: totalWeight ${entry.totalWeight} does not match its tally`);
  }
  return {
    ...entry,
    id: normalizeId(entry.id),
    daoId: normalizeId(entry.daoId),
    tally,
    appliedMessages: new Set<Hex>(entry.appliedMessages.map(normalizeId)),
  };
}

/** Proposal records by id. Ids are unique per chain, across all DAOs. */
export function createProposalStore(options: { file?: string } = {}): ProposalStore {
  return createKeyedStore<ProposalRecord, z.output<typeof PersistedProposalSchema>>({
    file: options.file,
    entrySchema: PersistedProposalSchema,
    keyOf: (p) => p.id,
    encode,
    decode,
  });
}
