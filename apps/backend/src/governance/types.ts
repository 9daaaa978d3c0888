import type { Address, Hex } from 'viem';
import type { ProposalOrigin, ProposalOutcome, ProposalState } from '@crossvote/shared';

/** Chain clock in unix seconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export interface DaoRecord {
  readonly id: Hex;
  readonly controller: Address;
  readonly name: string;
  readonly description: string;
  readonly metadataRef: string;
  readonly governanceToken: Address;
  readonly minimumTokens: bigint;
  readonly createdAt: number;
}

/**
 * A proposal and its tally. Records are replaced, never mutated in place,
 * so a reference handed to a reader is a stable snapshot.
 *
 * totalWeight always equals sum(tally.values()).
 */
export interface ProposalRecord {
  readonly id: Hex;
  readonly daoId: Hex;
  readonly description: string;
  readonly start: number;
  readonly end: number;
  readonly quorum: bigint;
  readonly tally: ReadonlyMap<Address, bigint>;
  readonly totalWeight: bigint;
  /** Dedup keys of remote votes already counted. */
  readonly appliedMessages: ReadonlySet<Hex>;
  readonly origin: ProposalOrigin;
  readonly finalized: { readonly at: number; readonly outcome: ProposalOutcome } | null;
  readonly createdAt: number;
}

export interface ProposalView {
  proposal: ProposalRecord;
  state: ProposalState;
}

/** Who is asking: a local caller, or a message that came through a trusted remote. */
export type Authority =
  | { kind: 'caller'; address: Address }
  | { kind: 'remote'; origin: number };

export type VoteSource =
  | { kind: 'local' }
  | { kind: 'remote'; origin: number; dedupKey: Hex };
