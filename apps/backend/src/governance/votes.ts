/**
 * Vote aggregator. Weight is additive: every accepted vote adds to the
 * voter's running total and to the proposal total.
 *
 * Oracle reads are async, so the final commit re-reads the proposal and
 * re-checks everything a concurrent call could have changed (window,
 * finalization, dedup key) before writing. The commit itself is synchronous
 * and therefore never interleaves with another.
 *
 * Remote votes carry a dedup key; a key already applied to the proposal is
 * discarded without touching the tally, so transport redelivery never
 * double counts.
 */

import { getAddress, type Address, type Hex } from 'viem';
import type { MembershipOracle } from '../services/membership.js';
import type { DaoStore } from '../storage/daoStore.js';
import type { ProposalStore } from '../storage/proposalStore.js';
import type { EventLog } from '../storage/logStore.js';
import { amount, normalizeId } from '../lib/hex.js';
import { fail, type GovernanceFailure } from './errors.js';
import { isVotingOpen } from './lifecycle.js';
import type { Clock, ProposalRecord, VoteSource } from './types.js';

export type ApplyVoteResult =
  | {
      ok: true;
      duplicate: false;
      proposalId: Hex;
      voter: Address;
      voterWeight: bigint;
      totalWeight: bigint;
    }
  | { ok: true; duplicate: true; proposalId: Hex; voter: Address; totalWeight: bigint }
  | GovernanceFailure;

export interface VoteAggregator {
  applyVote(proposalId: Hex, voter: Address, weight: bigint, source: VoteSource): Promise<ApplyVoteResult>;
}

export interface VoteAggregatorDeps {
  daos: DaoStore;
  proposals: ProposalStore;
  membership: MembershipOracle;
  log: EventLog;
  clock: Clock;
}

function sourceLabel(source: VoteSource): Record<string, unknown> {
  return source.kind === 'remote'
    ? { source: 'remote', origin: source.origin, dedupKey: source.dedupKey }
    : { source: 'local' };
}

export function createVoteAggregator(deps: VoteAggregatorDeps): VoteAggregator {
  const { daos, proposals, membership, log, clock } = deps;

  function discardDuplicate(proposal: ProposalRecord, voter: Address, source: VoteSource): ApplyVoteResult | null {
    if (source.kind !== 'remote' || !proposal.appliedMessages.has(source.dedupKey)) return null;
    log.append(
      'VOTE_DUPLICATE_DISCARDED',
      { proposalId: proposal.id, voter, ...sourceLabel(source) },
      'WARN',
    );
    return { ok: true, duplicate: true, proposalId: proposal.id, voter, totalWeight: proposal.totalWeight };
  }

  function commit(proposalId: Hex, voter: Address, weight: bigint, source: VoteSource): ApplyVoteResult {
    const current = proposals.get(proposalId);
    if (!current) return fail('PROPOSAL_NOT_FOUND', `Proposal ${proposalId} not found`);

    const duplicate = discardDuplicate(current, voter, source);
    if (duplicate) return duplicate;
    if (!isVotingOpen(current, clock())) {
      return fail('VOTING_NOT_ACTIVE', `Voting on ${proposalId} is not open`);
    }

    const tally = new Map(current.tally);
    const voterWeight = (tally.get(voter) ?? 0n) + weight;
    tally.set(voter, voterWeight);

    const appliedMessages = new Set(current.appliedMessages);
    if (source.kind === 'remote') appliedMessages.add(source.dedupKey);

    const next: ProposalRecord = {
      ...current,
      tally,
      totalWeight: current.totalWeight + weight,
      appliedMessages,
    };
    proposals.put(next);

    log.append('VOTE_ACCEPTED', {
      proposalId,
      voter,
      weight: amount(weight),
      voterWeight: amount(voterWeight),
      totalWeight: amount(next.totalWeight),
      ...sourceLabel(source),
    });
    return { ok: true, duplicate: false, proposalId, voter, voterWeight, totalWeight: next.totalWeight };
  }

  return {
    async applyVote(rawId, rawVoter, weight, rawSource) {
      const proposalId = normalizeId(rawId);
      const voter = getAddress(rawVoter);
      const source: VoteSource =
        rawSource.kind === 'remote' ? { ...rawSource, dedupKey: normalizeId(rawSource.dedupKey) } : rawSource;

      if (weight <= 0n) return fail('INVALID_WEIGHT', 'Vote weight must be greater than zero');

      const known = proposals.get(proposalId);
      if (known) {
        const duplicate = discardDuplicate(known, voter, source);
        if (duplicate) return duplicate;
      }

      if (!(await membership.isWhitelisted(voter))) {
        return fail('NOT_ELIGIBLE', `${voter} is not whitelisted`);
      }

      const proposal = proposals.get(proposalId);
      if (!proposal) return fail('PROPOSAL_NOT_FOUND', `Proposal ${proposalId} not found`);
      if (!isVotingOpen(proposal, clock())) {
        return fail('VOTING_NOT_ACTIVE', `Voting on ${proposalId} is not open`);
      }

      const dao = daos.get(proposal.daoId);
      if (!dao) return fail('UNKNOWN_DAO', `DAO ${proposal.daoId} is not registered`);
      const balance = await membership.balanceOf(dao.governanceToken, voter);
      if (balance < dao.minimumTokens) {
        return fail(
          'INSUFFICIENT_TOKENS',
          `${voter} holds ${amount(balance)} of ${dao.governanceToken}, needs ${amount(dao.minimumTokens)}`,
        );
      }

      return commit(proposalId, voter, weight, source);
    },
  };
}
