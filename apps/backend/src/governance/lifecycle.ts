/**
 * Proposal lifecycle: PENDING → ACTIVE → ENDED → FINALIZED.
 * Derived from the chain clock plus the terminal flag; nothing is stored
 * except `finalized`, so a state is never revisited.
 */

import type { ProposalState } from '@crossvote/shared';
import type { ProposalRecord } from './types.js';

export function proposalState(proposal: ProposalRecord, now: number): ProposalState {
  if (proposal.finalized) return 'FINALIZED';
  if (now < proposal.start) return 'PENDING';
  if (now <= proposal.end) return 'ACTIVE';
  return 'ENDED';
}

/** Votes are accepted only while start ≤ now ≤ end and not yet finalized. */
export function isVotingOpen(proposal: ProposalRecord, now: number): boolean {
  return proposalState(proposal, now) === 'ACTIVE';
}

export function sumTally(tally: ReadonlyMap<string, bigint>): bigint {
  let total = 0n;
  for (const weight of tally.values()) total += weight;
  return total;
}
