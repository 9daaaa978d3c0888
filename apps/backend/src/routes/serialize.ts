import type { DaoSummary, ProposalSummary } from '@crossvote/shared';
import type { DaoRecord, ProposalView } from '../governance/types.js';
import { amount } from '../lib/hex.js';

// uint256 values leave the node as decimal strings.

export function toDaoSummary(dao: DaoRecord): DaoSummary {
  return {
    id: dao.id,
    controller: dao.controller,
    name: dao.name,
    description: dao.description,
    metadataRef: dao.metadataRef,
    governanceToken: dao.governanceToken,
    minimumTokens: amount(dao.minimumTokens),
    createdAt: dao.createdAt,
  };
}

export function toProposalSummary({ proposal, state }: ProposalView): ProposalSummary {
  const tally: Record<string, string> = {};
  for (const [voter, weight] of proposal.tally) tally[voter] = amount(weight);

  return {
    id: proposal.id,
    daoId: proposal.daoId,
    description: proposal.description,
    start: proposal.start,
    end: proposal.end,
    quorum: amount(proposal.quorum),
    totalWeight: amount(proposal.totalWeight),
    tally,
    state,
    outcome: proposal.finalized?.outcome ?? null,
    finalizedAt: proposal.finalized?.at ?? null,
    origin: proposal.origin,
    createdAt: proposal.createdAt,
  };
}
