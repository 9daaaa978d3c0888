/**
 * Finalization controller: ENDED → FINALIZED, once.
 * Records whether the tally reached quorum at the moment of finalization.
 */

import type { Hex } from 'viem';
import type { ProposalOutcome } from '@crossvote/shared';
import type { DaoStore } from '../storage/daoStore.js';
import type { ProposalStore } from '../storage/proposalStore.js';
import type { EventLog } from '../storage/logStore.js';
import { amount, normalizeId } from '../lib/hex.js';
import { fail, type GovernanceFailure } from './errors.js';
import { isController } from './proposals.js';
import type { Authority, Clock, ProposalRecord } from './types.js';

export type FinalizeResult =
  | { ok: true; proposal: ProposalRecord; outcome: ProposalOutcome }
  | GovernanceFailure;

export interface FinalizationController {
  finalize(proposalId: Hex, authority: Authority): FinalizeResult;
}

export interface FinalizationDeps {
  daos: DaoStore;
  proposals: ProposalStore;
  log: EventLog;
  clock: Clock;
}

export function quorumOutcome(proposal: ProposalRecord): ProposalOutcome {
  return proposal.totalWeight >= proposal.quorum ? 'PASSED' : 'FAILED';
}

export function createFinalizationController(deps: FinalizationDeps): FinalizationController {
  const { daos, proposals, log, clock } = deps;

  return {
    finalize(rawId, authority) {
      const proposalId = normalizeId(rawId);
      const proposal = proposals.get(proposalId);
      if (!proposal) return fail('PROPOSAL_NOT_FOUND', `Proposal ${proposalId} not found`);

      const dao = daos.get(proposal.daoId);
      if (!dao) return fail('UNKNOWN_DAO', `DAO ${proposal.daoId} is not registered`);
      if (!isController(authority, dao.controller)) {
        return fail('UNAUTHORIZED', 'Only the DAO controller can finalize its proposals');
      }

      const now = clock();
      if (!(now > proposal.end)) {
        return fail('VOTING_STILL_ACTIVE', `Voting on ${proposalId} runs until ${proposal.end}`);
      }
      if (proposal.finalized) {
        return fail('ALREADY_FINALIZED', `Proposal ${proposalId} was finalized at ${proposal.finalized.at}`);
      }

      const outcome = quorumOutcome(proposal);
      const next: ProposalRecord = { ...proposal, finalized: { at: now, outcome } };
      proposals.put(next);

      log.append('PROPOSAL_FINALIZED', {
        proposalId,
        daoId: proposal.daoId,
        outcome,
        totalWeight: amount(proposal.totalWeight),
        quorum: amount(proposal.quorum),
        via: authority.kind === 'remote' ? { kind: 'remote', origin: authority.origin } : { kind: 'caller' },
      });
      console.log(`[finalization] ${proposalId} finalized: ${outcome}`);
      return { ok: true, proposal: next, outcome };
    },
  };
}
