/**
 * Proposal store: creation and read-only snapshots.
 * Tallies are only ever changed by the vote aggregator and the
 * finalization controller.
 */

import { isAddressEqual, type Address, type Hex } from 'viem';
import type { ProposalOrigin } from '@crossvote/shared';
import type { DaoStore } from '../storage/daoStore.js';
import type { ProposalStore } from '../storage/proposalStore.js';
import type { EventLog } from '../storage/logStore.js';
import { amount, normalizeId } from '../lib/hex.js';
import { fail, type GovernanceFailure } from './errors.js';
import { proposalState } from './lifecycle.js';
import type { Authority, Clock, ProposalRecord, ProposalView } from './types.js';

export interface CreateProposalInput {
  daoId: Hex;
  proposalId: Hex;
  description: string;
  start: number;
  end: number;
  quorum: bigint;
}

export type CreateProposalResult = { ok: true; proposal: ProposalRecord } | GovernanceFailure;
export type GetProposalResult = ({ ok: true } & ProposalView) | GovernanceFailure;

export interface ProposalService {
  create(authority: Authority, input: CreateProposalInput): CreateProposalResult;
  get(proposalId: Hex): GetProposalResult;
  list(): ProposalView[];
}

export interface ProposalServiceDeps {
  daos: DaoStore;
  proposals: ProposalStore;
  log: EventLog;
  clock: Clock;
}

function originOf(authority: Authority): ProposalOrigin {
  return authority.kind === 'remote' ? { kind: 'remote', domain: authority.origin } : { kind: 'local' };
}

export function isController(authority: Authority, controller: Address): boolean {
  // Remote authority was established by the trusted-remote check before dispatch.
  return authority.kind === 'remote' || isAddressEqual(authority.address, controller);
}

export function createProposalService(deps: ProposalServiceDeps): ProposalService {
  const { daos, proposals, log, clock } = deps;

  return {
    create(authority, input) {
      const daoId = normalizeId(input.daoId);
      const proposalId = normalizeId(input.proposalId);

      const dao = daos.get(daoId);
      if (!dao) return fail('UNKNOWN_DAO', `DAO ${daoId} is not registered`);
      if (!isController(authority, dao.controller)) {
        return fail('UNAUTHORIZED', 'Only the DAO controller can create proposals');
      }
      if (proposals.has(proposalId)) {
        return fail('DUPLICATE_PROPOSAL', `Proposal ${proposalId} already exists`);
      }
      if (!(input.end > input.start)) {
        return fail('INVALID_WINDOW', `Voting window must end after it starts (start=${input.start}, end=${input.end})`);
      }

      const proposal: ProposalRecord = {
        id: proposalId,
        daoId,
        description: input.description,
        start: input.start,
        end: input.end,
        quorum: input.quorum,
        tally: new Map<Address, bigint>(),
        totalWeight: 0n,
        appliedMessages: new Set<Hex>(),
        origin: originOf(authority),
        finalized: null,
        createdAt: clock(),
      };
      proposals.put(proposal);

      log.append('PROPOSAL_CREATED', {
        proposalId,
        daoId,
        start: proposal.start,
        end: proposal.end,
        quorum: amount(proposal.quorum),
        origin: proposal.origin,
      });
      return { ok: true, proposal };
    },

    get(rawId) {
      const proposal = proposals.get(rawId);
      if (!proposal) return fail('PROPOSAL_NOT_FOUND', `Proposal ${normalizeId(rawId)} not found`);
      return { ok: true, proposal, state: proposalState(proposal, clock()) };
    },

    list() {
      const now = clock();
      return proposals
        .list()
        .map((proposal) => ({ proposal, state: proposalState(proposal, now) }))
        .sort((a, b) => b.proposal.createdAt - a.proposal.createdAt);
    },
  };
}
