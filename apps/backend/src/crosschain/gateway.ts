/**
 * Cross-chain gateway of one chain node.
 *
 * Outbound: authorizes the local caller, encodes the intent and hands it to
 * the transport. The receiving chain trusts the channel, so every
 * controller check for a remote effect happens here.
 *
 * Inbound: authenticates the sender against the trusted-remote table,
 * decodes the envelope and routes it by its kind tag into the same
 * services a local call uses.
 */

import { isAddressEqual, type Address, type Hex } from 'viem';
import type { DispatchReceipt, InboundDelivery, InboundResult, LogEventType } from '@crossvote/shared';
import type { DaoStore } from '../storage/daoStore.js';
import type { OutboxStore } from '../storage/outboxStore.js';
import type { EventLog } from '../storage/logStore.js';
import type { ProposalService } from '../governance/proposals.js';
import type { VoteAggregator } from '../governance/votes.js';
import type { FinalizationController } from '../governance/finalization.js';
import { fail, type GovernanceFailure } from '../governance/errors.js';
import { amount, normalizeId, toBytes32 } from '../lib/hex.js';
import { decodeMessage, encodeMessage, voteDedupKey, type CrossChainMessage } from './envelope.js';
import type { MessageTransport } from './transport.js';

export interface SendCreateProposalInput {
  destination: number;
  daoId: Hex;
  proposalId: Hex;
  description: string;
  start: number;
  end: number;
  quorum: bigint;
}

export interface SendVoteInput {
  destination: number;
  proposalId: Hex;
  weight: bigint;
}

export interface SendFinalizeInput {
  destination: number;
  proposalId: Hex;
}

export type SendResult = { ok: true; receipt: DispatchReceipt } | GovernanceFailure;
export type InboundOutcome = ({ ok: true } & InboundResult) | GovernanceFailure;

export interface CrossChainGateway {
  sendCreateProposal(caller: Address, input: SendCreateProposalInput): Promise<SendResult>;
  sendVote(caller: Address, input: SendVoteInput): Promise<SendResult>;
  sendFinalize(caller: Address, input: SendFinalizeInput): Promise<SendResult>;
  handleInbound(delivery: InboundDelivery): Promise<InboundOutcome>;
  /** Trusted remote gateways by domain, bytes32 form. */
  remotes(): ReadonlyMap<number, Hex>;
}

export interface CrossChainGatewayDeps {
  /** Domain id of this chain. */
  domain: number;
  /** domain → bytes32 of the only gateway accepted from that domain. */
  trustedRemotes: ReadonlyMap<number, Hex>;
  transport: MessageTransport;
  outbox: OutboxStore;
  daos: DaoStore;
  proposals: ProposalService;
  votes: VoteAggregator;
  finalization: FinalizationController;
  log: EventLog;
}

const DISPATCHED_EVENT: Record<CrossChainMessage['kind'], LogEventType> = {
  CREATE_PROPOSAL: 'CROSSCHAIN_PROPOSAL_DISPATCHED',
  VOTE: 'CROSSCHAIN_VOTE_DISPATCHED',
  FINALIZE: 'CROSSCHAIN_FINALIZE_DISPATCHED',
};

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled message: ${JSON.stringify(value)}`);
}

export function createCrossChainGateway(deps: CrossChainGatewayDeps): CrossChainGateway {
  const { domain, transport, outbox, daos, proposals, votes, finalization, log } = deps;
  const trusted = new Map<number, Hex>();
  for (const [remoteDomain, gateway] of deps.trustedRemotes) trusted.set(remoteDomain, toBytes32(gateway));

  function ownsDao(caller: Address, daoId: Hex): GovernanceFailure | null {
    const dao = daos.get(daoId);
    if (!dao) return fail('UNKNOWN_DAO', `DAO ${normalizeId(daoId)} is not registered`);
    if (!isAddressEqual(caller, dao.controller)) {
      return fail('UNAUTHORIZED', 'Only the DAO controller can send this message');
    }
    return null;
  }

  async function dispatch(
    message: CrossChainMessage,
    destination: number,
    recipient: Hex,
    nonce?: bigint,
  ): Promise<SendResult> {
    const payload = encodeMessage(message);
    const details = {
      kind: message.kind,
      destination,
      proposalId: message.proposalId,
      ...(nonce === undefined ? {} : { nonce: amount(nonce) }),
    };

    let messageId: Hex;
    try {
      ({ messageId } = await transport.send(destination, recipient, payload));
    } catch (err) {
      const reason = errorMessage(err);
      log.append('CROSSCHAIN_DISPATCH_FAILED', { ...details, reason }, 'ERROR');
      console.error(`[gateway] ${message.kind} to domain ${destination} not accepted: ${reason}`);
      return fail('DISPATCH_FAILED', `Transport did not accept ${message.kind} for domain ${destination}: ${reason}`);
    }

    log.append(DISPATCHED_EVENT[message.kind], { ...details, recipient, messageId });
    return {
      ok: true,
      receipt: {
        kind: message.kind,
        destination,
        recipient,
        messageId,
        ...(nonce === undefined ? {} : { nonce: amount(nonce) }),
      },
    };
  }

  async function route(message: CrossChainMessage, origin: number): Promise<InboundOutcome> {
    switch (message.kind) {
      case 'CREATE_PROPOSAL': {
        const result = proposals.create(
          { kind: 'remote', origin },
          {
            daoId: message.daoId,
            proposalId: message.proposalId,
            description: message.description,
            start: message.start,
            end: message.end,
            quorum: message.quorum,
          },
        );
        if (!result.ok) return result;
        return { ok: true, kind: message.kind, proposalId: result.proposal.id, duplicate: false };
      }
      case 'VOTE': {
        const dedupKey = voteDedupKey({
          proposalId: message.proposalId,
          origin,
          voter: message.voter,
          nonce: message.nonce,
        });
        const result = await votes.applyVote(message.proposalId, message.voter, message.weight, {
          kind: 'remote',
          origin,
          dedupKey,
        });
        if (!result.ok) return result;
        return { ok: true, kind: message.kind, proposalId: result.proposalId, duplicate: result.duplicate };
      }
      case 'FINALIZE': {
        const result = finalization.finalize(message.proposalId, { kind: 'remote', origin });
        if (!result.ok) return result;
        return { ok: true, kind: message.kind, proposalId: result.proposal.id, duplicate: false };
      }
      default:
        return assertNever(message);
    }
  }

  function reject(delivery: InboundDelivery, failure: GovernanceFailure, kind?: string): GovernanceFailure {
    log.append(
      'CROSSCHAIN_MESSAGE_REJECTED',
      {
        origin: delivery.origin,
        messageId: delivery.messageId ?? null,
        kind: kind ?? null,
        code: failure.code,
        reason: failure.reason,
      },
      'WARN',
    );
    console.warn(`[gateway] rejected message from domain ${delivery.origin}: ${failure.code}`);
    return failure;
  }

  return {
    async sendCreateProposal(caller, input) {
      const recipient = trusted.get(input.destination);
      if (!recipient) return fail('UNKNOWN_DESTINATION', `No trusted gateway for domain ${input.destination}`);
      const denied = ownsDao(caller, input.daoId);
      if (denied) return denied;

      return dispatch(
        {
          kind: 'CREATE_PROPOSAL',
          daoId: normalizeId(input.daoId),
          proposalId: normalizeId(input.proposalId),
          description: input.description,
          start: input.start,
          end: input.end,
          quorum: input.quorum,
        },
        input.destination,
        recipient,
      );
    },

    async sendVote(caller, input) {
      const recipient = trusted.get(input.destination);
      if (!recipient) return fail('UNKNOWN_DESTINATION', `No trusted gateway for domain ${input.destination}`);
      if (input.weight <= 0n) return fail('INVALID_WEIGHT', 'Vote weight must be greater than zero');

      const nonce = outbox.next(input.destination);
      return dispatch(
        { kind: 'VOTE', proposalId: normalizeId(input.proposalId), voter: caller, weight: input.weight, nonce },
        input.destination,
        recipient,
        nonce,
      );
    },

    async sendFinalize(caller, input) {
      const recipient = trusted.get(input.destination);
      if (!recipient) return fail('UNKNOWN_DESTINATION', `No trusted gateway for domain ${input.destination}`);
      const local = proposals.get(input.proposalId);
      if (!local.ok) return local;
      const denied = ownsDao(caller, local.proposal.daoId);
      if (denied) return denied;

      return dispatch({ kind: 'FINALIZE', proposalId: local.proposal.id }, input.destination, recipient);
    },

    async handleInbound(delivery) {
      const expected = trusted.get(delivery.origin);
      if (!expected || toBytes32(delivery.sender) !== expected) {
        return reject(
          delivery,
          fail('UNAUTHORIZED', `Sender ${delivery.sender} is not the trusted gateway of domain ${delivery.origin}`),
        );
      }

      const decoded = decodeMessage(delivery.payload);
      if (!decoded.ok) return reject(delivery, decoded);

      const { message } = decoded;
      const outcome = await route(message, delivery.origin);
      if (!outcome.ok) return reject(delivery, outcome, message.kind);

      log.append('CROSSCHAIN_MESSAGE_RECEIVED', {
        origin: delivery.origin,
        messageId: delivery.messageId ?? null,
        kind: outcome.kind,
        proposalId: outcome.proposalId,
        duplicate: outcome.duplicate,
        destination: domain,
      });
      return outcome;
    },

    remotes: () => trusted,
  };
}
