import { Router } from 'express';
import {
  InboundDeliverySchema,
  SendCreateProposalRequestSchema,
  SendFinalizeRequestSchema,
  SendVoteRequestSchema,
  chainName,
} from '@crossvote/shared';
import type { ChainNode } from '../chain/node.js';
import { guarded, parseBody, requireCaller, sendFailure } from './http.js';

export function createCrossChainRouter(node: ChainNode): Router {
  const router = Router();
  const gateway = node.crosschain;

  // ─── Outbound ────────────────────────────────────────────
  // 202: the transport accepted the message. Whether the destination
  // applies it shows up only in that chain's event log.

  /** POST /api/crosschain/proposals: create a proposal of a local DAO on another chain */
  router.post(
    '/proposals',
    guarded('crosschain/proposals', async (req, res) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const body = parseBody(SendCreateProposalRequestSchema, req, res);
      if (!body) return;

      const result = await gateway.sendCreateProposal(caller, body);
      if (!result.ok) return sendFailure(res, result);
      res.status(202).json({ receipt: result.receipt });
    }),
  );

  /** POST /api/crosschain/votes: vote on a proposal held by another chain */
  router.post(
    '/votes',
    guarded('crosschain/votes', async (req, res) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const body = parseBody(SendVoteRequestSchema, req, res);
      if (!body) return;

      const result = await gateway.sendVote(caller, body);
      if (!result.ok) return sendFailure(res, result);
      res.status(202).json({ receipt: result.receipt });
    }),
  );

  router.post(
    '/finalize',
    guarded('crosschain/finalize', async (req, res) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const body = parseBody(SendFinalizeRequestSchema, req, res);
      if (!body) return;

      const result = await gateway.sendFinalize(caller, body);
      if (!result.ok) return sendFailure(res, result);
      res.status(202).json({ receipt: result.receipt });
    }),
  );

  // ─── Inbound ─────────────────────────────────────────────

  /**
   * POST /api/crosschain/inbound: transport delivery endpoint.
   * An untrusted sender is refused with 403. A delivered message the
   * governance rules reject is still a completed delivery: 200 with the
   * rejection in the body, so the transport does not redeliver it.
   */
  router.post(
    '/inbound',
    guarded('crosschain/inbound', async (req, res) => {
      const delivery = parseBody(InboundDeliverySchema, req, res);
      if (!delivery) return;

      const result = await gateway.handleInbound(delivery);
      if (!result.ok && result.code === 'UNAUTHORIZED') return sendFailure(res, result);
      res.json({ result });
    }),
  );

  router.get('/remotes', (_req, res) => {
    res.json({
      domain: node.chainId,
      gateway: node.gateway,
      remotes: [...gateway.remotes()].map(([domain, remote]) => ({
        domain,
        name: chainName(domain),
        gateway: remote,
      })),
    });
  });

  return router;
}
