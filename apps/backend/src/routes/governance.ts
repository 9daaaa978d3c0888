import { Router } from 'express';
import {
  CastVoteRequestSchema,
  CreateProposalRequestSchema,
  RegisterDaoRequestSchema,
  SetCreationFeeRequestSchema,
  SetMinimumTokensRequestSchema,
} from '@crossvote/shared';
import type { ChainNode } from '../chain/node.js';
import { amount } from '../lib/hex.js';
import { guarded, parseBody, parseIdParam, requireCaller, sendFailure } from './http.js';
import { toDaoSummary, toProposalSummary } from './serialize.js';

export function createGovernanceRouter(node: ChainNode): Router {
  const router = Router();
  const { registry, proposals, votes, finalization, fees } = node;

  // ─── DAOs ────────────────────────────────────────────────

  /** POST /api/governance/daos: register a DAO; the caller becomes its controller */
  router.post(
    '/daos',
    guarded('governance/daos', (req, res) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const body = parseBody(RegisterDaoRequestSchema, req, res);
      if (!body) return;

      const { payment, ...input } = body;
      const result = registry.register(caller, input, payment);
      if (!result.ok) return sendFailure(res, result);
      res.status(201).json({ dao: toDaoSummary(result.dao) });
    }),
  );

  router.get(
    '/daos/:id',
    guarded('governance/daos/:id', (req, res) => {
      const id = parseIdParam(req.params.id, res);
      if (!id) return;
      const result = registry.getDao(id);
      if (!result.ok) return sendFailure(res, result);
      res.json({ dao: toDaoSummary(result.dao) });
    }),
  );

  /** PATCH /api/governance/daos/:id/minimum-tokens: controller only */
  router.patch(
    '/daos/:id/minimum-tokens',
    guarded('governance/minimum-tokens', (req, res) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const id = parseIdParam(req.params.id, res);
      if (!id) return;
      const body = parseBody(SetMinimumTokensRequestSchema, req, res);
      if (!body) return;

      const result = registry.setMinimumTokens(caller, id, body.minimumTokens);
      if (!result.ok) return sendFailure(res, result);
      res.json({ dao: toDaoSummary(result.dao) });
    }),
  );

  // ─── Fees ────────────────────────────────────────────────

  router.get('/creation-fee', (_req, res) => {
    res.json({ fee: amount(registry.getCreationFee()) });
  });

  /** PUT /api/governance/creation-fee: administrator only */
  router.put(
    '/creation-fee',
    guarded('governance/creation-fee', (req, res) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const body = parseBody(SetCreationFeeRequestSchema, req, res);
      if (!body) return;

      const result = registry.setCreationFee(caller, body.fee);
      if (!result.ok) return sendFailure(res, result);
      res.json({ fee: amount(result.fee) });
    }),
  );

  router.get('/fees', (req, res) => {
    const limit = Math.min(Math.max(Number(req.query.limit) || 50, 1), 200);
    res.json({
      administrator: node.administrator,
      creationFee: amount(fees.creationFee()),
      balance: amount(fees.balance()),
      totalWithdrawn: amount(fees.totalWithdrawn()),
      records: fees.records(limit).map((r) => ({ ...r, amount: amount(r.amount) })),
    });
  });

  /** POST /api/governance/fees/withdraw: administrator only; pays out the whole balance */
  router.post(
    '/fees/withdraw',
    guarded('governance/fees/withdraw', (req, res) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const result = fees.withdraw(caller);
      if (!result.ok) return sendFailure(res, result);
      res.json({ amount: amount(result.amount), to: result.to });
    }),
  );

  // ─── Proposals ───────────────────────────────────────────

  router.post(
    '/proposals',
    guarded('governance/proposals', (req, res) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const body = parseBody(CreateProposalRequestSchema, req, res);
      if (!body) return;

      const result = proposals.create({ kind: 'caller', address: caller }, body);
      if (!result.ok) return sendFailure(res, result);
      const view = proposals.get(result.proposal.id);
      if (!view.ok) return sendFailure(res, view);
      res.status(201).json({ proposal: toProposalSummary(view) });
    }),
  );

  router.get('/proposals', (_req, res) => {
    res.json({ proposals: proposals.list().map(toProposalSummary) });
  });

  router.get(
    '/proposals/:id',
    guarded('governance/proposals/:id', (req, res) => {
      const id = parseIdParam(req.params.id, res);
      if (!id) return;
      const result = proposals.get(id);
      if (!result.ok) return sendFailure(res, result);
      res.json({ proposal: toProposalSummary(result) });
    }),
  );

  /** POST /api/governance/proposals/:id/votes: weight adds to the caller's running total */
  router.post(
    '/proposals/:id/votes',
    guarded('governance/votes', async (req, res) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const id = parseIdParam(req.params.id, res);
      if (!id) return;
      const body = parseBody(CastVoteRequestSchema, req, res);
      if (!body) return;

      const result = await votes.applyVote(id, caller, body.weight, { kind: 'local' });
      if (!result.ok) return sendFailure(res, result);
      res.json({
        vote: {
          proposalId: result.proposalId,
          voter: result.voter,
          weight: amount(body.weight),
          voterWeight: result.duplicate ? null : amount(result.voterWeight),
          totalWeight: amount(result.totalWeight),
        },
      });
    }),
  );

  /** POST /api/governance/proposals/:id/finalize: controller only, after the window closes */
  router.post(
    '/proposals/:id/finalize',
    guarded('governance/finalize', (req, res) => {
      const caller = requireCaller(req, res);
      if (!caller) return;
      const id = parseIdParam(req.params.id, res);
      if (!id) return;

      const result = finalization.finalize(id, { kind: 'caller', address: caller });
      if (!result.ok) return sendFailure(res, result);
      const view = proposals.get(id);
      if (!view.ok) return sendFailure(res, view);
      res.json({ outcome: result.outcome, proposal: toProposalSummary(view) });
    }),
  );

  return router;
}
