/**
 * Two (or three) chain nodes joined by the in-process loopback hub.
 * Deliveries are driven by hand to reproduce redelivery, reordering and
 * late arrival.
 */

import { describe, it, expect } from 'vitest';
import type { DispatchReceipt } from '@crossvote/shared';
import { createLoopbackHub } from '../src/crosschain/transport.js';
import { encodeMessage } from '../src/crosschain/envelope.js';
import type { SendResult } from '../src/crosschain/gateway.js';
import {
  CONTROLLER,
  DAO_1,
  DAO_2,
  DOMAIN_A,
  DOMAIN_B,
  GATEWAY_A,
  GATEWAY_B,
  OUTSIDER,
  PROPOSAL_1,
  VOTER,
  createProposal,
  makeNode,
  padded,
  registerDao,
} from './fixtures.js';

function twoChains() {
  const hub = createLoopbackHub();
  const a = makeNode({
    chainId: DOMAIN_A,
    gatewayAddress: GATEWAY_A,
    transport: hub.factory,
    trustedRemotes: [[DOMAIN_B, GATEWAY_B]],
  });
  const b = makeNode({
    chainId: DOMAIN_B,
    gatewayAddress: GATEWAY_B,
    transport: hub.factory,
    trustedRemotes: [[DOMAIN_A, padded(GATEWAY_A)]],
  });
  registerDao(a.node);
  registerDao(b.node);
  return { hub, a, b };
}

function receiptOf(result: SendResult): DispatchReceipt {
  if (!result.ok) throw new Error(`send failed: ${result.code} ${result.reason}`);
  return result.receipt;
}

const remoteCreate = {
  destination: DOMAIN_B,
  daoId: DAO_1,
  proposalId: PROPOSAL_1,
  description: 'Fund the placeholder',
  start: 100,
  end: 200,
  quorum: 1000n,
};

describe('cross-chain proposal creation', () => {
  it('creates the proposal on the destination once the message is delivered', async () => {
    const { hub, a, b } = twoChains();

    const receipt = receiptOf(await a.node.crosschain.sendCreateProposal(CONTROLLER, remoteCreate));
    expect(receipt).toMatchObject({
      kind: 'CREATE_PROPOSAL',
      destination: DOMAIN_B,
      recipient: padded(GATEWAY_B),
    });
    expect(hub.pending()).toHaveLength(1);
    expect(b.node.proposalStore.has(PROPOSAL_1)).toBe(false);

    expect(await hub.deliverAll()).toEqual([
      { ok: true, kind: 'CREATE_PROPOSAL', proposalId: PROPOSAL_1, duplicate: false },
    ]);
    const created = b.node.proposalStore.get(PROPOSAL_1);
    expect(created?.daoId).toBe(DAO_1);
    expect(created?.origin).toEqual({ kind: 'remote', domain: DOMAIN_A });
    expect(a.node.log.readByType('CROSSCHAIN_PROPOSAL_DISPATCHED')[0]?.payload).toMatchObject({
      messageId: receipt.messageId,
    });
    expect(b.node.log.readByType('CROSSCHAIN_MESSAGE_RECEIVED')[0]?.payload).toMatchObject({
      origin: DOMAIN_A,
      messageId: receipt.messageId,
      kind: 'CREATE_PROPOSAL',
    });
  });

  it('authorizes on the sending chain', async () => {
    const { hub, a } = twoChains();
    expect(await a.node.crosschain.sendCreateProposal(OUTSIDER, remoteCreate)).toMatchObject({
      ok: false,
      code: 'UNAUTHORIZED',
    });
    expect(await a.node.crosschain.sendCreateProposal(CONTROLLER, { ...remoteCreate, daoId: DAO_2 })).toMatchObject({
      ok: false,
      code: 'UNKNOWN_DAO',
    });
    expect(hub.pending()).toHaveLength(0);
  });

  it('refuses destinations without a trusted gateway', async () => {
    const { a } = twoChains();
    expect(await a.node.crosschain.sendCreateProposal(CONTROLLER, { ...remoteCreate, destination: 999 })).toMatchObject({
      ok: false,
      code: 'UNKNOWN_DESTINATION',
    });
  });

  it('rejects the create when the DAO is not registered on the destination', async () => {
    const { hub, a, b } = twoChains();
    registerDao(a.node, DAO_2);

    receiptOf(await a.node.crosschain.sendCreateProposal(CONTROLLER, { ...remoteCreate, daoId: DAO_2 }));
    expect(await hub.deliverNext()).toMatchObject({ ok: false, code: 'UNKNOWN_DAO' });
    expect(b.node.log.readByType('CROSSCHAIN_MESSAGE_REJECTED')[0]?.payload).toMatchObject({
      kind: 'CREATE_PROPOSAL',
      code: 'UNKNOWN_DAO',
    });
  });

  it('a redelivered create is a duplicate and leaves the proposal as it was', async () => {
    const { hub, a, b } = twoChains();
    const receipt = receiptOf(await a.node.crosschain.sendCreateProposal(CONTROLLER, remoteCreate));
    await hub.deliverAll();
    const first = b.node.proposalStore.get(PROPOSAL_1);

    expect(await hub.redeliver(receipt.messageId)).toMatchObject({ ok: false, code: 'DUPLICATE_PROPOSAL' });
    expect(b.node.proposalStore.get(PROPOSAL_1)).toBe(first);
  });
});

describe('cross-chain votes', () => {
  it('stamps the caller as voter and a per-destination nonce', async () => {
    const { hub, a, b } = twoChains();
    createProposal(b.node);
    b.time.set(150);

    const receipt = receiptOf(
      await a.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 50n }),
    );
    expect(receipt).toMatchObject({ kind: 'VOTE', nonce: '1' });

    expect(await hub.deliverNext()).toEqual({
      ok: true,
      kind: 'VOTE',
      proposalId: PROPOSAL_1,
      duplicate: false,
    });
    expect(b.node.proposalStore.get(PROPOSAL_1)?.tally.get(VOTER)).toBe(50n);
  });

  it('never double counts a redelivered vote', async () => {
    const { hub, a, b } = twoChains();
    createProposal(b.node);
    b.time.set(150);

    const receipt = receiptOf(
      await a.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 50n }),
    );
    await hub.deliverAll();

    expect(await hub.redeliver(receipt.messageId)).toEqual({
      ok: true,
      kind: 'VOTE',
      proposalId: PROPOSAL_1,
      duplicate: true,
    });
    expect(await hub.redeliver(receipt.messageId)).toMatchObject({ ok: true, duplicate: true });
    expect(b.node.proposalStore.get(PROPOSAL_1)?.totalWeight).toBe(50n);
    expect(b.node.log.readByType('VOTE_DUPLICATE_DISCARDED')).toHaveLength(2);
  });

  it('counts two distinct votes from the same voter', async () => {
    const { hub, a, b } = twoChains();
    createProposal(b.node);
    b.time.set(150);

    const first = receiptOf(
      await a.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 50n }),
    );
    const second = receiptOf(
      await a.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 30n }),
    );
    expect([first.nonce, second.nonce]).toEqual(['1', '2']);

    await hub.deliverAll();
    expect(b.node.proposalStore.get(PROPOSAL_1)?.tally.get(VOTER)).toBe(80n);
  });

  it('counts a new vote from a sender that restarted without persisted counters', async () => {
    const { hub, a, b } = twoChains();
    createProposal(b.node);
    b.time.set(150);

    receiptOf(await a.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 10n }));
    await hub.deliverAll();

    hub.disconnect(DOMAIN_A);
    const restarted = makeNode({
      chainId: DOMAIN_A,
      gatewayAddress: GATEWAY_A,
      transport: hub.factory,
      trustedRemotes: [[DOMAIN_B, GATEWAY_B]],
      start: 60,
    });
    const receipt = receiptOf(
      await restarted.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 30n }),
    );
    // 60 << 24, plus one
    expect(receipt.nonce).toBe('1006632961');

    expect(await hub.deliverNext()).toEqual({ ok: true, kind: 'VOTE', proposalId: PROPOSAL_1, duplicate: false });
    expect(b.node.proposalStore.get(PROPOSAL_1)?.tally.get(VOTER)).toBe(40n);
  });

  it('a vote that overtakes its proposal is rejected, and counts once redelivered after it', async () => {
    const { hub, a, b } = twoChains();
    b.time.set(150);

    const create = receiptOf(await a.node.crosschain.sendCreateProposal(CONTROLLER, remoteCreate));
    const vote = receiptOf(
      await a.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 50n }),
    );

    expect(await hub.deliver(vote.messageId)).toMatchObject({ ok: false, code: 'PROPOSAL_NOT_FOUND' });
    expect(await hub.deliver(create.messageId)).toMatchObject({ ok: true, kind: 'CREATE_PROPOSAL' });
    expect(await hub.redeliver(vote.messageId)).toMatchObject({ ok: true, kind: 'VOTE', duplicate: false });
    expect(b.node.proposalStore.get(PROPOSAL_1)?.totalWeight).toBe(50n);
  });

  it('a vote arriving after the window closes on the destination is rejected', async () => {
    const { hub, a, b } = twoChains();
    createProposal(b.node);
    a.time.set(150);
    b.time.set(250);

    receiptOf(await a.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 50n }));
    expect(await hub.deliverNext()).toMatchObject({ ok: false, code: 'VOTING_NOT_ACTIVE' });
    expect(b.node.proposalStore.get(PROPOSAL_1)?.totalWeight).toBe(0n);
  });

  it('reports a transport failure and still consumes the nonce', async () => {
    const { hub, a } = twoChains();
    hub.failNextSend('relayer offline');

    const failed = await a.node.crosschain.sendVote(VOTER, {
      destination: DOMAIN_B,
      proposalId: PROPOSAL_1,
      weight: 50n,
    });
    expect(failed).toMatchObject({ ok: false, code: 'DISPATCH_FAILED' });
    expect(!failed.ok && failed.reason).toContain('relayer offline');
    expect(a.node.outbox.peek(DOMAIN_B)).toBe(1n);
    expect(a.node.log.readByType('CROSSCHAIN_DISPATCH_FAILED')[0]?.payload).toMatchObject({
      kind: 'VOTE',
      nonce: '1',
      reason: 'relayer offline',
    });

    const retry = receiptOf(
      await a.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 50n }),
    );
    expect(retry.nonce).toBe('2');
    expect(hub.pending()).toHaveLength(1);
  });
});

describe('cross-chain finalization', () => {
  it('finalizes the mirrored proposal once the destination window is over', async () => {
    const { hub, a, b } = twoChains();
    createProposal(a.node);
    receiptOf(await a.node.crosschain.sendCreateProposal(CONTROLLER, remoteCreate));
    await hub.deliverAll();

    b.time.set(150);
    receiptOf(await a.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 50n }));
    await hub.deliverAll();

    b.time.set(250);
    const receipt = receiptOf(
      await a.node.crosschain.sendFinalize(CONTROLLER, { destination: DOMAIN_B, proposalId: PROPOSAL_1 }),
    );
    expect(await hub.deliverNext()).toEqual({ ok: true, kind: 'FINALIZE', proposalId: PROPOSAL_1, duplicate: false });
    expect(b.node.proposalStore.get(PROPOSAL_1)?.finalized).toEqual({ at: 250, outcome: 'FAILED' });

    expect(await hub.redeliver(receipt.messageId)).toMatchObject({ ok: false, code: 'ALREADY_FINALIZED' });
  });

  it('is refused on the destination while its window is still open', async () => {
    const { hub, a, b } = twoChains();
    createProposal(a.node);
    createProposal(b.node);
    b.time.set(180);

    receiptOf(await a.node.crosschain.sendFinalize(CONTROLLER, { destination: DOMAIN_B, proposalId: PROPOSAL_1 }));
    expect(await hub.deliverNext()).toMatchObject({ ok: false, code: 'VOTING_STILL_ACTIVE' });
  });

  it('resolves the DAO through the local proposal and checks its controller', async () => {
    const { a } = twoChains();
    const input = { destination: DOMAIN_B, proposalId: PROPOSAL_1 };

    expect(await a.node.crosschain.sendFinalize(CONTROLLER, input)).toMatchObject({
      ok: false,
      code: 'PROPOSAL_NOT_FOUND',
    });
    createProposal(a.node);
    expect(await a.node.crosschain.sendFinalize(OUTSIDER, input)).toMatchObject({ ok: false, code: 'UNAUTHORIZED' });
  });
});

describe('inbound authentication', () => {
  it('rejects a sender that is not the trusted gateway of its origin', async () => {
    const { b } = twoChains();
    createProposal(b.node);
    b.time.set(150);
    const payload = encodeMessage({ kind: 'VOTE', proposalId: PROPOSAL_1, voter: VOTER, weight: 50n, nonce: 1n });

    expect(
      await b.node.crosschain.handleInbound({ origin: DOMAIN_A, sender: padded(OUTSIDER), payload }),
    ).toMatchObject({ ok: false, code: 'UNAUTHORIZED' });
    expect(await b.node.crosschain.handleInbound({ origin: 1, sender: padded(GATEWAY_A), payload })).toMatchObject({
      ok: false,
      code: 'UNAUTHORIZED',
    });
    expect(b.node.proposalStore.get(PROPOSAL_1)?.totalWeight).toBe(0n);
    expect(b.node.log.readByType('CROSSCHAIN_MESSAGE_REJECTED')).toHaveLength(2);
  });

  it('rejects a malformed payload from a trusted sender', async () => {
    const { b } = twoChains();
    expect(
      await b.node.crosschain.handleInbound({ origin: DOMAIN_A, sender: padded(GATEWAY_A), payload: '0x1234' }),
    ).toMatchObject({ ok: false, code: 'MALFORMED_PAYLOAD' });
  });

  it('rejects messages from a connected chain the destination does not trust', async () => {
    const { hub, b } = twoChains();
    const c = makeNode({
      chainId: 31339,
      gatewayAddress: '0x8000000000000000000000000000000000000008',
      transport: hub.factory,
      trustedRemotes: [[DOMAIN_B, GATEWAY_B]],
    });
    createProposal(b.node);
    b.time.set(150);

    receiptOf(await c.node.crosschain.sendVote(VOTER, { destination: DOMAIN_B, proposalId: PROPOSAL_1, weight: 50n }));
    expect(await hub.deliverNext()).toMatchObject({ ok: false, code: 'UNAUTHORIZED' });
    expect(b.node.proposalStore.get(PROPOSAL_1)?.totalWeight).toBe(0n);
  });
});
