import { describe, it, expect } from 'vitest';
import { decodeAbiParameters, encodeAbiParameters, parseAbiParameters, type Hex } from 'viem';
import { decodeMessage, encodeMessage, voteDedupKey, type CrossChainMessage } from '../src/crosschain/envelope.js';
import { DAO_1, PROPOSAL_1, VOTER, VOTER_2 } from './fixtures.js';

const ENVELOPE = parseAbiParameters('uint8 version, uint8 kind, bytes body');

function envelope(version: number, tag: number, body: Hex): Hex {
  return encodeAbiParameters(ENVELOPE, [version, tag, body]);
}

const create: CrossChainMessage = {
  kind: 'CREATE_PROPOSAL',
  daoId: DAO_1,
  proposalId: PROPOSAL_1,
  description: 'Fund the placeholder',
  start: 100,
  end: 200,
  quorum: 1000n,
};

const vote: CrossChainMessage = { kind: 'VOTE', proposalId: PROPOSAL_1, voter: VOTER, weight: 50n, nonce: 7n };

describe('cross-chain envelope', () => {
  it('decodes what it encodes', () => {
    expect(decodeMessage(encodeMessage(create))).toEqual({ ok: true, message: create });
    expect(decodeMessage(encodeMessage(vote))).toEqual({ ok: true, message: vote });
    expect(decodeMessage(encodeMessage({ kind: 'FINALIZE', proposalId: PROPOSAL_1 }))).toEqual({
      ok: true,
      message: { kind: 'FINALIZE', proposalId: PROPOSAL_1 },
    });
  });

  it('is deterministic and carries version 1 and the kind tag up front', () => {
    const payload = encodeMessage(vote);
    expect(encodeMessage(vote)).toBe(payload);

    const [version, tag] = decodeAbiParameters(ENVELOPE, payload);
    expect(version).toBe(1);
    expect(tag).toBe(2);
  });

  it('rejects empty and undecodable payloads', () => {
    expect(decodeMessage('0x')).toMatchObject({ ok: false, code: 'MALFORMED_PAYLOAD' });
    expect(decodeMessage('0xdeadbeef')).toMatchObject({ ok: false, code: 'MALFORMED_PAYLOAD' });
  });

  it('rejects an unknown version', () => {
    const body = encodeAbiParameters(parseAbiParameters('bytes32 proposalId'), [PROPOSAL_1]);
    expect(decodeMessage(envelope(2, 3, body))).toEqual({
      ok: false,
      code: 'MALFORMED_PAYLOAD',
      reason: 'Unsupported envelope version 2',
    });
  });

  it('rejects an unknown kind tag', () => {
    const body = encodeAbiParameters(parseAbiParameters('bytes32 proposalId'), [PROPOSAL_1]);
    expect(decodeMessage(envelope(1, 9, body))).toEqual({
      ok: false,
      code: 'MALFORMED_PAYLOAD',
      reason: 'Unknown message kind tag 9',
    });
  });

  it('routes by tag, not by body shape: a finalize body under the vote tag is malformed', () => {
    const body = encodeAbiParameters(parseAbiParameters('bytes32 proposalId'), [PROPOSAL_1]);
    const result = decodeMessage(envelope(1, 2, body));
    expect(result.ok).toBe(false);
    expect(!result.ok && result.reason.startsWith('VOTE body could not be decoded')).toBe(true);
  });

  it('rejects timestamps beyond the safe integer range', () => {
    const body = encodeAbiParameters(
      parseAbiParameters('bytes32 daoId, bytes32 proposalId, string description, uint64 start, uint64 end, uint256 quorum'),
      [DAO_1, PROPOSAL_1, 'x', 2n ** 60n, 2n ** 61n, 1n],
    );
    const result = decodeMessage(envelope(1, 1, body));
    expect(result).toMatchObject({ ok: false, code: 'MALFORMED_PAYLOAD' });
    expect(!result.ok && result.reason).toContain('is not a representable timestamp');
  });
});

describe('vote dedup key', () => {
  const base = { proposalId: PROPOSAL_1, origin: 31338, voter: VOTER, nonce: 1n };

  it('is stable for the same vote', () => {
    expect(voteDedupKey(base)).toBe(voteDedupKey({ ...base }));
  });

  it('changes with every component', () => {
    const key = voteDedupKey(base);
    expect(voteDedupKey({ ...base, nonce: 2n })).not.toBe(key);
    expect(voteDedupKey({ ...base, origin: 1 })).not.toBe(key);
    expect(voteDedupKey({ ...base, voter: VOTER_2 })).not.toBe(key);
    expect(voteDedupKey({ ...base, proposalId: `0x${'8'.repeat(64)}` })).not.toBe(key);
  });
});
