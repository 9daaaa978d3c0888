/**
 * Cross-chain envelope codec.
 *
 * Wire format: abi.encode(uint8 version, uint8 kind, bytes body), where
 * body is the ABI encoding of the kind's own fields. The kind tag is read
 * before any field is interpreted; unknown tags and undecodable bodies are
 * MALFORMED_PAYLOAD.
 */

import {
  decodeAbiParameters,
  encodeAbiParameters,
  getAddress,
  keccak256,
  parseAbiParameters,
  type Address,
  type Hex,
} from 'viem';
import { ENVELOPE_VERSION, MESSAGE_KIND_TAGS, type MessageKind } from '@crossvote/shared';
import { fail, type GovernanceFailure } from '../governance/errors.js';
import { normalizeId } from '../lib/hex.js';

export type CrossChainMessage =
  | {
      kind: 'CREATE_PROPOSAL';
      daoId: Hex;
      proposalId: Hex;
      description: string;
      start: number;
      end: number;
      quorum: bigint;
    }
  | { kind: 'VOTE'; proposalId: Hex; voter: Address; weight: bigint; nonce: bigint }
  | { kind: 'FINALIZE'; proposalId: Hex };

export type DecodeResult = { ok: true; message: CrossChainMessage } | GovernanceFailure;

const ENVELOPE_PARAMS = parseAbiParameters('uint8 version, uint8 kind, bytes body');
const CREATE_PROPOSAL_PARAMS = parseAbiParameters(
  'bytes32 daoId, bytes32 proposalId, string description, uint64 start, uint64 end, uint256 quorum',
);
const VOTE_PARAMS = parseAbiParameters('bytes32 proposalId, address voter, uint256 weight, uint64 nonce');
const FINALIZE_PARAMS = parseAbiParameters('bytes32 proposalId');
const DEDUP_PARAMS = parseAbiParameters('bytes32 proposalId, uint32 origin, address voter, uint64 nonce');

const KIND_BY_TAG = new Map<number, MessageKind>([
  [MESSAGE_KIND_TAGS.CREATE_PROPOSAL, 'CREATE_PROPOSAL'],
  [MESSAGE_KIND_TAGS.VOTE, 'VOTE'],
  [MESSAGE_KIND_TAGS.FINALIZE, 'FINALIZE'],
]);

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message.split('\n')[0] ?? err.name;
  return String(err);
}

function toTimestamp(value: bigint, field: string): number {
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(`${field} ${value} is not a representable timestamp`);
  }
  return Number(value);
}

function assertNever(value: never): never {
  throw new Error(`Unhandled message: ${JSON.stringify(value)}`);
}

function encodeBody(message: CrossChainMessage): Hex {
  switch (message.kind) {
    case 'CREATE_PROPOSAL':
      return encodeAbiParameters(CREATE_PROPOSAL_PARAMS, [
        message.daoId,
        message.proposalId,
        message.description,
        BigInt(message.start),
        BigInt(message.end),
        message.quorum,
      ]);
    case 'VOTE':
      return encodeAbiParameters(VOTE_PARAMS, [message.proposalId, message.voter, message.weight, message.nonce]);
    case 'FINALIZE':
      return encodeAbiParameters(FINALIZE_PARAMS, [message.proposalId]);
    default:
      return assertNever(message);
  }
}

function decodeBody(kind: MessageKind, body: Hex): CrossChainMessage {
  switch (kind) {
    case 'CREATE_PROPOSAL': {
      const [daoId, proposalId, description, start, end, quorum] = decodeAbiParameters(CREATE_PROPOSAL_PARAMS, body);
      return {
        kind,
        daoId: normalizeId(daoId),
        proposalId: normalizeId(proposalId),
        description,
        start: toTimestamp(start, 'start'),
        end: toTimestamp(end, 'end'),
        quorum,
      };
    }
    case 'VOTE': {
      const [proposalId, voter, weight, nonce] = decodeAbiParameters(VOTE_PARAMS, body);
      return { kind, proposalId: normalizeId(proposalId), voter: getAddress(voter), weight, nonce };
    }
    case 'FINALIZE': {
      const [proposalId] = decodeAbiParameters(FINALIZE_PARAMS, body);
      return { kind, proposalId: normalizeId(proposalId) };
    }
    default:
      return assertNever(kind);
  }
}

/** Deterministic: the same message always yields the same bytes. */
export function encodeMessage(message: CrossChainMessage): Hex {
  return encodeAbiParameters(ENVELOPE_PARAMS, [
    ENVELOPE_VERSION,
    MESSAGE_KIND_TAGS[message.kind],
    encodeBody(message),
  ]);
}

export function decodeMessage(payload: Hex): DecodeResult {
  let envelope: readonly [number, number, Hex];
  try {
    envelope = decodeAbiParameters(ENVELOPE_PARAMS, payload);
  } catch (err) {
    return fail('MALFORMED_PAYLOAD', `Envelope could not be decoded: ${errorMessage(err)}`);
  }

  const [version, tag, body] = envelope;
  if (version !== ENVELOPE_VERSION) {
    return fail('MALFORMED_PAYLOAD', `Unsupported envelope version ${version}`);
  }
  const kind = KIND_BY_TAG.get(tag);
  if (!kind) return fail('MALFORMED_PAYLOAD', `Unknown message kind tag ${tag}`);

  try {
    return { ok: true, message: decodeBody(kind, body) };
  } catch (err) {
    return fail('MALFORMED_PAYLOAD', `${kind} body could not be decoded: ${errorMessage(err)}`);
  }
}

/**
 * Idempotency key of an inbound vote: (proposal, origin domain, voter, nonce).
 * The sender never reuses a nonce per destination, so distinct votes never collide
 * and every redelivery of one vote maps to the same key.
 */
export function voteDedupKey(params: { proposalId: Hex; origin: number; voter: Address; nonce: bigint }): Hex {
  return keccak256(
    encodeAbiParameters(DEDUP_PARAMS, [normalizeId(params.proposalId), params.origin, params.voter, params.nonce]),
  );
}
