import { z } from 'zod';
import { zAddress, zBytes32, zHexData, zUint256, zUnixSeconds, zDomainId } from './validators.js';

// ─── Cross-Chain Zod Schemas ────────────────────────────

export const MessageKindSchema = z.enum(['CREATE_PROPOSAL', 'VOTE', 'FINALIZE']);

export const SendCreateProposalRequestSchema = z.object({
  destination: zDomainId,
  daoId: zBytes32,
  proposalId: zBytes32,
  description: z.string().max(10_000),
  start: zUnixSeconds,
  end: zUnixSeconds,
  quorum: zUint256,
});

export const SendVoteRequestSchema = z.object({
  destination: zDomainId,
  proposalId: zBytes32,
  weight: zUint256,
});

export const SendFinalizeRequestSchema = z.object({
  destination: zDomainId,
  proposalId: zBytes32,
});

export const InboundDeliverySchema = z.object({
  origin: zDomainId,
  sender: zBytes32,
  payload: zHexData,
  messageId: zBytes32.optional(),
});

export const DispatchReceiptSchema = z.object({
  kind: MessageKindSchema,
  destination: z.number(),
  recipient: zBytes32,
  messageId: zBytes32,
  nonce: z.string().optional(),
});

/** Trusted-remote table entry: the bytes32 form of a remote gateway, or its 20-byte address. */
export const RemoteGatewaySchema = z.union([zBytes32, zAddress]);
