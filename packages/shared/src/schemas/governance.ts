import { z } from 'zod';
import { zAddress, zBytes32, zUint256, zUnixSeconds, zDomainId } from './validators.js';

// ─── Governance Zod Schemas ─────────────────────────────

export const GovernanceErrorCodeSchema = z.enum([
  'UNAUTHORIZED',
  'VALIDATION', 'DUPLICATE_ID', 'DUPLICATE_PROPOSAL', 'MALFORMED_PAYLOAD', 'INVALID_WINDOW', 'INVALID_WEIGHT',
  'VOTING_NOT_ACTIVE', 'VOTING_STILL_ACTIVE', 'ALREADY_FINALIZED', 'PROPOSAL_NOT_FOUND', 'UNKNOWN_DAO', 'UNKNOWN_DESTINATION',
  'NOT_ELIGIBLE', 'INSUFFICIENT_TOKENS',
  'INSUFFICIENT_FEE',
  'DISPATCH_FAILED',
]);

export const ErrorResponseSchema = z.object({
  error: z.string(),
  code: GovernanceErrorCodeSchema,
});

// ── Requests ──

export const RegisterDaoRequestSchema = z.object({
  id: zBytes32,
  name: z.string().min(1).max(200),
  description: z.string().max(10_000).default(''),
  metadataRef: z.string().max(200).default(''),
  governanceToken: zAddress,
  minimumTokens: zUint256,
  /** Amount attached to the registration, checked against the creation fee. */
  payment: zUint256.default('0'),
});

export const SetMinimumTokensRequestSchema = z.object({
  minimumTokens: zUint256,
});

export const SetCreationFeeRequestSchema = z.object({
  fee: zUint256,
});

export const CreateProposalRequestSchema = z.object({
  daoId: zBytes32,
  proposalId: zBytes32,
  description: z.string().max(10_000),
  start: zUnixSeconds,
  end: zUnixSeconds,
  quorum: zUint256,
});

export const CastVoteRequestSchema = z.object({
  weight: zUint256,
});

// ── Responses ──

const ProposalOriginSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('local') }),
  z.object({ kind: z.literal('remote'), domain: zDomainId }),
]);

export const DaoSummarySchema = z.object({
  id: zBytes32,
  controller: zAddress,
  name: z.string(),
  description: z.string(),
  metadataRef: z.string(),
  governanceToken: zAddress,
  minimumTokens: z.string(),
  createdAt: z.number(),
});

export const ProposalSummarySchema = z.object({
  id: zBytes32,
  daoId: zBytes32,
  description: z.string(),
  start: z.number(),
  end: z.number(),
  quorum: z.string(),
  totalWeight: z.string(),
  tally: z.record(z.string()),
  state: z.enum(['PENDING', 'ACTIVE', 'ENDED', 'FINALIZED']),
  outcome: z.enum(['PASSED', 'FAILED']).nullable(),
  finalizedAt: z.number().nullable(),
  origin: ProposalOriginSchema,
  createdAt: z.number(),
});
