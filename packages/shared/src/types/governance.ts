// ─── Governance Types ────────────────────────────────────
// Wire shapes: uint256 amounts travel as decimal strings.

/** 0x-prefixed hex string */
export type Hex = `0x${string}`;

/** Derived lifecycle state of a proposal */
export type ProposalState = 'PENDING' | 'ACTIVE' | 'ENDED' | 'FINALIZED';

/** Quorum result recorded at finalization */
export type ProposalOutcome = 'PASSED' | 'FAILED';

/** Where a proposal record was created */
export type ProposalOrigin =
  | { kind: 'local' }
  | { kind: 'remote'; domain: number };

/**
 * Registered DAO as returned by the API.
 */
export interface DaoSummary {
  id: Hex; // bytes32
  controller: Hex;
  name: string;
  description: string;
  metadataRef: string; // e.g. IPFS CID
  governanceToken: Hex;
  minimumTokens: string;
  createdAt: number; // unix seconds
}

/**
 * Read-only proposal snapshot as returned by the API.
 */
export interface ProposalSummary {
  id: Hex;
  daoId: Hex;
  description: string;
  start: number; // unix seconds
  end: number;
  quorum: string;
  totalWeight: string;
  tally: Record<string, string>; // voter → accumulated weight
  state: ProposalState;
  outcome: ProposalOutcome | null;
  finalizedAt: number | null;
  origin: ProposalOrigin;
  createdAt: number;
}

// ─── Errors ──────────────────────────────────────────────

export type GovernanceErrorCode =
  // authorization
  | 'UNAUTHORIZED'
  // validation
  | 'VALIDATION'
  | 'DUPLICATE_ID'
  | 'DUPLICATE_PROPOSAL'
  | 'MALFORMED_PAYLOAD'
  | 'INVALID_WINDOW'
  | 'INVALID_WEIGHT'
  // state preconditions
  | 'VOTING_NOT_ACTIVE'
  | 'VOTING_STILL_ACTIVE'
  | 'ALREADY_FINALIZED'
  | 'PROPOSAL_NOT_FOUND'
  | 'UNKNOWN_DAO'
  | 'UNKNOWN_DESTINATION'
  // eligibility
  | 'NOT_ELIGIBLE'
  | 'INSUFFICIENT_TOKENS'
  // resource
  | 'INSUFFICIENT_FEE'
  // transport
  | 'DISPATCH_FAILED';

/** Body of every non-2xx governance response. */
export interface ErrorResponse {
  error: string;
  code: GovernanceErrorCode;
}
