// ─── Constants ───────────────────────────────────────────

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as const;

export const ZERO_BYTES32 = '0x0000000000000000000000000000000000000000000000000000000000000000' as const;

export const MAX_UINT256 = 2n ** 256n - 1n;

export const MAX_UINT64 = 2n ** 64n - 1n;

/** Version byte of the cross-chain envelope. Bump on any wire change. */
export const ENVELOPE_VERSION = 1;

/** uint8 tags carried in every envelope. Never reuse a retired tag. */
export const MESSAGE_KIND_TAGS = {
  CREATE_PROPOSAL: 1,
  VOTE: 2,
  FINALIZE: 3,
} as const;

/** Request header that carries the calling address. */
export const CALLER_HEADER = 'x-caller-address';

/** Default page size for GET /api/events */
export const DEFAULT_EVENT_PAGE = 100;

/** Upper bound for GET /api/events?limit= */
export const MAX_EVENT_PAGE = 1_000;

// Chain configurations
export { CHAINS, DEFAULT_CHAIN_ID, chainName } from './chains.js';
export type { ChainInfo } from './chains.js';
