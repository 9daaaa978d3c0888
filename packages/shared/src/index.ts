// ─── @crossvote/shared barrel export ─────────────────────

// Types
export type {
  Hex,
  ProposalState,
  ProposalOutcome,
  ProposalOrigin,
  DaoSummary,
  ProposalSummary,
  GovernanceErrorCode,
  ErrorResponse,
} from './types/governance.js';

export type {
  MessageKind,
  InboundDelivery,
  DispatchReceipt,
  InboundResult,
} from './types/crosschain.js';

export type { LogEventType, LogLevel, LogEvent } from './types/events.js';

// Schemas
export {
  GovernanceErrorCodeSchema,
  ErrorResponseSchema,
  RegisterDaoRequestSchema,
  SetMinimumTokensRequestSchema,
  SetCreationFeeRequestSchema,
  CreateProposalRequestSchema,
  CastVoteRequestSchema,
  DaoSummarySchema,
  ProposalSummarySchema,
} from './schemas/governance.js';

export {
  MessageKindSchema,
  SendCreateProposalRequestSchema,
  SendVoteRequestSchema,
  SendFinalizeRequestSchema,
  InboundDeliverySchema,
  DispatchReceiptSchema,
  RemoteGatewaySchema,
} from './schemas/crosschain.js';

export { LogEventTypeSchema, LogLevelSchema, LogEventSchema } from './schemas/events.js';

// ─── Validators ──────────────────────────────────────────
export {
  zAddress,
  zBytes32,
  zHexData,
  zUint256,
  zUint64,
  zUnixSeconds,
  zDomainId,
} from './schemas/validators.js';

// Constants
export * from './constants/index.js';
