// ─── Audit Trail Events ──────────────────────────────────

export type LogEventType =
  | 'DAO_CREATED'
  | 'DAO_UPDATED'
  | 'CREATION_FEE_UPDATED'
  | 'FEES_WITHDRAWN'
  | 'PROPOSAL_CREATED'
  | 'VOTE_ACCEPTED'
  | 'VOTE_DUPLICATE_DISCARDED'
  | 'PROPOSAL_FINALIZED'
  | 'CROSSCHAIN_PROPOSAL_DISPATCHED'
  | 'CROSSCHAIN_VOTE_DISPATCHED'
  | 'CROSSCHAIN_FINALIZE_DISPATCHED'
  | 'CROSSCHAIN_DISPATCH_FAILED'
  | 'CROSSCHAIN_MESSAGE_RECEIVED'
  | 'CROSSCHAIN_MESSAGE_REJECTED';

export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * Structured event appended for every state change and every
 * cross-chain hand-off. Payloads are JSON-safe (amounts as strings).
 */
export interface LogEvent {
  id: string;
  timestamp: number; // ms
  chainId: number;
  type: LogEventType;
  payload: Record<string, unknown>;
  level: LogLevel;
}
