import { z } from 'zod';

// ─── Event Log Zod Schemas ──────────────────────────────

export const LogEventTypeSchema = z.enum([
  'DAO_CREATED', 'DAO_UPDATED', 'CREATION_FEE_UPDATED', 'FEES_WITHDRAWN',
  'PROPOSAL_CREATED', 'VOTE_ACCEPTED', 'VOTE_DUPLICATE_DISCARDED', 'PROPOSAL_FINALIZED',
  'CROSSCHAIN_PROPOSAL_DISPATCHED', 'CROSSCHAIN_VOTE_DISPATCHED', 'CROSSCHAIN_FINALIZE_DISPATCHED',
  'CROSSCHAIN_DISPATCH_FAILED', 'CROSSCHAIN_MESSAGE_RECEIVED', 'CROSSCHAIN_MESSAGE_REJECTED',
]);

export const LogLevelSchema = z.enum(['INFO', 'WARN', 'ERROR']);

export const LogEventSchema = z.object({
  id: z.string(),
  timestamp: z.number(),
  chainId: z.number(),
  type: LogEventTypeSchema,
  payload: z.record(z.unknown()),
  level: LogLevelSchema,
});
