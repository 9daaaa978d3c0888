import type { Request, Response } from 'express';
import type { z } from 'zod';
import { getAddress, isAddress, type Address, type Hex } from 'viem';
import { CALLER_HEADER, zBytes32, type ErrorResponse, type GovernanceErrorCode } from '@crossvote/shared';
import { fail, type GovernanceFailure } from '../governance/errors.js';

// ─── Status mapping ──────────────────────────────────────

export const HTTP_STATUS: Record<GovernanceErrorCode, number> = {
  UNAUTHORIZED: 403,
  VALIDATION: 400,
  MALFORMED_PAYLOAD: 400,
  INVALID_WINDOW: 400,
  INVALID_WEIGHT: 400,
  DUPLICATE_ID: 409,
  DUPLICATE_PROPOSAL: 409,
  VOTING_NOT_ACTIVE: 409,
  VOTING_STILL_ACTIVE: 409,
  ALREADY_FINALIZED: 409,
  PROPOSAL_NOT_FOUND: 404,
  UNKNOWN_DAO: 404,
  UNKNOWN_DESTINATION: 404,
  NOT_ELIGIBLE: 403,
  INSUFFICIENT_TOKENS: 403,
  INSUFFICIENT_FEE: 402,
  DISPATCH_FAILED: 502,
};

export function sendFailure(res: Response, failure: GovernanceFailure): void {
  const body: ErrorResponse = { error: failure.reason, code: failure.code };
  res.status(HTTP_STATUS[failure.code]).json(body);
}

// ─── Request helpers ─────────────────────────────────────

/** Caller identity from X-Caller-Address; answers 403 and returns null when absent or malformed. */
export function requireCaller(req: Request, res: Response): Address | null {
  const raw = req.get(CALLER_HEADER)?.trim();
  if (!raw || !isAddress(raw, { strict: false })) {
    sendFailure(res, fail('UNAUTHORIZED', `${CALLER_HEADER} header with a valid address is required`));
    return null;
  }
  return getAddress(raw);
}

/** Parses req.body; answers 400 VALIDATION and returns null on failure. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, req: Request, res: Response): z.output<S> | null {
  const parsed = schema.safeParse(req.body ?? {});
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first?.path.join('.') || 'body';
    sendFailure(res, fail('VALIDATION', `${where}: ${first?.message ?? 'invalid'}`));
    return null;
  }
  return parsed.data;
}

/** bytes32 route parameter; answers 400 VALIDATION and returns null when malformed. */
export function parseIdParam(value: string | undefined, res: Response): Hex | null {
  const parsed = zBytes32.safeParse(value);
  if (!parsed.success) {
    sendFailure(res, fail('VALIDATION', `id: ${parsed.error.issues[0]?.message ?? 'invalid'}`));
    return null;
  }
  return parsed.data;
}

/**
 * Wraps a handler so thrown errors (state file failures, RPC errors) are
 * logged and answered with a generic 500 instead of escaping express.
 */
export function guarded(
  label: string,
  handler: (req: Request, res: Response) => void | Promise<void>,
): (req: Request, res: Response) => Promise<void> {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (err) {
      console.error(`[${label}] error:`, err);
      if (!res.headersSent) res.status(500).json({ error: 'Internal error' });
    }
  };
}
