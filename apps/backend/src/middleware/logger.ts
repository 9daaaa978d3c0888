import { Request, Response, NextFunction } from 'express';
import crypto from 'node:crypto';
import { CALLER_HEADER } from '@crossvote/shared';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/**
 * Request logger middleware: attaches a unique requestId to every
 * incoming request and logs method, path and the claimed caller.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId = crypto.randomUUID().slice(0, 8);
  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  if (process.env.REQUEST_LOG !== 'off') {
    const caller = req.get(CALLER_HEADER);
    const timestamp = new Date().toISOString();
    console.log(`[${timestamp}] [${requestId}] ${req.method} ${req.path}${caller ? ` (caller ${caller})` : ''}`);
  }
  next();
}
