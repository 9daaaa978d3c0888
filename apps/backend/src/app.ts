import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { ChainNode } from './chain/node.js';
import { requestLogger } from './middleware/logger.js';
import { createHealthRouter, type HealthInfo } from './routes/health.js';
import { createGovernanceRouter } from './routes/governance.js';
import { createCrossChainRouter } from './routes/crosschain.js';
import { createEventsRouter } from './routes/events.js';

/** Builds the HTTP surface of one chain node. Listening is left to the caller. */
export function createApp(node: ChainNode, info: HealthInfo = {}): Express {
  const app = express();

  // ─── Middleware ──────────────────────────────────────────
  app.use(cors());
  app.use(express.json({ limit: '256kb' }));
  app.use(requestLogger);

  // ─── Routes ─────────────────────────────────────────────
  app.use('/', createHealthRouter(node, info));
  app.use('/api/governance', createGovernanceRouter(node));
  app.use('/api/crosschain', createCrossChainRouter(node));
  app.use('/api/events', createEventsRouter(node.log));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Malformed JSON bodies surface here from express.json().
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body is not valid JSON', code: 'VALIDATION' });
      return;
    }
    console.error('[app] unhandled error:', err);
    res.status(500).json({ error: 'Internal error' });
  });

  return app;
}
