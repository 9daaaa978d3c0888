import { Router } from 'express';
import { DEFAULT_EVENT_PAGE, LogEventTypeSchema, MAX_EVENT_PAGE } from '@crossvote/shared';
import type { EventLog } from '../storage/logStore.js';
import { fail } from '../governance/errors.js';
import { sendFailure } from './http.js';

/** GET /api/events?limit=N&type=T: newest last, at most MAX_EVENT_PAGE */
export function createEventsRouter(log: EventLog): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const limit = Math.min(Math.max(Number(req.query.limit) || DEFAULT_EVENT_PAGE, 1), MAX_EVENT_PAGE);

    if (req.query.type === undefined) {
      res.json({ events: log.readLatest(limit) });
      return;
    }
    const type = LogEventTypeSchema.safeParse(req.query.type);
    if (!type.success) {
      return sendFailure(res, fail('VALIDATION', `type: unknown event type ${String(req.query.type)}`));
    }
    const events = log.readByType(type.data);
    res.json({ events: events.slice(Math.max(0, events.length - limit)) });
  });

  return router;
}
