import { Router } from 'express';
import type { SessionSummary } from '../session/types.js';

export function sessionsRouter(listSessions: () => SessionSummary[]): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const sessions = listSessions();
    res.json({ count: sessions.length, sessions });
  });

  return router;
}
