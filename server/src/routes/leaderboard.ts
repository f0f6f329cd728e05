import { Router } from 'express';
import type { SessionHub } from '../socket/hub';

export function createLeaderboardRouter(hub: SessionHub) {
  const router = Router();

  router.get('/leaderboard', (req, res) => {
    try {
      const requested = Number(req.query.limit ?? 10);
      const limit = Number.isFinite(requested) ? Math.max(1, Math.min(100, Math.trunc(requested))) : 10;
      res.json({ top: hub.leaderboard(limit) });
    } catch (err) {
      console.error('[leaderboard] error', err);
      res.status(500).json({ error: 'leaderboard_error' });
    }
  });

  return router;
}
