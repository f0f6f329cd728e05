import { Router } from 'express';
import type { SessionHub } from '../socket/hub';

export function createHealthRouter(hub: SessionHub) {
  const router = Router();

  router.get('/health', (_req, res) => {
    const { online, games } = hub.stats();
    res.json({ status: 'ok', service: 'ttt-lobby', version: '0.1.0', online, games });
  });

  return router;
}
