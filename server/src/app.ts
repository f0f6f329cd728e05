import express from 'express';
import cors from 'cors';
import { env } from './config/env';
import type { SessionHub } from './socket/hub';
import { createHealthRouter } from './routes/health';
import { createLeaderboardRouter } from './routes/leaderboard';

export function createApp(hub: SessionHub) {
  const app = express();

  app.use(cors({ origin: env.corsOrigin }));
  app.use(express.json());

  app.use('/', createHealthRouter(hub));
  app.use('/', createLeaderboardRouter(hub));

  return app;
}
