import http from 'http';
import { env } from './config/env';
import { createApp } from './app';
import { createSocketServer } from './socket/index';
import { createLineServer } from './socket/tcp';
import { SessionHub } from './socket/hub';
import { AccountRegistry } from './services/accountService';
import { createAccountStore } from './repositories/accountsRepo';
import { closeDb } from './lib/db';
import { closeRedis } from './lib/redis';

async function start() {
  const store = await createAccountStore();
  const accounts = new AccountRegistry(store);
  const loaded = await accounts.load();
  console.log(`[server] loaded ${loaded} account(s) from ${env.accountStore} store`);

  const hub = new SessionHub(accounts);
  const app = createApp(hub);
  const server = http.createServer(app);
  const io = createSocketServer(server, hub);
  const lineServer = createLineServer(hub);

  server.listen(env.port, () => {
    console.log(`[server] listening on http://localhost:${env.port}`);
  });
  lineServer.listen(env.tcpPort, () => {
    console.log(`[tcp] line protocol on port ${env.tcpPort}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[server] ${signal} received, shutting down`);
    lineServer.close();
    io.close();
    accounts
      .flushed()
      .then(() => Promise.all([closeDb(), closeRedis()]))
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error('[server] shutdown failed', err);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((err) => {
  console.error('[server] failed to start', err);
  process.exit(1);
});
