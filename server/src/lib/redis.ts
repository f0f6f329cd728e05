import Redis from 'ioredis';
import { env } from '../config/env';

let client: Redis | null = null;
let errorLoggedOnce = false;

export function getRedis() {
  if (!client) {
    client = new Redis(env.redisUrl, {
      lazyConnect: true,
      maxRetriesPerRequest: 1,
      // Fail fast while disconnected instead of queueing account writes.
      enableOfflineQueue: false,
      retryStrategy: (times) => Math.min(times * 200, 5000),
    });

    client.on('error', (err: Error) => {
      if (!errorLoggedOnce) {
        console.warn('[redis] connection error:', err.message);
        errorLoggedOnce = true;
      }
    });
    client.on('ready', () => {
      if (errorLoggedOnce) console.log('[redis] reconnected');
      errorLoggedOnce = false;
    });
  }
  return client;
}

export async function ensureRedis() {
  const r = getRedis();
  if (r.status === 'wait' || r.status === 'end') {
    await r.connect();
  }
  return r;
}

export async function closeRedis() {
  if (client) {
    await client.quit();
    client = null;
    errorLoggedOnce = false;
  }
}
