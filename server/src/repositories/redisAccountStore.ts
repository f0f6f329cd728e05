import type Redis from 'ioredis';
import { z } from 'zod';
import { Account } from '../types/game';
import type { AccountStore } from './accountsRepo';

export const ACCOUNTS_KEY = 'accounts'; // HASH username -> JSON Account

const accountSchema = z.object({
  username: z.string().min(1),
  secret: z.string().min(1),
  wins: z.number().int().nonnegative(),
  losses: z.number().int().nonnegative(),
  draws: z.number().int().nonnegative(),
});

export class RedisAccountStore implements AccountStore {
  constructor(private readonly redis: Redis) {}

  async loadAccounts(): Promise<Account[]> {
    const all = await this.redis.hgetall(ACCOUNTS_KEY);
    const accounts: Account[] = [];
    for (const [username, raw] of Object.entries(all)) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        parsed = null;
      }
      const result = accountSchema.safeParse(parsed);
      if (!result.success || result.data.username !== username) {
        console.warn(`[accounts] skipping malformed redis record for ${username}`);
        continue;
      }
      accounts.push(result.data);
    }
    return accounts;
  }

  async saveAccounts(accounts: Account[]): Promise<void> {
    const tx = this.redis.multi().del(ACCOUNTS_KEY);
    if (accounts.length > 0) {
      const fields: Record<string, string> = {};
      for (const a of accounts) fields[a.username] = JSON.stringify(a);
      tx.hset(ACCOUNTS_KEY, fields);
    }
    const replies = await tx.exec();
    if (!replies) throw new Error('redis transaction aborted');
    for (const [err] of replies) {
      if (err) throw err;
    }
  }
}
