import { Account } from '../types/game';
import { env, AccountStoreKind } from '../config/env';
import { FileAccountStore } from './fileAccountStore';
import { PgAccountStore } from './pgAccountStore';
import { RedisAccountStore } from './redisAccountStore';
import { ensureDb } from '../lib/db';
import { ensureRedis } from '../lib/redis';
import { ensureSchema } from '../lib/schema';

/**
 * Durable home of the account set. Every save replaces the whole set, so a
 * reader never sees half of one write and half of another.
 */
export interface AccountStore {
  loadAccounts(): Promise<Account[]>;
  saveAccounts(accounts: Account[]): Promise<void>;
}

export async function createAccountStore(kind: AccountStoreKind = env.accountStore): Promise<AccountStore> {
  switch (kind) {
    case 'postgres':
      await ensureSchema();
      return new PgAccountStore(await ensureDb());
    case 'redis':
      return new RedisAccountStore(await ensureRedis());
    case 'file':
      return new FileAccountStore(env.accountsFile);
  }
}
