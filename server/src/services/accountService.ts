import bcrypt from 'bcryptjs';
import { Account, Outcome } from '../types/game';
import type { AccountStore } from '../repositories/accountsRepo';
import { env } from '../config/env';

/**
 * In-memory account table backed by an {@link AccountStore}. Every mutation
 * rewrites the whole set; writes go through one queue so they land in order.
 */
export class AccountRegistry {
  private accounts = new Map<string, Account>();
  private writes: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: AccountStore,
    private readonly bcryptRounds: number = env.bcryptRounds
  ) {}

  async load(): Promise<number> {
    const loaded = await this.store.loadAccounts();
    this.accounts = new Map(loaded.map((a) => [a.username, { ...a }]));
    return this.accounts.size;
  }

  /** False when the username is taken. */
  async register(username: string, secret: string): Promise<boolean> {
    if (this.accounts.has(username)) return false;
    const hash = await bcrypt.hash(secret, this.bcryptRounds);
    // Re-checked after hashing: another registration may have landed meanwhile.
    if (this.accounts.has(username)) return false;
    const account: Account = { username, secret: hash, wins: 0, losses: 0, draws: 0 };
    this.accounts.set(username, account);
    try {
      await this.persist();
    } catch (err) {
      // Not stored: forget the account so a retry can register it again.
      if (this.accounts.get(username) === account) this.accounts.delete(username);
      throw err;
    }
    return true;
  }

  async authenticate(username: string, secret: string): Promise<boolean> {
    const account = this.accounts.get(username);
    if (!account) return false;
    return bcrypt.compare(secret, account.secret);
  }

  get(username: string): Account | undefined {
    const account = this.accounts.get(username);
    return account ? { ...account } : undefined;
  }

  all(): Account[] {
    return Array.from(this.accounts.values(), (a) => ({ ...a }));
  }

  /** Counts the outcome immediately; the returned promise settles once it is on disk. */
  updateOutcome(username: string, outcome: Outcome): Promise<void> {
    const account = this.accounts.get(username);
    if (!account) return Promise.resolve();
    if (outcome === 'WIN') account.wins++;
    else if (outcome === 'LOSS') account.losses++;
    else account.draws++;
    return this.persist();
  }

  /** Resolves once every write queued so far has settled. */
  flushed(): Promise<void> {
    return this.writes;
  }

  private persist(): Promise<void> {
    // The snapshot is taken when the write runs, so it includes every change made before it.
    const write = this.writes.then(() => this.store.saveAccounts(this.all()));
    this.writes = write.catch((err: unknown) => {
      console.error('[accounts] persist failed', err);
    });
    return write;
  }
}
