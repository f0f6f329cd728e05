import type { Pool } from 'pg';
import { Account } from '../types/game';
import { withTransaction } from '../lib/db';
import type { AccountStore } from './accountsRepo';

interface AccountRow {
  username: string;
  secret: string;
  wins: number;
  losses: number;
  draws: number;
}

export class PgAccountStore implements AccountStore {
  constructor(private readonly db: Pool) {}

  async loadAccounts(): Promise<Account[]> {
    const { rows } = await this.db.query<AccountRow>(
      `select username, secret, wins, losses, draws
         from accounts
        order by username asc`
    );
    return rows.map((r) => ({ username: r.username, secret: r.secret, wins: r.wins, losses: r.losses, draws: r.draws }));
  }

  async saveAccounts(accounts: Account[]): Promise<void> {
    await withTransaction(this.db, async (client) => {
      await client.query('delete from accounts');
      for (const a of accounts) {
        await client.query(
          `insert into accounts (username, secret, wins, losses, draws, updated_at)
           values ($1, $2, $3, $4, $5, now())`,
          [a.username, a.secret, a.wins, a.losses, a.draws]
        );
      }
    });
  }
}
