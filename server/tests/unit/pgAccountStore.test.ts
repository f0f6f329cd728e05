import type { Pool } from 'pg';
import { PgAccountStore } from '../../src/repositories/pgAccountStore';

function fakePool(failOn?: string) {
  const client = {
    query: jest.fn(async (sql: string, _params?: unknown[]) => {
      if (failOn && sql.includes(failOn)) throw new Error('constraint violated');
      return { rows: [] };
    }),
    release: jest.fn(),
  };
  const pool = {
    query: jest.fn(async () => ({
      rows: [{ username: 'alice', secret: 'hash', wins: 2, losses: 1, draws: 0 }],
    })),
    connect: jest.fn(async () => client),
  };
  return { pool, client, db: pool as unknown as Pool };
}

const statements = (client: { query: jest.Mock }) =>
  client.query.mock.calls.map(([sql]) => String(sql).trim().split(/\s+/).slice(0, 3).join(' '));

describe('PgAccountStore', () => {
  it('loads accounts ordered by name', async () => {
    const { pool, db } = fakePool();
    await expect(new PgAccountStore(db).loadAccounts()).resolves.toEqual([
      { username: 'alice', secret: 'hash', wins: 2, losses: 1, draws: 0 },
    ]);
    expect(pool.query).toHaveBeenCalledWith(expect.stringContaining('order by username asc'));
  });

  it('replaces the table inside one transaction', async () => {
    const { client, db } = fakePool();
    await new PgAccountStore(db).saveAccounts([
      { username: 'alice', secret: 'h1', wins: 1, losses: 0, draws: 0 },
      { username: 'bob', secret: 'h2', wins: 0, losses: 1, draws: 0 },
    ]);
    expect(statements(client)).toEqual([
      'BEGIN',
      'delete from accounts',
      'insert into accounts',
      'insert into accounts',
      'COMMIT',
    ]);
    expect(client.query.mock.calls[2][1]).toEqual(['alice', 'h1', 1, 0, 0]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back and rethrows when a write fails', async () => {
    const { client, db } = fakePool('insert');
    await expect(
      new PgAccountStore(db).saveAccounts([{ username: 'alice', secret: 'h1', wins: 0, losses: 0, draws: 0 }])
    ).rejects.toThrow('constraint violated');
    expect(statements(client)).toEqual(['BEGIN', 'delete from accounts', 'insert into accounts', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});
