import { ensureDb } from './db';

export async function ensureSchema() {
  const db = await ensureDb();
  await db.query(`
    create table if not exists accounts (
      username text primary key,
      secret text not null,
      wins integer not null default 0 check (wins >= 0),
      losses integer not null default 0 check (losses >= 0),
      draws integer not null default 0 check (draws >= 0),
      updated_at timestamptz not null default now()
    );

    create index if not exists idx_accounts_wins on accounts(wins desc);
  `);
}
