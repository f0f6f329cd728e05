import { Account } from '../types/game';

export interface LeaderboardRow {
  rank: number;
  username: string;
  wins: number;
  losses: number;
  draws: number;
}

function gamesPlayed(a: Account) {
  return a.wins + a.losses + a.draws;
}

/**
 * Most wins first; equal wins go to whoever has played more games. The sort is
 * stable, so remaining ties keep their input order.
 */
export function rankAccounts(accounts: Account[], limit: number): LeaderboardRow[] {
  return accounts
    .slice()
    .sort((a, b) => b.wins - a.wins || gamesPlayed(b) - gamesPlayed(a))
    .slice(0, Math.max(0, limit))
    .map((a, i) => ({ rank: i + 1, username: a.username, wins: a.wins, losses: a.losses, draws: a.draws }));
}

/** `rank,name,wins,losses,draws` per row, rows joined by `|`. */
export function formatLeaderboard(rows: LeaderboardRow[]): string {
  return rows.map((r) => [r.rank, r.username, r.wins, r.losses, r.draws].join(',')).join('|');
}
