import { promises as fs } from 'fs';
import path from 'path';
import { Account } from '../types/game';
import type { AccountStore } from './accountsRepo';

export function toRecordLine(a: Account): string {
  return [a.username, a.secret, a.wins, a.losses, a.draws].join(',');
}

/** Parses `username,secret,wins,losses,draws`; null when the line is not a valid record. */
export function parseRecordLine(line: string): Account | null {
  const parts = line.trim().split(',');
  if (parts.length !== 5) return null;
  const [username, secret, ...counters] = parts;
  const [wins, losses, draws] = counters.map((c) => (/^\d+$/.test(c) ? Number(c) : NaN));
  if (!username || !secret || [wins, losses, draws].some((n) => Number.isNaN(n))) return null;
  return { username, secret, wins, losses, draws };
}

/** One `username,secret,wins,losses,draws` record per line. */
export class FileAccountStore implements AccountStore {
  constructor(private readonly filePath: string) {}

  async loadAccounts(): Promise<Account[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }
    const accounts: Account[] = [];
    raw.split(/\r?\n/).forEach((line, i) => {
      if (!line.trim()) return;
      const account = parseRecordLine(line);
      if (!account) {
        console.warn(`[accounts] skipping malformed record at ${this.filePath}:${i + 1}`);
        return;
      }
      accounts.push(account);
    });
    return accounts;
  }

  async saveAccounts(accounts: Account[]): Promise<void> {
    const body = accounts.map((a) => toRecordLine(a) + '\n').join('');
    // Write beside the target and rename over it so readers never see a partial file.
    const tmp = path.join(path.dirname(this.filePath), `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    await fs.writeFile(tmp, body, 'utf8');
    await fs.rename(tmp, this.filePath);
  }
}
