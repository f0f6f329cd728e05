import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileAccountStore, parseRecordLine, toRecordLine } from '../../src/repositories/fileAccountStore';
import { createAccountStore } from '../../src/repositories/accountsRepo';

describe('record lines', () => {
  it('formats and parses username,secret,wins,losses,draws', () => {
    const account = { username: 'alice', secret: 'hash', wins: 3, losses: 1, draws: 2 };
    expect(toRecordLine(account)).toBe('alice,hash,3,1,2');
    expect(parseRecordLine('alice,hash,3,1,2')).toEqual(account);
  });

  it.each(['alice,hash,1,2', 'alice,hash,1,2,3,4', ',hash,0,0,0', 'alice,,0,0,0', 'alice,hash,-1,0,0', 'alice,hash,1.5,0,0', 'alice,hash,x,0,0'])(
    'rejects %p',
    (line) => {
      expect(parseRecordLine(line)).toBeNull();
    }
  );
});

describe('FileAccountStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'ttt-accounts-'));
    file = path.join(dir, 'users.txt');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('loads nothing when the file does not exist yet', async () => {
    await expect(new FileAccountStore(file).loadAccounts()).resolves.toEqual([]);
  });

  it('writes one record per line and reads them back', async () => {
    const store = new FileAccountStore(file);
    const accounts = [
      { username: 'alice', secret: 'h1', wins: 1, losses: 2, draws: 3 },
      { username: 'bob', secret: 'h2', wins: 0, losses: 0, draws: 0 },
    ];
    await store.saveAccounts(accounts);
    expect(await fs.readFile(file, 'utf8')).toBe('alice,h1,1,2,3\nbob,h2,0,0,0\n');
    expect(await store.loadAccounts()).toEqual(accounts);
  });

  it('replaces the whole file and leaves no temporary file behind', async () => {
    const store = new FileAccountStore(file);
    await store.saveAccounts([{ username: 'alice', secret: 'h1', wins: 0, losses: 0, draws: 0 }]);
    await store.saveAccounts([{ username: 'bob', secret: 'h2', wins: 1, losses: 0, draws: 0 }]);
    expect(await fs.readFile(file, 'utf8')).toBe('bob,h2,1,0,0\n');
    expect(await fs.readdir(dir)).toEqual(['users.txt']);
  });

  it('skips malformed lines and blank lines', async () => {
    await fs.writeFile(file, 'alice,h,1,0,0\ngarbage\nbob,h,x,0,0\n\ncarol,h,0,0,1\n', 'utf8');
    const accounts = await new FileAccountStore(file).loadAccounts();
    expect(accounts.map((a) => a.username)).toEqual(['alice', 'carol']);
    expect(console.warn).toHaveBeenCalledWith(`[accounts] skipping malformed record at ${file}:2`);
    expect(console.warn).toHaveBeenCalledWith(`[accounts] skipping malformed record at ${file}:3`);
  });

  it('reads CRLF files', async () => {
    await fs.writeFile(file, 'alice,h,1,0,0\r\nbob,h,0,1,0\r\n', 'utf8');
    const accounts = await new FileAccountStore(file).loadAccounts();
    expect(accounts).toEqual([
      { username: 'alice', secret: 'h', wins: 1, losses: 0, draws: 0 },
      { username: 'bob', secret: 'h', wins: 0, losses: 1, draws: 0 },
    ]);
  });

  it('surfaces read errors other than a missing file', async () => {
    await expect(new FileAccountStore(dir).loadAccounts()).rejects.toMatchObject({ code: 'EISDIR' });
  });
});

describe('createAccountStore', () => {
  it('opens the file store without touching a database', async () => {
    await expect(createAccountStore('file')).resolves.toBeInstanceOf(FileAccountStore);
  });
});
