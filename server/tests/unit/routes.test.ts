import request from 'supertest';
import { createApp } from '../../src/app';
import { createHarness, MemoryAccountStore } from '../helpers/fakes';

const account = (username: string, wins: number, losses = 0, draws = 0) => ({
  username,
  secret: 'hash',
  wins,
  losses,
  draws,
});

describe('HTTP routes', () => {
  let h: ReturnType<typeof createHarness>;

  beforeEach(async () => {
    h = createHarness(
      new MemoryAccountStore(Array.from({ length: 12 }, (_, i) => account(`p${i}`, i)).concat(account('zed', 3, 4, 1)))
    );
    await h.accounts.load();
  });

  it('GET /health reports the lobby counters', async () => {
    await h.login('alice');
    const res = await request(createApp(h.hub)).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: 'ok', service: 'ttt-lobby', version: '0.1.0', online: 1, games: 0 });
  });

  it('GET /leaderboard returns ranked rows without secrets', async () => {
    const res = await request(createApp(h.hub)).get('/leaderboard?limit=3');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      top: [
        { rank: 1, username: 'p11', wins: 11, losses: 0, draws: 0 },
        { rank: 2, username: 'p10', wins: 10, losses: 0, draws: 0 },
        { rank: 3, username: 'p9', wins: 9, losses: 0, draws: 0 },
      ],
    });
  });

  it('breaks equal wins by games played', async () => {
    const res = await request(createApp(h.hub)).get('/leaderboard?limit=20');
    const names: string[] = res.body.top.map((row: { username: string }) => row.username);
    expect(names.indexOf('zed')).toBe(names.indexOf('p3') - 1);
  });

  it.each([
    ['', 10],
    ['?limit=abc', 10],
    ['?limit=0', 1],
    ['?limit=500', 13],
  ])('clamps the limit for %p', async (query, expected) => {
    const res = await request(createApp(h.hub)).get(`/leaderboard${query}`);
    expect(res.body.top).toHaveLength(expected);
  });

  it('answers 500 when ranking fails', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    jest.spyOn(h.hub, 'leaderboard').mockImplementation(() => {
      throw new Error('boom');
    });
    const res = await request(createApp(h.hub)).get('/leaderboard');
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: 'leaderboard_error' });
  });
});
