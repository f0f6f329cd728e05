import { Duplex } from 'stream';
import { attachLineTransport } from '../../src/socket/tcp';
import { createHarness, PASSWORD, waitFor } from '../helpers/fakes';

function fakeStream() {
  const written: string[] = [];
  const stream = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk.toString());
      callback();
    },
  });
  const lines = () => written.join('').split('\n').filter(Boolean);
  return { stream, lines };
}

describe('line transport', () => {
  let h: ReturnType<typeof createHarness>;

  beforeEach(() => {
    h = createHarness();
  });

  it('reads newline-delimited messages and writes one line per reply', async () => {
    const { stream, lines } = fakeStream();
    attachLineTransport(stream, h.hub, 'test');

    stream.push(
      `{"type":"REGISTER","username":"alice","password":"${PASSWORD}"}\n` +
        `{"type":"LOGIN","username":"alice","password":"${PASSWORD}"}\n`
    );
    await waitFor(() => lines().length === 3, 'login replies');

    expect(lines()).toEqual([
      '{"type":"SUCCESS","message":"Registration successful"}',
      '{"type":"LOGIN_SUCCESS","username":"alice","wins":"0","losses":"0","draws":"0"}',
      '{"type":"PLAYERS_LIST","players":""}',
    ]);
  });

  it('reassembles lines split across chunks and accepts CRLF', async () => {
    const { stream, lines } = fakeStream();
    attachLineTransport(stream, h.hub, 'test');

    stream.push('{"type":"LIST_');
    stream.push('PLAYERS"}\r\n');
    await waitFor(() => lines().length === 1, 'reply');

    expect(lines()).toEqual(['{"type":"ERROR","message":"Not authenticated"}']);
  });

  it('logs the user out at end of stream', async () => {
    const { stream } = fakeStream();
    const session = attachLineTransport(stream, h.hub, 'test');
    await h.accounts.register('alice', PASSWORD);
    stream.push(`{"type":"LOGIN","username":"alice","password":"${PASSWORD}"}\n`);
    await waitFor(() => h.hub.presence.isOnline('alice'), 'login');

    stream.push(null);
    await waitFor(() => session.isClosed, 'session close');

    expect(h.hub.presence.isOnline('alice')).toBe(false);
    expect(stream.writableEnded).toBe(true);
  });

  it('terminates the session on a stream error', async () => {
    const { stream } = fakeStream();
    const session = attachLineTransport(stream, h.hub, 'test');

    stream.destroy(new Error('connection reset'));
    await waitFor(() => session.isClosed, 'session close');

    expect(console.warn).toHaveBeenCalledWith('[tcp] stream error from test: connection reset');
  });

  it('drops a session whose stream can no longer be written', async () => {
    const { stream } = fakeStream();
    const session = attachLineTransport(stream, h.hub, 'test');
    await h.accounts.register('alice', PASSWORD);
    stream.push(`{"type":"LOGIN","username":"alice","password":"${PASSWORD}"}\n`);
    await waitFor(() => h.hub.presence.isOnline('alice'), 'login');
    const bob = await h.login('bob');

    stream.end();
    await bob.send({ type: 'CHALLENGE', opponent: 'alice' });

    expect(session.isClosed).toBe(true);
    expect(h.hub.presence.isOnline('alice')).toBe(false);
    expect(bob.channel.last()).toEqual({ type: 'PLAYERS_LIST', players: '' });
  });

  it('stops reading while the peer is not taking replies', async () => {
    const written: string[] = [];
    const held: (() => void)[] = [];
    const stream = new Duplex({
      writableHighWaterMark: 1,
      read() {},
      write(chunk: Buffer, _encoding, callback) {
        written.push(chunk.toString());
        held.push(() => callback());
      },
    });
    attachLineTransport(stream, h.hub, 'test');
    const listPlayers = '{"type":"LIST_PLAYERS"}\n';

    stream.push(listPlayers);
    await waitFor(() => written.length === 1, 'first reply');
    stream.push(listPlayers);
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(written).toHaveLength(1);

    held.splice(0).forEach((release) => release());
    await waitFor(() => written.length === 2, 'second reply');
    expect(written[1]).toBe('{"type":"ERROR","message":"Not authenticated"}\n');
  });
});
