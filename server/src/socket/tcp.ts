import net from 'net';
import readline from 'readline';
import type { Duplex } from 'stream';
import type { SessionHub } from './hub';
import { ConnectionSession } from './connection';

/**
 * Binds one byte stream to a session: newline-delimited messages in, one
 * message plus `\n` per send out. EOF, a stream error or a logout all end up
 * in `session.terminate`, which runs once. While the peer is not reading
 * (`write` returns false) no further lines are read from it.
 */
export function attachLineTransport(stream: Duplex, hub: SessionHub, remote = 'unknown'): ConnectionSession {
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
  let draining = false;

  const session = new ConnectionSession(
    hub,
    {
      send: (line) => {
        if (!stream.writable) throw new Error('stream is no longer writable');
        if (stream.write(line + '\n') || draining) return;
        draining = true;
        lines.pause();
        stream.once('drain', () => {
          draining = false;
          lines.resume();
        });
      },
      close: () => {
        if (!stream.destroyed && !stream.writableEnded) stream.end();
      },
    },
    remote
  );

  lines.on('line', (line) => session.receive(line));
  lines.on('close', () => session.terminate('eof'));
  // readline re-emits input errors on the interface.
  lines.on('error', (err: Error) => {
    console.warn(`[tcp] stream error from ${remote}: ${err.message}`);
    session.terminate('stream error');
  });
  stream.on('close', () => session.terminate('closed'));
  return session;
}

export function createLineServer(hub: SessionHub): net.Server {
  const server = net.createServer((socket) => {
    const remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
    console.log(`[tcp] connected: ${remote}`);
    socket.setNoDelay(true);
    attachLineTransport(socket, hub, remote);
  });
  server.on('error', (err) => {
    console.error('[tcp] server error', err);
  });
  return server;
}
