import type { Server as HTTPServer } from 'http';
import { Server } from 'socket.io';
import { env } from '../config/env';
import type { SessionHub } from './hub';
import { ConnectionSession } from './connection';
import { encode } from '../protocol/codec';
import { errorMessage } from '../protocol/messages';

export const MESSAGE_EVENT = 'message';

/**
 * socket.io gateway to the same line protocol: each `message` event carries
 * one encoded message in either direction.
 */
export function createSocketServer(httpServer: HTTPServer, hub: SessionHub) {
  const io = new Server(httpServer, {
    cors: {
      origin: env.corsOrigin,
      methods: ['GET', 'POST'],
    },
  });

  io.on('connection', (socket) => {
    const sid = socket.id;
    console.log(`[socket] connected: ${sid}`);

    const session = new ConnectionSession(
      hub,
      {
        send: (line) => {
          socket.emit(MESSAGE_EVENT, line);
        },
        close: () => {
          socket.disconnect(true);
        },
      },
      `socket.io:${sid}`
    );

    socket.on(MESSAGE_EVENT, (payload: unknown) => {
      if (typeof payload !== 'string') {
        socket.emit(MESSAGE_EVENT, encode(errorMessage('Invalid message format')));
        return;
      }
      session.receive(payload);
    });

    socket.on('disconnect', (reason: string) => {
      console.log(`[socket] disconnected: ${sid} reason=${reason}`);
      session.terminate(reason);
    });
  });

  return io;
}
