import { v4 as uuid } from 'uuid';
import type { SessionHub } from './hub';
import { decode, encode, Message } from '../protocol/codec';
import { Command, errorMessage, parseCommand } from '../protocol/messages';
import { GameError, isGameError } from '../lib/errors';

/** The outbound half of a client connection, one encoded message per `send`. */
export interface Channel {
  send(line: string): void;
  close(): void;
}

/**
 * One connected client. Inbound lines are handled strictly one after another,
 * the way a blocking reader would, and `terminate` tears the connection down
 * exactly once however it ends (logout, EOF, transport error).
 */
export class ConnectionSession {
  readonly id = uuid();
  private user: string | null = null;
  private closed = false;
  private inbox: Promise<void> = Promise.resolve();

  constructor(
    private readonly hub: SessionHub,
    private readonly channel: Channel,
    readonly remote = 'unknown'
  ) {}

  get username(): string | null {
    return this.user;
  }

  get isClosed() {
    return this.closed;
  }

  /** Called by the hub once credentials check out and presence is claimed. */
  authenticate(username: string) {
    this.user = username;
  }

  receive(raw: string) {
    if (this.closed) return;
    this.inbox = this.inbox.then(() => this.process(raw));
  }

  /** Resolves when every line received so far has been handled. */
  drained(): Promise<void> {
    return this.inbox;
  }

  deliver(message: Message) {
    if (this.closed) return;
    let line: string;
    try {
      line = encode(message);
    } catch (err) {
      console.error(`[session] cannot encode ${String(message.type)} for ${this.describe()}`, err);
      return;
    }
    try {
      this.channel.send(line);
    } catch (err) {
      console.warn(`[session] write to ${this.describe()} failed:`, err instanceof Error ? err.message : err);
      this.terminate('write failed');
    }
  }

  terminate(reason: string) {
    if (this.closed) return;
    this.closed = true;
    console.log(`[session] closed ${this.describe()} reason=${reason}`);
    this.hub.removeSession(this);
    try {
      this.channel.close();
    } catch (err) {
      console.warn(`[session] close of ${this.describe()} failed:`, err instanceof Error ? err.message : err);
    }
  }

  private describe() {
    return this.user ? `${this.user}@${this.remote}` : `${this.id}@${this.remote}`;
  }

  private async process(raw: string): Promise<void> {
    if (this.closed || !raw.trim()) return;
    const decoded = decode(raw);
    if (!decoded.ok) {
      console.warn(`[session] undecodable line from ${this.describe()}: ${decoded.error}`);
      this.deliver(errorMessage('Invalid message format'));
      return;
    }
    const parsed = parseCommand(decoded.message);
    if (!parsed.ok) {
      this.deliver(errorMessage(parsed.error));
      return;
    }
    try {
      await this.dispatch(parsed.command);
    } catch (err) {
      if (isGameError(err)) {
        if (err.kind === 'unauthorized') {
          console.warn(`[session] refused ${parsed.command.type} from ${this.describe()}: ${err.message}`);
        }
        this.deliver(errorMessage(err.message));
        return;
      }
      console.error(`[session] ${parsed.command.type} from ${this.describe()} failed`, err);
      this.deliver(errorMessage('Internal server error'));
    }
  }

  private async dispatch(command: Command): Promise<void> {
    switch (command.type) {
      case 'REGISTER':
        return this.hub.register(this, command.username, command.password);
      case 'LOGIN':
        return this.hub.login(this, command.username, command.password);
      case 'LOGOUT':
        this.terminate('logout');
        return;
    }

    const username = this.user;
    if (!username) throw new GameError('Not authenticated', 'unauthorized');

    switch (command.type) {
      case 'LIST_PLAYERS':
        this.hub.listPlayers(username);
        return;
      case 'CHALLENGE':
        this.hub.challenge(username, command.opponent);
        return;
      case 'CHALLENGE_RESPONSE':
        this.hub.respondToChallenge(command.challenger, username, command.response);
        return;
      case 'MOVE':
        return this.hub.move(command.gameId, username, command.data.x, command.data.y);
      case 'REMATCH_REQUEST':
        this.hub.rematch(username, command.opponent);
        return;
      case 'REMATCH_RESPONSE':
        this.hub.respondToRematch(command.opponent, username, command.response);
        return;
      case 'LEADERBOARD':
        this.hub.sendLeaderboard(username);
        return;
    }
  }
}
