import type { ConnectionSession } from './connection';
import type { Message } from '../protocol/codec';
import {
  challengeMessage,
  challengeResponseMessage,
  InviteResponse,
  leaderboardMessage,
  loginSuccessMessage,
  opponentDisconnectedMessage,
  playersListMessage,
  rematchRequestMessage,
  rematchResponseMessage,
  resultMessage,
  startGameMessage,
  successMessage,
  updateMessage,
} from '../protocol/messages';
import { AccountRegistry } from '../services/accountService';
import { PresenceRegistry } from '../services/presenceService';
import { InvitationBook } from '../services/matchmakingService';
import { applyMove, createGame, currentPlayer, markOf, opponentOf, resultFor } from '../services/gameService';
import { formatLeaderboard, LeaderboardRow, rankAccounts } from '../services/leaderboardService';
import { GameState, Outcome } from '../types/game';
import { GameError } from '../lib/errors';
import { KeyedLock } from '../lib/keyedLock';
import { env } from '../config/env';

/**
 * Owns every piece of shared state: presence, live games, pending challenges
 * and rematches, last opponents, and (through the registry) accounts.
 * Connection sessions only reach that state through the methods here.
 *
 * Each check-then-write below runs without yielding between the check and the
 * write. The operations that have to await (password hashing, persistence)
 * hold a per-key lock for their whole duration.
 */
export class SessionHub {
  readonly presence = new PresenceRegistry();
  private sessions = new Map<string, ConnectionSession>(); // username -> session
  private games = new Map<string, GameState>();
  private gameByPlayer = new Map<string, string>(); // username -> gameId
  private challenges = new InvitationBook();
  private rematches = new InvitationBook();
  private lastOpponents = new Map<string, string>();
  private locks = new KeyedLock();

  constructor(
    readonly accounts: AccountRegistry,
    private readonly leaderboardLimit: number = env.leaderboardLimit
  ) {}

  // ---- accounts & presence ----

  async register(session: ConnectionSession, username: string, password: string): Promise<void> {
    const created = await this.locks.run(`user:${username}`, () => this.accounts.register(username, password));
    if (!created) throw new GameError('Username already exists');
    console.log(`[hub] registered ${username}`);
    session.deliver(successMessage('Registration successful'));
  }

  async login(session: ConnectionSession, username: string, password: string): Promise<void> {
    if (session.username) throw new GameError('Already logged in');
    await this.locks.run(`user:${username}`, async () => {
      const valid = await this.accounts.authenticate(username, password);
      // The connection may have dropped while the password was being checked.
      if (session.isClosed) return;
      if (!valid) throw new GameError('Incorrect credentials', 'unauthorized');
      if (!this.presence.markOnline(username, session.id)) throw new GameError('User already logged in');
      session.authenticate(username);
      this.addSession(session);

      const account = this.accounts.get(username);
      if (account) session.deliver(loginSuccessMessage(account));
      console.log(`[hub] ${username} logged in (session ${session.id})`);
      this.broadcastPresence();
    });
  }

  addSession(session: ConnectionSession) {
    const username = session.username;
    if (!username) throw new Error('cannot add a session before it has logged in');
    this.sessions.set(username, session);
  }

  /** Implicit logout: clears presence, invitations and any live game of the session's user. */
  removeSession(session: ConnectionSession) {
    const username = session.username;
    if (!username || this.sessions.get(username) !== session) return;
    this.sessions.delete(username);
    this.presence.markOffline(username, session.id);
    const dropped = this.challenges.dropUser(username) + this.rematches.dropUser(username);
    if (dropped > 0) console.log(`[hub] dropped ${dropped} pending invitation(s) of ${username}`);

    const gameId = this.gameByPlayer.get(username);
    const game = gameId ? this.games.get(gameId) : undefined;
    if (game) {
      this.endGame(game);
      if (game.status === 'active') {
        const opponent = opponentOf(game, username);
        this.sendTo(opponent, opponentDisconnectedMessage(game.id));
        console.log(`[hub] game ${game.id} abandoned: ${username} left, ${opponent} notified`);
      }
    }
    console.log(`[hub] ${username} went offline`);
    this.broadcastPresence();
  }

  /** Each logged-in session gets the online list minus its own name. */
  broadcastPresence() {
    const online = this.presence.listOnline();
    for (const [username, session] of Array.from(this.sessions.entries())) {
      session.deliver(playersListMessage(online.filter((name) => name !== username)));
    }
  }

  listPlayers(username: string) {
    this.sendTo(username, playersListMessage(this.presence.listOnline().filter((name) => name !== username)));
  }

  // ---- challenges & rematches ----

  challenge(from: string, to: string) {
    this.ensureInvitable(from, to);
    this.challenges.offer(from, to);
    this.sendTo(to, challengeMessage(from));
    console.log(`[hub] ${from} challenged ${to}`);
  }

  respondToChallenge(challenger: string, responder: string, response: InviteResponse) {
    if (!this.challenges.consume(challenger, responder)) throw new GameError('No pending challenge');
    this.answerInvitation(challenger, responder, response, challengeResponseMessage(responder, response));
  }

  /** Without a target the requester's last opponent is asked. */
  rematch(requester: string, target?: string) {
    const opponent = target ?? this.lastOpponents.get(requester);
    if (!opponent) throw new GameError('No previous opponent found');
    this.ensureInvitable(requester, opponent);
    this.rematches.offer(requester, opponent);
    this.sendTo(opponent, rematchRequestMessage(requester));
    console.log(`[hub] ${requester} asked ${opponent} for a rematch`);
  }

  respondToRematch(requester: string, responder: string, response: InviteResponse) {
    if (!this.rematches.consume(requester, responder)) throw new GameError('No pending rematch');
    this.answerInvitation(requester, responder, response, rematchResponseMessage(responder, response));
  }

  private ensureInvitable(from: string, to: string) {
    if (!this.sessions.has(to)) throw new GameError('User not available');
    if (from === to) throw new GameError('Cannot challenge yourself');
    if (this.gameByPlayer.has(from)) throw new GameError('You are already in a game');
    if (this.gameByPlayer.has(to)) throw new GameError('User is already in a game');
  }

  private answerInvitation(sender: string, responder: string, response: InviteResponse, reply: Message) {
    if (response === 'ACCEPT') {
      if (!this.sessions.has(sender)) throw new GameError('User not available');
      if (this.gameByPlayer.has(responder)) throw new GameError('You are already in a game');
      if (this.gameByPlayer.has(sender)) throw new GameError('User is already in a game');
    }
    this.sendTo(sender, reply);
    if (response !== 'ACCEPT') return;
    // A failed delivery of the reply logs the sender out.
    if (!this.sessions.has(sender)) throw new GameError('User not available');
    this.startGame(sender, responder);
  }

  private startGame(player1: string, player2: string): GameState {
    const game = createGame(player1, player2);
    this.games.set(game.id, game);
    this.gameByPlayer.set(player1, game.id);
    this.gameByPlayer.set(player2, game.id);
    console.log(`[hub] game ${game.id} started: ${player1} (X) vs ${player2} (O)`);
    this.announce(game.id, startGameMessage(game));
    return game;
  }

  /**
   * Sends `message` to both players of a live game. Stops once the game is
   * gone: a failed delivery removes that player's session, which ends the game
   * and tells the opponent.
   */
  private announce(gameId: string, message: Message) {
    const game = this.games.get(gameId);
    if (!game) return;
    for (const player of [game.players.X, game.players.O]) {
      if (!this.games.has(gameId)) return;
      this.sendTo(player, message);
    }
  }

  // ---- games ----

  async move(gameId: string, player: string, x: number, y: number): Promise<void> {
    await this.locks.run(`game:${gameId}`, async () => {
      const game = this.games.get(gameId);
      if (!game) throw new GameError('Game not found');
      if (markOf(game, player) === null) throw new GameError('Not a player in this game');
      if (currentPlayer(game) !== player) throw new GameError('Not your turn');
      const result = applyMove(game, player, x, y);
      if (!result.ok) throw new GameError('Invalid move, try again');

      const next = result.game;
      if (next.status === 'completed') {
        await this.finishGame(next);
        return;
      }
      this.games.set(gameId, next);
      this.announce(gameId, updateMessage(next));
    });
  }

  /** Settles the game before anything is sent, so a player dropping mid-send cannot undo the result. */
  private async finishGame(game: GameState) {
    const { X, O } = game.players;
    const outcomes: [string, Outcome][] = [
      [X, resultFor(game, X)],
      [O, resultFor(game, O)],
    ];
    const writes = outcomes.map(([player, outcome]) => this.accounts.updateOutcome(player, outcome));
    this.lastOpponents.set(X, O);
    this.lastOpponents.set(O, X);
    this.endGame(game);
    const update = updateMessage(game);
    for (const [player, outcome] of outcomes) {
      this.sendTo(player, update);
      this.sendTo(player, resultMessage(game, outcome));
    }
    const verdict = game.winner === 'X' || game.winner === 'O' ? `${game.players[game.winner]} won` : 'draw';
    console.log(`[hub] game ${game.id} finished: ${verdict}`);
    try {
      await Promise.all(writes);
    } catch (err) {
      console.error(`[hub] result of game ${game.id} not saved`, err);
    }
  }

  private endGame(game: GameState) {
    this.games.delete(game.id);
    for (const player of [game.players.X, game.players.O]) {
      if (this.gameByPlayer.get(player) === game.id) this.gameByPlayer.delete(player);
    }
  }

  // ---- leaderboard ----

  leaderboard(limit: number = this.leaderboardLimit): LeaderboardRow[] {
    return rankAccounts(this.accounts.all(), limit);
  }

  sendLeaderboard(username: string) {
    this.sendTo(username, leaderboardMessage(formatLeaderboard(this.leaderboard())));
  }

  // ---- lookups ----

  gameOf(username: string): GameState | undefined {
    const gameId = this.gameByPlayer.get(username);
    return gameId ? this.games.get(gameId) : undefined;
  }

  getGame(gameId: string): GameState | undefined {
    return this.games.get(gameId);
  }

  pendingChallengeFrom(username: string): string | undefined {
    return this.challenges.pendingFor(username);
  }

  pendingRematchFrom(username: string): string | undefined {
    return this.rematches.pendingFor(username);
  }

  lastOpponentOf(username: string): string | undefined {
    return this.lastOpponents.get(username);
  }

  stats() {
    return { online: this.presence.size, games: this.games.size };
  }

  private sendTo(username: string, message: Message) {
    const session = this.sessions.get(username);
    if (!session) {
      console.warn(`[hub] dropping ${message.type} for offline user ${username}`);
      return;
    }
    session.deliver(message);
  }
}
