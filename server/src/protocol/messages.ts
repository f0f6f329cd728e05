import { z } from 'zod';
import type { Message } from './codec';
import { Account, GameState, Outcome } from '../types/game';
import { boardMap, currentPlayer } from '../services/gameService';

export const USERNAME_PATTERN = /^[A-Za-z0-9_]+$/;

const required = (message: string) => z.string({ required_error: message, invalid_type_error: message });
const responseSchema = (message: string) => z.enum(['ACCEPT', 'REJECT'], { errorMap: () => ({ message }) });
const coordinate = z
  .string({ required_error: 'Move coordinates required', invalid_type_error: 'Move coordinates required' })
  .regex(/^-?\d+$/, 'Invalid move coordinates')
  .transform(Number);

const inboundSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('REGISTER'),
    username: required('Username and password required')
      .min(3, 'Username must be 3-30 letters, digits or underscores')
      .max(30, 'Username must be 3-30 letters, digits or underscores')
      .regex(USERNAME_PATTERN, 'Username must be 3-30 letters, digits or underscores'),
    password: required('Username and password required')
      .min(6, 'Password must be 6-64 characters')
      .max(64, 'Password must be 6-64 characters'),
  }),
  z.object({
    type: z.literal('LOGIN'),
    username: required('Username and password required'),
    password: required('Username and password required'),
  }),
  z.object({ type: z.literal('LIST_PLAYERS') }),
  z.object({ type: z.literal('CHALLENGE'), opponent: required('Opponent username required').min(1, 'Opponent username required') }),
  z.object({
    type: z.literal('CHALLENGE_RESPONSE'),
    challenger: required('Invalid challenge response'),
    response: responseSchema('Invalid challenge response'),
  }),
  z.object({
    type: z.literal('MOVE'),
    gameId: required('Invalid move format'),
    data: z.object(
      { x: coordinate, y: coordinate },
      { required_error: 'Invalid move format', invalid_type_error: 'Invalid move format' }
    ),
  }),
  z.object({ type: z.literal('LOGOUT') }),
  z.object({
    type: z.literal('REMATCH_REQUEST'),
    opponent: z
      .string({ invalid_type_error: 'Invalid rematch request' })
      .optional()
      .transform((v) => (v ? v : undefined)),
  }),
  z.object({
    type: z.literal('REMATCH_RESPONSE'),
    opponent: required('Invalid rematch response'),
    response: responseSchema('Invalid rematch response'),
  }),
  z.object({ type: z.literal('LEADERBOARD') }),
]);

export type Command = z.infer<typeof inboundSchema>;
export type CommandType = Command['type'];
export type InviteResponse = 'ACCEPT' | 'REJECT';

const COMMAND_TYPES: ReadonlySet<string> = new Set<CommandType>([
  'REGISTER',
  'LOGIN',
  'LIST_PLAYERS',
  'CHALLENGE',
  'CHALLENGE_RESPONSE',
  'MOVE',
  'LOGOUT',
  'REMATCH_REQUEST',
  'REMATCH_RESPONSE',
  'LEADERBOARD',
]);

export type ParseResult = { ok: true; command: Command } | { ok: false; error: string };

/** Checks a decoded message against the inbound vocabulary. */
export function parseCommand(message: Message): ParseResult {
  const type = message.type;
  if (typeof type !== 'string') return { ok: false, error: 'Invalid message format' };
  if (!COMMAND_TYPES.has(type)) return { ok: false, error: 'Unknown message type' };
  const result = inboundSchema.safeParse(message);
  if (!result.success) {
    return { ok: false, error: result.error.issues[0]?.message ?? 'Invalid message format' };
  }
  return { ok: true, command: result.data };
}

// ---- outbound ----

export const successMessage = (message: string): Message => ({ type: 'SUCCESS', message });

export const errorMessage = (message: string): Message => ({ type: 'ERROR', message });

export const loginSuccessMessage = (account: Account): Message => ({
  type: 'LOGIN_SUCCESS',
  username: account.username,
  wins: String(account.wins),
  losses: String(account.losses),
  draws: String(account.draws),
});

export const playersListMessage = (players: string[]): Message => ({ type: 'PLAYERS_LIST', players: players.join(',') });

export const challengeMessage = (challenger: string): Message => ({ type: 'CHALLENGE', challenger });

export const challengeResponseMessage = (opponent: string, response: InviteResponse): Message => ({
  type: 'CHALLENGE_RESPONSE',
  opponent,
  response,
});

export const startGameMessage = (game: GameState): Message => ({
  type: 'START_GAME',
  gameId: game.id,
  player1: game.players.X,
  player2: game.players.O,
  currentPlayer: currentPlayer(game),
});

export const updateMessage = (game: GameState): Message => ({
  type: 'UPDATE',
  gameId: game.id,
  board: boardMap(game),
  currentPlayer: currentPlayer(game),
});

export const resultMessage = (game: GameState, result: Outcome): Message => ({
  type: 'RESULT',
  gameId: game.id,
  result,
  board: boardMap(game),
});

export const opponentDisconnectedMessage = (gameId: string): Message => ({ type: 'OPPONENT_DISCONNECTED', gameId });

export const rematchRequestMessage = (requester: string): Message => ({ type: 'REMATCH_REQUEST', requester });

export const rematchResponseMessage = (opponent: string, response: InviteResponse): Message => ({
  type: 'REMATCH_RESPONSE',
  opponent,
  response,
});

export const leaderboardMessage = (data: string): Message => ({ type: 'LEADERBOARD', data });
