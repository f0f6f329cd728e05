import { Cell, GameState, MoveResult, Outcome, PlayerMark } from '../types/game';
import { v4 as uuid } from 'uuid';

export const BOARD_SIZE = 3;
export const EMPTY_CELL = ' ';

export function createGame(player1: string, player2: string, id: string = uuid()): GameState {
  return {
    id,
    board: Array<Cell>(BOARD_SIZE * BOARD_SIZE).fill(null),
    players: { X: player1, O: player2 },
    currentTurn: 'X',
    status: 'active',
    winner: null,
    moves: [],
    startedAt: Date.now(),
  };
}

export function cellIndex(x: number, y: number): number {
  return x * BOARD_SIZE + y;
}

export function markOf(game: GameState, player: string): PlayerMark | null {
  if (game.players.X === player) return 'X';
  if (game.players.O === player) return 'O';
  return null;
}

export function currentPlayer(game: GameState): string {
  return game.players[game.currentTurn];
}

export function opponentOf(game: GameState, player: string): string {
  return game.players.X === player ? game.players.O : game.players.X;
}

// Only the lines running through (x, y) can have been completed by a move there.
function completesLine(board: Cell[], x: number, y: number, mark: PlayerMark): boolean {
  const all = (cells: number[][]) => cells.every(([r, c]) => board[cellIndex(r, c)] === mark);
  const span = [0, 1, 2];
  if (all(span.map((c) => [x, c]))) return true;
  if (all(span.map((r) => [r, y]))) return true;
  if (x === y && all(span.map((i) => [i, i]))) return true;
  if (x + y === BOARD_SIZE - 1 && all(span.map((i) => [i, BOARD_SIZE - 1 - i]))) return true;
  return false;
}

export function applyMove(game: GameState, player: string, x: number, y: number): MoveResult {
  if (game.status !== 'active') return { ok: false, reason: 'game_over' };
  if (currentPlayer(game) !== player) return { ok: false, reason: 'not_your_turn' };
  if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || x >= BOARD_SIZE || y < 0 || y >= BOARD_SIZE) {
    return { ok: false, reason: 'out_of_bounds' };
  }
  const index = cellIndex(x, y);
  if (game.board[index] !== null) return { ok: false, reason: 'occupied' };

  const mark = game.currentTurn;
  const board = game.board.slice();
  board[index] = mark;
  const moves = game.moves.concat({ player, mark, index, at: Date.now() });

  if (completesLine(board, x, y, mark)) {
    return { ok: true, game: { ...game, board, moves, status: 'completed', winner: mark, endedAt: Date.now() } };
  }
  if (moves.length === board.length) {
    return { ok: true, game: { ...game, board, moves, status: 'completed', winner: 'draw', endedAt: Date.now() } };
  }
  return { ok: true, game: { ...game, board, moves, currentTurn: mark === 'X' ? 'O' : 'X' } };
}

export function resultFor(game: GameState, player: string): Outcome {
  if (game.status !== 'completed' || game.winner === null) {
    throw new Error(`Game ${game.id} has no result yet`);
  }
  if (game.winner === 'draw') return 'DRAW';
  return game.players[game.winner] === player ? 'WIN' : 'LOSS';
}

/** Board as sent on the wire: `"x,y"` → `"X" | "O" | " "` for every cell. */
export function boardMap(game: GameState): Record<string, string> {
  const out: Record<string, string> = {};
  for (let x = 0; x < BOARD_SIZE; x++) {
    for (let y = 0; y < BOARD_SIZE; y++) {
      out[`${x},${y}`] = game.board[cellIndex(x, y)] ?? EMPTY_CELL;
    }
  }
  return out;
}
