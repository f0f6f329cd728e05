export type PlayerMark = 'X' | 'O';
export type Cell = PlayerMark | null;

/** Result of a finished game from one player's point of view. */
export type Outcome = 'WIN' | 'LOSS' | 'DRAW';

export interface Move {
  player: string;
  mark: PlayerMark;
  index: number; // 0..8, row-major
  at: number; // timestamp
}

export interface GameState {
  id: string;
  board: Cell[]; // 9 cells
  players: {
    X: string; // player1, always moves first
    O: string;
  };
  currentTurn: PlayerMark;
  status: 'active' | 'completed';
  winner: PlayerMark | 'draw' | null;
  moves: Move[];
  startedAt: number;
  endedAt?: number;
}

export type MoveRejection = 'game_over' | 'not_your_turn' | 'out_of_bounds' | 'occupied';

export type MoveResult = { ok: true; game: GameState } | { ok: false; reason: MoveRejection };

export interface Account {
  username: string;
  secret: string; // bcrypt hash
  wins: number;
  losses: number;
  draws: number;
}
