export type ReversiPlayer = 1 | 2;

/** 0 is an empty square. */
export type ReversiCell = 0 | ReversiPlayer;

export interface ReversiMove {
  readonly x: number;
  readonly y: number;
}

/** Null move: only switches the player to move. */
export const PASS_MOVE: ReversiMove = Object.freeze({ x: -1, y: -1 });

export function isPassMove(move: ReversiMove): boolean {
  return move.x === PASS_MOVE.x && move.y === PASS_MOVE.y;
}

export function opponentOf(player: ReversiPlayer): ReversiPlayer {
  return player === 1 ? 2 : 1;
}

/**
 * How `evaluate()` scores a position.
 *
 * - `mobility`: legal placements for the mover minus those of the opponent.
 * - `mobility_outcome`: as `mobility`, but finished games score as a win
 *   or loss (OUTCOME_SCORE plus the disc margin) or 0 for a draw.
 */
export type ReversiScoring = 'mobility' | 'mobility_outcome';

export const OUTCOME_SCORE = 90_000;

export const DEFAULT_BOARD_SIZE = 8;
export const MIN_BOARD_SIZE = 4;
export const MAX_BOARD_SIZE = 26;

export interface ReversiOptions {
  size?: number;
  scoring?: ReversiScoring;
}

/**
 * Plain-data form of a position. `board[x][y]` holds the cell at
 * column x, row y.
 */
export interface ReversiSnapshot {
  board: ReversiCell[][];
  player: ReversiPlayer;
}

export interface ReversiOutcome {
  /** null on a draw */
  winner: ReversiPlayer | null;
  discs: Record<ReversiPlayer, number>;
}

export const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-1, 0],
  [1, 0],
  [0, -1],
  [0, 1],
  [-1, -1],
  [-1, 1],
  [1, 1],
  [1, -1],
];
