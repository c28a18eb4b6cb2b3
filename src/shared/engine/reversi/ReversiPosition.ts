import type { GamePosition } from '../../types/position';
import { BoardConstraintViolation, EngineErrorCode } from '../errors';
import {
  DEFAULT_BOARD_SIZE,
  DIRECTIONS,
  MAX_BOARD_SIZE,
  MIN_BOARD_SIZE,
  OUTCOME_SCORE,
  PASS_MOVE,
  isPassMove,
  opponentOf,
  type ReversiCell,
  type ReversiMove,
  type ReversiOptions,
  type ReversiOutcome,
  type ReversiPlayer,
  type ReversiScoring,
  type ReversiSnapshot,
} from './types';

function assertBoardSize(size: number): void {
  if (!Number.isInteger(size) || size < MIN_BOARD_SIZE || size > MAX_BOARD_SIZE || size % 2 !== 0) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_SIZE,
      `Board size must be an even integer between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}`,
      { size }
    );
  }
}

function isCell(value: unknown): value is ReversiCell {
  return value === 0 || value === 1 || value === 2;
}

function isPlayer(value: unknown): value is ReversiPlayer {
  return value === 1 || value === 2;
}

function createStartingBoard(size: number): ReversiCell[][] {
  const board: ReversiCell[][] = Array.from({ length: size }, () =>
    Array.from({ length: size }, (): ReversiCell => 0)
  );
  const half = size / 2;
  board[half - 1][half - 1] = 1;
  board[half][half] = 1;
  board[half - 1][half] = 2;
  board[half][half - 1] = 2;
  return board;
}

/**
 * Reversi (Othello) position.
 *
 * A placement is legal when the square is empty and, in at least one of
 * the eight directions, a contiguous run of opponent discs ends in one of
 * the mover's discs. Playing it flips every such run. When the mover has
 * no placement the only legal move is PASS_MOVE. The game is over when
 * neither player has a placement.
 */
export class ReversiPosition implements GamePosition<ReversiMove, ReversiPosition> {
  private readonly board: ReversiCell[][];
  private player: ReversiPlayer;
  readonly size: number;
  readonly scoring: ReversiScoring;

  /**
   * Start a new game, or clone `source` when given a position.
   */
  constructor(source: ReversiOptions | ReversiPosition = {}) {
    if (source instanceof ReversiPosition) {
      this.size = source.size;
      this.scoring = source.scoring;
      this.board = source.board.map((column) => [...column]);
      this.player = source.player;
      return;
    }

    const options = source;
    const size = options.size ?? DEFAULT_BOARD_SIZE;
    assertBoardSize(size);

    this.size = size;
    this.scoring = options.scoring ?? 'mobility';
    this.board = createStartingBoard(size);
    this.player = 1;
  }

  /**
   * Build a position from plain data. The board must be square and its
   * size must satisfy the usual constraints.
   */
  static fromSnapshot(
    snapshot: ReversiSnapshot,
    options: Pick<ReversiOptions, 'scoring'> = {}
  ): ReversiPosition {
    const size = snapshot.board.length;
    assertBoardSize(size);

    snapshot.board.forEach((column, x) => {
      if (column.length !== size) {
        throw new BoardConstraintViolation(
          EngineErrorCode.BOARD_INVALID_SIZE,
          'Board must be square',
          { size, column: x, columnLength: column.length }
        );
      }
      column.forEach((cell, y) => {
        if (!isCell(cell)) {
          throw new BoardConstraintViolation(
            EngineErrorCode.BOARD_INVALID_POSITION,
            'Board cells must be 0, 1 or 2',
            { x, y, cell }
          );
        }
      });
    });

    if (!isPlayer(snapshot.player)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POSITION,
        'Player to move must be 1 or 2',
        { player: snapshot.player }
      );
    }

    const position = new ReversiPosition({ size, scoring: options.scoring });
    for (let x = 0; x < size; x++) {
      for (let y = 0; y < size; y++) {
        position.board[x][y] = snapshot.board[x][y];
      }
    }
    position.player = snapshot.player;
    return position;
  }

  get currentPlayer(): ReversiPlayer {
    return this.player;
  }

  toSnapshot(): ReversiSnapshot {
    return {
      board: this.board.map((column) => [...column]),
      player: this.player,
    };
  }

  isOnBoard(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.size &&
      y >= 0 &&
      y < this.size
    );
  }

  cellAt(x: number, y: number): ReversiCell {
    if (!this.isOnBoard(x, y)) {
      throw new BoardConstraintViolation(
        EngineErrorCode.BOARD_INVALID_POSITION,
        `Square (${x},${y}) is off the board`,
        { x, y, size: this.size }
      );
    }
    return this.board[x][y];
  }

  copy(): ReversiPosition {
    return new ReversiPosition(this);
  }

  /**
   * Length of the opponent run starting next to (x, y) in direction
   * (dx, dy) that is closed by one of `player`'s discs; 0 when the run is
   * empty or left open.
   */
  private outflankedRun(x: number, y: number, dx: number, dy: number, player: ReversiPlayer): number {
    const opponent = opponentOf(player);
    let tx = x + dx;
    let ty = y + dy;
    let run = 0;

    while (this.isOnBoard(tx, ty) && this.board[tx][ty] === opponent) {
      tx += dx;
      ty += dy;
      run++;
    }

    if (run > 0 && this.isOnBoard(tx, ty) && this.board[tx][ty] === player) {
      return run;
    }
    return 0;
  }

  isLegalPlacement(x: number, y: number, player: ReversiPlayer = this.player): boolean {
    if (!this.isOnBoard(x, y) || this.board[x][y] !== 0) {
      return false;
    }
    return DIRECTIONS.some(([dx, dy]) => this.outflankedRun(x, y, dx, dy, player) > 0);
  }

  private placements(player: ReversiPlayer): ReversiMove[] {
    const moves: ReversiMove[] = [];
    for (let x = 0; x < this.size; x++) {
      for (let y = 0; y < this.size; y++) {
        if (this.isLegalPlacement(x, y, player)) {
          moves.push({ x, y });
        }
      }
    }
    return moves;
  }

  legalMoves(): readonly ReversiMove[] {
    const moves = this.placements(this.player);
    return moves.length > 0 ? moves : [PASS_MOVE];
  }

  /**
   * Number of legal placements (pass excluded) for `player`, defaulting
   * to the player to move.
   */
  mobility(player: ReversiPlayer = this.player): number {
    return this.placements(player).length;
  }

  apply(move: ReversiMove): ReversiPosition | null {
    const me = this.player;

    if (isPassMove(move)) {
      this.player = opponentOf(me);
      return this;
    }

    const { x, y } = move;
    if (!this.isOnBoard(x, y) || this.board[x][y] !== 0) {
      return null;
    }

    const runs = DIRECTIONS.map(([dx, dy]) => ({
      dx,
      dy,
      length: this.outflankedRun(x, y, dx, dy, me),
    })).filter((run) => run.length > 0);

    if (runs.length === 0) {
      return null;
    }

    for (const { dx, dy, length } of runs) {
      for (let step = 1; step <= length; step++) {
        this.board[x + dx * step][y + dy * step] = me;
      }
    }
    this.board[x][y] = me;
    this.player = opponentOf(me);

    return this;
  }

  isTerminal(): boolean {
    return this.mobility(1) === 0 && this.mobility(2) === 0;
  }

  discCount(player: ReversiPlayer): number {
    let count = 0;
    for (const column of this.board) {
      for (const cell of column) {
        if (cell === player) count++;
      }
    }
    return count;
  }

  /** Final result, or null while either player can still place a disc. */
  outcome(): ReversiOutcome | null {
    if (!this.isTerminal()) {
      return null;
    }
    const discs = { 1: this.discCount(1), 2: this.discCount(2) };
    const winner: ReversiPlayer | null = discs[1] === discs[2] ? null : discs[1] > discs[2] ? 1 : 2;
    return { winner, discs };
  }

  evaluate(): number {
    if (this.scoring === 'mobility_outcome') {
      const outcome = this.outcome();
      if (outcome) {
        const margin = outcome.discs[this.player] - outcome.discs[opponentOf(this.player)];
        if (margin === 0) return 0;
        return margin > 0 ? OUTCOME_SCORE + margin : -OUTCOME_SCORE + margin;
      }
    }

    const player = this.player;
    const mine = this.mobility();
    this.player = opponentOf(player);
    try {
      return mine - this.mobility();
    } finally {
      this.player = player;
    }
  }
}
