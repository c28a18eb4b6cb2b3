import {
  copyAndApply,
  type GamePosition,
  type PositionTransition,
} from '../types/position';
import { InvalidMoveError, NoHistoryError } from './errors';

interface HistoryEntry<TMove, TPosition> {
  readonly move: TMove;
  readonly position: TPosition;
}

/**
 * Sequential position history with undo.
 *
 * Conceptually two parallel sequences, positions and moves, with
 * `positions.length === moves.length + 1`. They are stored as the
 * starting position plus one entry per applied move, so a move and the
 * position it produced are always pushed and popped together.
 *
 * Positions handed out by this class are owned by the history and must
 * be treated as read-only by callers.
 */
export class GameHistory<TMove, TPosition extends GamePosition<TMove, TPosition>> {
  private initial: TPosition;
  private entries: HistoryEntry<TMove, TPosition>[] = [];
  private readonly transition: PositionTransition<TMove, TPosition>;

  constructor(
    initialPosition: TPosition,
    transition: PositionTransition<TMove, TPosition> = copyAndApply
  ) {
    this.initial = initialPosition;
    this.transition = transition;
  }

  /** Number of moves applied since the starting position. */
  get moveCount(): number {
    return this.entries.length;
  }

  currentPosition(): TPosition {
    const last = this.entries[this.entries.length - 1];
    return last ? last.position : this.initial;
  }

  lastMove(): TMove | null {
    const last = this.entries[this.entries.length - 1];
    return last ? last.move : null;
  }

  canUndo(): boolean {
    return this.entries.length > 0;
  }

  /**
   * Apply `move` to the current position through the transition function
   * and record it. Throws InvalidMoveError, leaving the history as it
   * was, when the transition rejects the move.
   */
  applyMove(move: TMove): TPosition {
    const next = this.transition(this.currentPosition(), move);
    if (next === null) {
      throw new InvalidMoveError('Transition rejected move', {
        move,
        moveCount: this.entries.length,
      });
    }

    this.entries.push({ move, position: next });
    return next;
  }

  /**
   * Drop the last move and the position it produced. Returns the new
   * current position.
   */
  undo(): TPosition {
    if (this.entries.pop() === undefined) {
      throw new NoHistoryError();
    }
    return this.currentPosition();
  }

  /**
   * Start over from `position`, discarding every recorded move.
   */
  reset(position: TPosition): TPosition {
    this.initial = position;
    this.entries = [];
    return position;
  }

  /** All positions, oldest first; the last one is current. */
  positions(): readonly TPosition[] {
    return [this.initial, ...this.entries.map((entry) => entry.position)];
  }

  /** All applied moves, oldest first. */
  moves(): readonly TMove[] {
    return this.entries.map((entry) => entry.move);
  }
}
