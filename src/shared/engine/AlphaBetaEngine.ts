import { copyAndApply, type GamePosition, type PositionTransition } from '../types/position';
import { assertPositionCapability } from './capability';
import { InvalidMoveError, NoLegalMovesError } from './errors';
import { GameHistory } from './GameHistory';
import type {
  SearchObserver,
  SearchResult,
  SearchStats,
} from './searchObserver';

/** Default search depth in plies. */
export const DEFAULT_PLY = 2;

/** Lower bound of the root search window. */
export const SEARCH_ALPHA = -100_000;

/** Upper bound of the root search window. */
export const SEARCH_BETA = 100_000;

/**
 * Largest magnitude `evaluate()` may return. The search window is one
 * unit wider on each side; a root move scoring at or below SEARCH_ALPHA
 * can never be selected.
 */
export const MAX_EVALUATION = 99_999;

export interface AlphaBetaEngineOptions<TMove, TPosition> {
  /** Default search depth (defaults to DEFAULT_PLY) */
  ply?: number;
  observer?: SearchObserver<TMove>;
  /** Transition used to expand the search tree and to commit moves (defaults to copy + apply) */
  transition?: PositionTransition<TMove, TPosition>;
}

// Keeps a zero score from turning into -0 after negation.
function negate(score: number): number {
  return score === 0 ? 0 : -score;
}

/**
 * Negamax search with alpha-beta pruning over any game implementing
 * GamePosition, with the played line kept in a GameHistory.
 *
 * `search()` picks the best move for the player to move in the current
 * position and commits it. Among root moves with equal scores the first
 * one enumerated by `legalMoves()` wins.
 *
 * Every explored branch works on its own copy of the position. There is
 * no depth ceiling and no cancellation: the cost of a search is bounded
 * only by the ply the caller asks for.
 */
export class AlphaBetaEngine<TMove, TPosition extends GamePosition<TMove, TPosition>> {
  private readonly history: GameHistory<TMove, TPosition>;
  private readonly transition: PositionTransition<TMove, TPosition>;
  private defaultPly: number;
  private observer: SearchObserver<TMove> | undefined;
  private stats: SearchStats = { nodesVisited: 0, terminalHits: 0 };

  constructor(
    initialPosition: TPosition,
    options: AlphaBetaEngineOptions<TMove, TPosition> = {}
  ) {
    assertPositionCapability(initialPosition);

    this.transition = options.transition ?? copyAndApply;
    this.history = new GameHistory(initialPosition, this.transition);
    this.defaultPly = options.ply ?? DEFAULT_PLY;
    this.observer = options.observer;
  }

  /**
   * Return the default search depth and, when `newValue` is given,
   * replace it.
   */
  ply(newValue?: number): number {
    const previous = this.defaultPly;
    if (newValue !== undefined) {
      this.defaultPly = newValue;
    }
    return previous;
  }

  /**
   * Replace the search observer. Returns the previous one.
   */
  setObserver(observer?: SearchObserver<TMove>): SearchObserver<TMove> | undefined {
    const previous = this.observer;
    this.observer = observer;
    return previous;
  }

  get moveCount(): number {
    return this.history.moveCount;
  }

  currentPosition(): TPosition {
    return this.history.currentPosition();
  }

  lastMove(): TMove | null {
    return this.history.lastMove();
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  /** Play a move chosen outside the engine (e.g. by a human player). */
  applyMove(move: TMove): TPosition {
    return this.history.applyMove(move);
  }

  undo(): TPosition {
    return this.history.undo();
  }

  /** Counters of the most recent search. */
  getSearchStats(): Readonly<SearchStats> {
    return { ...this.stats };
  }

  /**
   * Search the current position to `explicitPly` (or the default ply)
   * without playing the result.
   */
  analyze(explicitPly?: number): SearchResult<TMove> {
    const ply = explicitPly ?? this.defaultPly;
    const root = this.history.currentPosition();

    this.stats = { nodesVisited: 0, terminalHits: 0 };
    const moves = root.legalMoves();

    this.observer?.onSearchStart?.({
      ply,
      explicitPly: explicitPly !== undefined,
      defaultPly: this.defaultPly,
      rootMoveCount: moves.length,
    });

    let alpha = SEARCH_ALPHA;
    const beta = SEARCH_BETA;
    let best: { move: TMove; index: number } | null = null;

    for (let index = 0; index < moves.length; index++) {
      const move = moves[index];
      const child = this.expand(root, move, ply);
      const score = negate(this.negamax(child, -beta, -alpha, ply - 1));
      const isNewBest = score > alpha;

      this.observer?.onRootMoveScored?.({
        move,
        index,
        score,
        bestScoreBefore: alpha,
        isNewBest,
      });

      if (isNewBest) {
        best = { move, index };
        alpha = score;
      }
    }

    const stats = this.getSearchStats();
    const result: SearchResult<TMove> = best
      ? { status: 'found', move: best.move, moveIndex: best.index, score: alpha, ply, stats }
      : {
          status: 'no_move',
          reason: moves.length === 0 ? 'no_legal_moves' : 'no_improvement',
          score: alpha,
          ply,
          stats,
        };

    this.observer?.onSearchComplete?.(result);
    return result;
  }

  /**
   * Search and play the best move. Returns the resulting position, or
   * `null` when no move was performed.
   */
  search(explicitPly?: number): TPosition | null {
    const result = this.analyze(explicitPly);
    if (result.status !== 'found') {
      return null;
    }
    return this.commit(result.move);
  }

  /**
   * Like `search()`, but reports "no move performed" as a
   * NoLegalMovesError.
   */
  searchOrThrow(explicitPly?: number): TPosition {
    const result = this.analyze(explicitPly);
    if (result.status !== 'found') {
      throw new NoLegalMovesError('No move available', {
        reason: result.reason,
        ply: result.ply,
      });
    }
    return this.commit(result.move);
  }

  /**
   * Record a move the search selected. The search already applied it to
   * a copy, so a rejection here is a broken contract, not a bad move.
   */
  private commit(move: TMove): TPosition {
    try {
      return this.history.applyMove(move);
    } catch (err) {
      if (err instanceof InvalidMoveError) {
        throw new InvalidMoveError(
          'Transition rejected the move selected by search',
          err.context,
          'AlphaBeta',
          true
        );
      }
      throw err;
    }
  }

  private negamax(position: TPosition, alpha: number, beta: number, depthRemaining: number): number {
    this.stats.nodesVisited++;

    if (position.isTerminal()) {
      this.stats.terminalHits++;
      return position.evaluate();
    }
    if (depthRemaining <= 0) {
      return position.evaluate();
    }

    const moves = position.legalMoves();
    if (moves.length === 0) {
      return position.evaluate();
    }

    for (const move of moves) {
      const child = this.expand(position, move, depthRemaining);
      const score = negate(this.negamax(child, -beta, -alpha, depthRemaining - 1));

      if (score > alpha) {
        alpha = score;
      }
      if (alpha >= beta) {
        this.observer?.onCutoff?.({ depthRemaining, alpha, beta });
        break;
      }
    }

    return alpha;
  }

  /**
   * Produce the child position through the engine's transition. A
   * rejection here means the game listed a move it cannot play, so the
   * search is aborted.
   */
  private expand(position: TPosition, move: TMove, depthRemaining: number): TPosition {
    const child = this.transition(position, move);
    if (child === null) {
      throw new InvalidMoveError(
        'Transition rejected a move returned by legalMoves()',
        { move, depthRemaining },
        'AlphaBeta',
        true
      );
    }
    return child;
  }
}
