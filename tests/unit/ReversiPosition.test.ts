import { AlphaBetaEngine } from '../../src/shared/engine/AlphaBetaEngine';
import {
  BoardConstraintViolation,
  EngineErrorCode,
  InvalidMoveError,
} from '../../src/shared/engine/errors';
import { ReversiPosition } from '../../src/shared/engine/reversi/ReversiPosition';
import {
  OUTCOME_SCORE,
  PASS_MOVE,
  type ReversiMove,
  type ReversiSnapshot,
} from '../../src/shared/engine/reversi/types';
import { reversiFromRows, totalDiscs } from '../utils/fixtures';

const OPENING_MOVES = [
  { x: 2, y: 4 },
  { x: 3, y: 5 },
  { x: 4, y: 2 },
  { x: 5, y: 3 },
];

describe('ReversiPosition', () => {
  describe('standard opening', () => {
    it('places two discs per player in the centre', () => {
      const position = new ReversiPosition();

      expect(position.size).toBe(8);
      expect(position.currentPlayer).toBe(1);
      expect(position.cellAt(3, 3)).toBe(1);
      expect(position.cellAt(4, 4)).toBe(1);
      expect(position.cellAt(3, 4)).toBe(2);
      expect(position.cellAt(4, 3)).toBe(2);
      expect(totalDiscs(position)).toBe(4);
    });

    it('has exactly four legal moves, in column-major order', () => {
      expect(new ReversiPosition().legalMoves()).toEqual(OPENING_MOVES);
    });

    it.each(OPENING_MOVES)('playing %o flips exactly one disc', (move) => {
      const position = new ReversiPosition();

      expect(position.apply(move)).toBe(position);

      expect(totalDiscs(position)).toBe(5);
      expect(position.discCount(1)).toBe(4);
      expect(position.discCount(2)).toBe(1);
      expect(position.cellAt(move.x, move.y)).toBe(1);
      expect(position.currentPlayer).toBe(2);
    });

    it('scales the opening to smaller boards', () => {
      const position = new ReversiPosition({ size: 4 });

      expect(position.legalMoves()).toEqual([
        { x: 0, y: 2 },
        { x: 1, y: 3 },
        { x: 2, y: 0 },
        { x: 3, y: 1 },
      ]);
    });

    it('evaluates to zero mobility difference', () => {
      const position = new ReversiPosition();

      expect(position.mobility(1)).toBe(4);
      expect(position.mobility(2)).toBe(4);
      expect(position.evaluate()).toBe(0);
    });
  });

  describe('board size', () => {
    it.each([3, 5, 2, 28, 8.5])('rejects size %p', (size) => {
      expect(() => new ReversiPosition({ size })).toThrow(BoardConstraintViolation);
    });

    it('rejects a non-square snapshot', () => {
      const board = new ReversiPosition({ size: 4 }).toSnapshot().board;
      board[1] = [0, 0, 0];

      expect(() => ReversiPosition.fromSnapshot({ board, player: 1 })).toThrow(
        'Board must be square'
      );
    });

    it('rejects a snapshot whose player to move is not 1 or 2', () => {
      const stored = JSON.stringify({ ...new ReversiPosition({ size: 4 }).toSnapshot(), player: 3 });
      const snapshot: ReversiSnapshot = JSON.parse(stored);

      try {
        ReversiPosition.fromSnapshot(snapshot);
        throw new Error('expected fromSnapshot to fail');
      } catch (err) {
        expect(err).toBeInstanceOf(BoardConstraintViolation);
        if (err instanceof BoardConstraintViolation) {
          expect(err.code).toBe(EngineErrorCode.BOARD_INVALID_POSITION);
          expect(err.context).toEqual({ player: 3 });
        }
      }
    });

    it('treats fractional coordinates as off the board', () => {
      const position = new ReversiPosition();

      expect(position.isOnBoard(2.5, 4)).toBe(false);
      expect(() => position.cellAt(1.5, 0)).toThrow(BoardConstraintViolation);
    });

    it('rejects reading a square off the board', () => {
      try {
        new ReversiPosition().cellAt(8, 0);
        throw new Error('expected cellAt to fail');
      } catch (err) {
        expect(err).toBeInstanceOf(BoardConstraintViolation);
        if (err instanceof BoardConstraintViolation) {
          expect(err.code).toBe(EngineErrorCode.BOARD_INVALID_POSITION);
          expect(err.context).toEqual({ x: 8, y: 0, size: 8 });
        }
      }
    });
  });

  describe('apply', () => {
    it('flips runs in every qualifying direction at once', () => {
      const position = reversiFromRows(['..o.', '..x.', 'ox..', '....'], 1);

      expect(position.isLegalPlacement(2, 2)).toBe(true);
      position.apply({ x: 2, y: 2 });

      expect(position.cellAt(1, 2)).toBe(1);
      expect(position.cellAt(2, 1)).toBe(1);
      expect(position.cellAt(2, 2)).toBe(1);
      expect(position.discCount(1)).toBe(5);
      expect(position.discCount(2)).toBe(0);
      expect(position.currentPlayer).toBe(2);
    });

    it('flips a run of several discs up to the closing disc', () => {
      const position = reversiFromRows(['.xxo', '....', '....', '....'], 1);

      position.apply({ x: 0, y: 0 });

      expect(position.toSnapshot().board.map((column) => column[0])).toEqual([1, 1, 1, 1]);
      expect(position.discCount(2)).toBe(0);
    });

    it('returns null for an occupied or off-board square and changes nothing', () => {
      const position = new ReversiPosition();
      const before = position.toSnapshot();

      expect(position.apply({ x: 3, y: 3 })).toBeNull();
      expect(position.apply({ x: 8, y: 2 })).toBeNull();
      expect(position.apply({ x: -2, y: 0 })).toBeNull();
      expect(position.apply({ x: 2.5, y: 4 })).toBeNull();
      expect(position.toSnapshot()).toEqual(before);
    });

    it('returns null for an empty square that outflanks nothing', () => {
      const position = new ReversiPosition();
      const before = position.toSnapshot();

      expect(position.isLegalPlacement(0, 0)).toBe(false);
      expect(position.apply({ x: 0, y: 0 })).toBeNull();
      expect(position.toSnapshot()).toEqual(before);
    });

    it('does not affect copies', () => {
      const original = new ReversiPosition();
      const copy = original.copy();

      copy.apply({ x: 2, y: 4 });

      expect(totalDiscs(original)).toBe(4);
      expect(original.currentPlayer).toBe(1);
      expect(totalDiscs(copy)).toBe(5);
    });

    it('copies the board, the player to move and the scoring mode', () => {
      const original = ReversiPosition.fromSnapshot(
        reversiFromRows(['oxx.', '....', '....', '....'], 2).toSnapshot(),
        { scoring: 'mobility_outcome' }
      );
      const copy = original.copy();

      expect(copy).not.toBe(original);
      expect(copy.toSnapshot()).toEqual(original.toSnapshot());
      expect(copy.currentPlayer).toBe(2);
      expect(copy.scoring).toBe('mobility_outcome');

      copy.apply(PASS_MOVE);
      copy.apply({ x: 3, y: 0 });

      expect(original.currentPlayer).toBe(2);
      expect(original.cellAt(3, 0)).toBe(0);
      expect(copy.discCount(1)).toBe(4);
    });
  });

  describe('pass', () => {
    const rows = ['oxx.', '....', '....', '....'];

    it('is the only legal move when no placement exists', () => {
      const position = reversiFromRows(rows, 2);

      expect(position.mobility()).toBe(0);
      expect(position.legalMoves()).toEqual([PASS_MOVE]);
      expect(position.isTerminal()).toBe(false);
    });

    it('only switches the player to move', () => {
      const position = reversiFromRows(rows, 2);
      const boardBefore = position.toSnapshot().board;

      expect(position.apply(PASS_MOVE)).toBe(position);

      expect(position.currentPlayer).toBe(1);
      expect(position.toSnapshot().board).toEqual(boardBefore);
      expect(position.legalMoves()).toEqual([{ x: 3, y: 0 }]);
    });

    it('scores mobility from the mover’s side', () => {
      expect(reversiFromRows(rows, 2).evaluate()).toBe(-1);
      expect(reversiFromRows(rows, 1).evaluate()).toBe(1);
    });
  });

  describe('evaluate', () => {
    it('leaves the player to move unchanged', () => {
      const position = reversiFromRows(['oxx.', '....', '....', '....'], 2);

      position.evaluate();

      expect(position.currentPlayer).toBe(2);
    });
  });

  describe('end of game', () => {
    const rows = ['oo..', '....', '....', '....'];

    it('is terminal when neither player can place a disc', () => {
      const position = reversiFromRows(rows, 2);

      expect(position.isTerminal()).toBe(true);
      expect(position.outcome()).toEqual({ winner: 1, discs: { 1: 2, 2: 0 } });
    });

    it('reports no outcome while the game is running', () => {
      expect(new ReversiPosition().outcome()).toBeNull();
    });

    it('reports a draw with a null winner', () => {
      const position = reversiFromRows(['o..x', '....', '....', 'x..o'], 1);

      expect(position.isTerminal()).toBe(true);
      expect(position.outcome()).toEqual({ winner: null, discs: { 1: 2, 2: 2 } });
    });

    it('scores a finished game as zero mobility by default', () => {
      expect(reversiFromRows(rows, 2).evaluate()).toBe(0);
    });

    it('scores wins and losses with mobility_outcome scoring', () => {
      const snapshot = reversiFromRows(rows, 2).toSnapshot();

      const loser = ReversiPosition.fromSnapshot(snapshot, { scoring: 'mobility_outcome' });
      const winner = ReversiPosition.fromSnapshot({ ...snapshot, player: 1 }, { scoring: 'mobility_outcome' });

      expect(loser.evaluate()).toBe(-OUTCOME_SCORE - 2);
      expect(winner.evaluate()).toBe(OUTCOME_SCORE + 2);
    });
  });

  describe('played by the engine', () => {
    it('rejects an off-board move through the history', () => {
      const engine = new AlphaBetaEngine<ReversiMove, ReversiPosition>(new ReversiPosition());

      expect(() => engine.applyMove({ x: 2.5, y: 4 })).toThrow(InvalidMoveError);
      expect(engine.moveCount).toBe(0);
    });

    it('finishes a 4x4 game and undoes back to the start', () => {
      const initial = new ReversiPosition({ size: 4 });
      const engine = new AlphaBetaEngine<ReversiMove, ReversiPosition>(initial, { ply: 2 });

      let turns = 0;
      while (!engine.currentPosition().isTerminal()) {
        expect(engine.search()).not.toBeNull();
        turns++;
        expect(turns).toBeLessThan(40);
      }

      const final = engine.currentPosition();
      const outcome = final.outcome();
      expect(outcome).not.toBeNull();
      expect(totalDiscs(final)).toBeLessThanOrEqual(16);
      expect(engine.moveCount).toBe(turns);
      expect(totalDiscs(initial)).toBe(4);

      while (engine.canUndo()) {
        engine.undo();
      }
      expect(engine.currentPosition()).toBe(initial);
      expect(engine.lastMove()).toBeNull();
    });
  });
});
