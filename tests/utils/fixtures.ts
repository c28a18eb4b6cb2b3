/**
 * Test Fixtures and Utilities
 * Synthetic games, a reference minimax and Reversi board helpers.
 */

import type { GamePosition } from '../../src/shared/types/position';
import { ReversiPosition } from '../../src/shared/engine/reversi/ReversiPosition';
import type { ReversiCell, ReversiPlayer } from '../../src/shared/engine/reversi/types';

// ═══════════════════════════════════════════════════════════════════════════
// Integer game
// ═══════════════════════════════════════════════════════════════════════════

export type IntegerMove = number | 'pass';

/**
 * Synthetic game: a signed integer plus the side to move. Moves add 0,
 * +1 or -1 to the value, or pass. The value is stored from player 1's
 * point of view; the game ends once |value| exceeds 30.
 */
export class IntegerGamePosition implements GamePosition<IntegerMove, IntegerGamePosition> {
  constructor(
    public value: number,
    public mover: 1 | -1 = 1
  ) {}

  copy(): IntegerGamePosition {
    return new IntegerGamePosition(this.value, this.mover);
  }

  apply(move: IntegerMove): IntegerGamePosition | null {
    if (move !== 'pass') {
      if (move !== 0 && move !== 1 && move !== -1) {
        return null;
      }
      this.value += move;
    }
    this.mover = this.mover === 1 ? -1 : 1;
    return this;
  }

  isTerminal(): boolean {
    return Math.abs(this.value) > 30;
  }

  evaluate(): number {
    return this.mover === 1 ? this.value : -this.value;
  }

  legalMoves(): readonly IntegerMove[] {
    return [0, 1, -1, 'pass'];
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Explicit game trees
// ═══════════════════════════════════════════════════════════════════════════

export interface GameTreeNode {
  /** Static score for the player to move at this node */
  score: number;
  children: GameTreeNode[];
}

/**
 * Tree node helper - node(3) is a leaf, node(0, node(1), node(2)) an
 * interior node.
 */
export function node(score: number, ...children: GameTreeNode[]): GameTreeNode {
  return { score, children };
}

/**
 * Position walking an explicit game tree. Moves are child indices; a
 * node without children is terminal.
 */
export class TreeGamePosition implements GamePosition<number, TreeGamePosition> {
  constructor(public current: GameTreeNode) {}

  copy(): TreeGamePosition {
    return new TreeGamePosition(this.current);
  }

  apply(move: number): TreeGamePosition | null {
    const child = this.current.children[move];
    if (!child) {
      return null;
    }
    this.current = child;
    return this;
  }

  isTerminal(): boolean {
    return this.current.children.length === 0;
  }

  evaluate(): number {
    return this.current.score;
  }

  legalMoves(): readonly number[] {
    return this.current.children.map((_, index) => index);
  }
}

/**
 * Deterministically grow an irregular tree from a list of scores. Branch
 * counts and early leaves are derived from the scores so different
 * inputs give differently shaped trees.
 */
export function buildTree(scores: readonly number[], height: number, maxBranching: number): GameTreeNode {
  let cursor = 0;
  const nextScore = (): number => {
    const score = scores[cursor % scores.length];
    cursor++;
    return score;
  };

  const grow = (level: number): GameTreeNode => {
    const score = nextScore();
    const isRoot = level === 0;
    if (level >= height || (!isRoot && Math.abs(score) % 5 === 0)) {
      return node(score);
    }
    const branching = 1 + (Math.abs(score) % maxBranching);
    const children: GameTreeNode[] = [];
    for (let i = 0; i < branching; i++) {
      children.push(grow(level + 1));
    }
    return node(score, ...children);
  };

  return grow(0);
}

// ═══════════════════════════════════════════════════════════════════════════
// Reference minimax (no pruning)
// ═══════════════════════════════════════════════════════════════════════════

export interface MinimaxReference {
  score: number;
  nodes: number;
}

function childOf<TMove, TPosition extends GamePosition<TMove, TPosition>>(
  position: TPosition,
  move: TMove
): TPosition {
  const child = position.copy().apply(move);
  if (child === null) {
    throw new Error('reference minimax: move rejected');
  }
  return child;
}

/**
 * Full-width negamax root score, using the same conventions as the
 * engine: the root is never treated as terminal, children are searched
 * to `depth - 1`, terminal takes priority over the depth check.
 */
export function fullWidthRootScore<TMove, TPosition extends GamePosition<TMove, TPosition>>(
  root: TPosition,
  depth: number
): MinimaxReference {
  let nodes = 0;

  const negamax = (position: TPosition, remaining: number): number => {
    nodes++;
    if (position.isTerminal() || remaining <= 0) {
      return position.evaluate();
    }
    const moves = position.legalMoves();
    if (moves.length === 0) {
      return position.evaluate();
    }
    let best = -Infinity;
    for (const move of moves) {
      best = Math.max(best, -negamax(childOf(position, move), remaining - 1));
    }
    return best;
  };

  let best = -Infinity;
  for (const move of root.legalMoves()) {
    best = Math.max(best, -negamax(childOf(root, move), depth - 1));
  }

  // Collapse -0 to 0
  return { score: best || 0, nodes };
}

// ═══════════════════════════════════════════════════════════════════════════
// Reversi helpers
// ═══════════════════════════════════════════════════════════════════════════

const CELL_CHARS: Partial<Record<string, ReversiCell>> = { '.': 0, o: 1, x: 2 };

/**
 * Build a Reversi position from text rows. rows[y][x] is the square at
 * column x, row y: '.' empty, 'o' player 1, 'x' player 2.
 */
export function reversiFromRows(rows: string[], player: ReversiPlayer = 1): ReversiPosition {
  const size = rows.length;
  const board: ReversiCell[][] = [];
  for (let x = 0; x < size; x++) {
    const column: ReversiCell[] = [];
    for (let y = 0; y < size; y++) {
      const cell = CELL_CHARS[rows[y].charAt(x)];
      if (cell === undefined) {
        throw new Error(`unknown cell '${rows[y].charAt(x)}' at ${x},${y}`);
      }
      column.push(cell);
    }
    board.push(column);
  }
  return ReversiPosition.fromSnapshot({ board, player });
}

export function totalDiscs(position: ReversiPosition): number {
  return position.discCount(1) + position.discCount(2);
}
