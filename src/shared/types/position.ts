/**
 * Position capability consumed by the search engine and history.
 *
 * A game plugs into the engine by implementing this interface on its
 * position type. The engine is generic over the position and never
 * looks at a concrete game.
 *
 * Contract:
 * - `copy()` returns an independent deep copy.
 * - `apply(move)` mutates the receiver and returns it, or returns `null`
 *   when the move cannot be applied (the receiver is then unchanged).
 * - `evaluate()` returns an integer in [-MAX_EVALUATION, MAX_EVALUATION],
 *   scored for the player to move.
 * - `legalMoves()` never returns an empty list: a game with a pass move
 *   returns its pass sentinel when nothing else is legal.
 */
export interface GamePosition<TMove, TSelf extends GamePosition<TMove, TSelf>> {
  copy(): TSelf;
  apply(move: TMove): TSelf | null;
  isTerminal(): boolean;
  evaluate(): number;
  legalMoves(): readonly TMove[];
}

/**
 * Names of the operations every position must provide.
 */
export const POSITION_CAPABILITIES = [
  'copy',
  'apply',
  'isTerminal',
  'evaluate',
  'legalMoves',
] as const;

export type PositionCapability = (typeof POSITION_CAPABILITIES)[number];

/**
 * Transition function producing the position after `move`. Returns
 * `null` when the move is rejected. Must not mutate `position`.
 */
export type PositionTransition<TMove, TPosition> = (
  position: TPosition,
  move: TMove
) => TPosition | null;

/**
 * Default transition: copy the position and apply the move to the copy.
 */
export function copyAndApply<TMove, TPosition extends GamePosition<TMove, TPosition>>(
  position: TPosition,
  move: TMove
): TPosition | null {
  return position.copy().apply(move);
}
