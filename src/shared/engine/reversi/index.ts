export { ReversiPosition } from './ReversiPosition';
export { formatReversiMove, parseReversiMove } from './notation';
export {
  PASS_MOVE,
  isPassMove,
  opponentOf,
  DEFAULT_BOARD_SIZE,
  MIN_BOARD_SIZE,
  MAX_BOARD_SIZE,
  OUTCOME_SCORE,
  DIRECTIONS,
} from './types';
export type {
  ReversiPlayer,
  ReversiCell,
  ReversiMove,
  ReversiScoring,
  ReversiOptions,
  ReversiSnapshot,
  ReversiOutcome,
} from './types';
