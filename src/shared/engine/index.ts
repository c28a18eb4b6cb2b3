// =============================================================================
// GAME-TREE SEARCH ENGINE - PUBLIC API
// =============================================================================
// Hosts (the Node entry point, tests, embedding applications) should only
// import from this file.
//
// Everything exported here is pure: no I/O, no environment access.
// =============================================================================

// =============================================================================
// POSITION CAPABILITY
// =============================================================================

export type {
  GamePosition,
  PositionCapability,
  PositionTransition,
} from '../types/position';
export { POSITION_CAPABILITIES, copyAndApply } from '../types/position';
export {
  PositionCapabilitySchema,
  assertPositionCapability,
  findMissingCapabilities,
} from './capability';

// =============================================================================
// HISTORY & SEARCH
// =============================================================================

export { GameHistory } from './GameHistory';
export {
  AlphaBetaEngine,
  DEFAULT_PLY,
  SEARCH_ALPHA,
  SEARCH_BETA,
  MAX_EVALUATION,
} from './AlphaBetaEngine';
export type { AlphaBetaEngineOptions } from './AlphaBetaEngine';
export { composeObservers } from './searchObserver';
export type {
  SearchObserver,
  SearchResult,
  SearchFound,
  SearchNoMove,
  SearchStats,
  NoMoveReason,
  SearchStartEvent,
  RootMoveScoredEvent,
  CutoffEvent,
} from './searchObserver';

// =============================================================================
// ERRORS
// =============================================================================

export {
  EngineErrorCode,
  ERROR_CATEGORY_DESCRIPTIONS,
  EngineError,
  InvalidMoveError,
  NoHistoryError,
  NoLegalMovesError,
  MissingCapabilityError,
  BoardConstraintViolation,
  isEngineError,
  isFatalEngineError,
} from './errors';
export type { EngineErrorJSON } from './errors';

// =============================================================================
// REVERSI
// =============================================================================

export * from './reversi';
