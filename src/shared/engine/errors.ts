/**
 * Engine Domain Errors - Structured error types for search and history
 *
 * Error Categories:
 * - **InvalidMoveError**: A transition rejected a move
 * - **NoHistoryError**: Undo requested with an empty move log
 * - **NoLegalMovesError**: A search performed no move
 * - **MissingCapabilityError**: A position lacks a required operation
 * - **BoardConstraintViolation**: Board size or coordinate issues
 *
 * Fatal errors signal a broken contract between a game and the engine
 * (a move produced by `legalMoves()` that `apply()` rejects, a position
 * missing operations). Recoverable errors report that nothing happened.
 *
 * Usage:
 * ```typescript
 * import { NoHistoryError, isEngineError } from './errors';
 *
 * try {
 *   engine.undo();
 * } catch (err) {
 *   if (err instanceof NoHistoryError) {
 *     // nothing to undo
 *   }
 * }
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - MOVE_*: Move application and parsing
 * - HISTORY_*: Move log bookkeeping
 * - SEARCH_*: Search outcomes
 * - CAPABILITY_*: Position contract checks
 * - BOARD_*: Board geometry
 */
export enum EngineErrorCode {
  /** Transition rejected the move */
  MOVE_INVALID = 'MOVE_INVALID',
  /** Move text could not be parsed */
  MOVE_UNPARSEABLE = 'MOVE_UNPARSEABLE',

  /** Undo with no applied moves */
  HISTORY_EMPTY = 'HISTORY_EMPTY',

  /** Search found no move to perform */
  SEARCH_NO_LEGAL_MOVES = 'SEARCH_NO_LEGAL_MOVES',

  /** Position lacks one or more required operations */
  CAPABILITY_MISSING = 'CAPABILITY_MISSING',

  /** Board size is not supported */
  BOARD_INVALID_SIZE = 'BOARD_INVALID_SIZE',
  /** Coordinate lies outside the board */
  BOARD_INVALID_POSITION = 'BOARD_INVALID_POSITION',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  MOVE_: 'Move rejected or malformed',
  HISTORY_: 'Move history bookkeeping',
  SEARCH_: 'Search produced no move',
  CAPABILITY_: 'Position does not implement the required operations',
  BOARD_: 'Board geometry constraint violation',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Component that raised the error (e.g. 'GameHistory', 'AlphaBeta') */
  readonly domain: string;

  /** Whether the error is a broken contract rather than a "nothing happened" report */
  readonly isFatal: boolean;

  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine',
    isFatal: boolean = false
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.isFatal = isFatal;
    this.timestamp = new Date();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      isFatal: this.isFatal,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  isFatal: boolean;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * A transition rejected a move.
 *
 * Raised by history for a caller-supplied move (recoverable), and by the
 * search when `apply()` rejects a move the same position listed in
 * `legalMoves()` (fatal).
 */
export class InvalidMoveError extends EngineError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'GameHistory',
    isFatal: boolean = false
  ) {
    super(EngineErrorCode.MOVE_INVALID, message, context, domain, isFatal);
    this.name = 'InvalidMoveError';
    Object.setPrototypeOf(this, InvalidMoveError.prototype);
  }
}

/**
 * Undo was requested with no applied moves.
 */
export class NoHistoryError extends EngineError {
  constructor(message: string = 'No moves to undo', context: Record<string, unknown> = {}) {
    super(EngineErrorCode.HISTORY_EMPTY, message, context, 'GameHistory');
    this.name = 'NoHistoryError';
    Object.setPrototypeOf(this, NoHistoryError.prototype);
  }
}

/**
 * A root search performed no move.
 */
export class NoLegalMovesError extends EngineError {
  constructor(message: string = 'No move available', context: Record<string, unknown> = {}) {
    super(EngineErrorCode.SEARCH_NO_LEGAL_MOVES, message, context, 'AlphaBeta');
    this.name = 'NoLegalMovesError';
    Object.setPrototypeOf(this, NoLegalMovesError.prototype);
  }
}

/**
 * A supplied position lacks operations the engine requires.
 */
export class MissingCapabilityError extends EngineError {
  /** Names of the missing operations */
  readonly missing: readonly string[];

  constructor(missing: readonly string[], context: Record<string, unknown> = {}) {
    super(
      EngineErrorCode.CAPABILITY_MISSING,
      `Position is missing required operation(s): ${missing.join(', ')}`,
      { ...context, missing },
      'Capability',
      true
    );
    this.name = 'MissingCapabilityError';
    this.missing = missing;
    Object.setPrototypeOf(this, MissingCapabilityError.prototype);
  }
}

/**
 * Board geometry violation: unsupported size, off-board coordinate or
 * unreadable move text.
 */
export class BoardConstraintViolation extends EngineError {
  constructor(code: EngineErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(code, message, context, 'Board');
    this.name = 'BoardConstraintViolation';
    Object.setPrototypeOf(this, BoardConstraintViolation.prototype);
  }
}

// =============================================================================
// UTILITIES
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isFatalEngineError(error: unknown): boolean {
  return isEngineError(error) && error.isFatal;
}
