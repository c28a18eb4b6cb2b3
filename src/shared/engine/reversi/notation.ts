import { BoardConstraintViolation, EngineErrorCode } from '../errors';
import { DEFAULT_BOARD_SIZE, PASS_MOVE, isPassMove, type ReversiMove } from './types';

/**
 * Compact move notation for logs and traces: a file letter for x and a
 * 1-based rank for y, so (0,0) -> a1 and (2,3) -> c4. The pass move is
 * written "pass".
 */
export function formatReversiMove(move: ReversiMove): string {
  if (isPassMove(move)) {
    return 'pass';
  }
  const file = String.fromCharCode('a'.charCodeAt(0) + move.x);
  return `${file}${move.y + 1}`;
}

const MOVE_PATTERN = /^([a-z])(\d{1,2})$/;

/**
 * Parse notation produced by formatReversiMove. Case and surrounding
 * whitespace are ignored.
 */
export function parseReversiMove(text: string, size: number = DEFAULT_BOARD_SIZE): ReversiMove {
  const normalized = text.trim().toLowerCase();
  if (normalized === 'pass') {
    return PASS_MOVE;
  }

  const match = MOVE_PATTERN.exec(normalized);
  if (!match) {
    throw new BoardConstraintViolation(
      EngineErrorCode.MOVE_UNPARSEABLE,
      `Cannot parse move "${text}"`,
      { text }
    );
  }

  const x = match[1].charCodeAt(0) - 'a'.charCodeAt(0);
  const y = Number.parseInt(match[2], 10) - 1;
  if (x >= size || y < 0 || y >= size) {
    throw new BoardConstraintViolation(
      EngineErrorCode.BOARD_INVALID_POSITION,
      `Move "${text}" is off a ${size}x${size} board`,
      { text, x, y, size }
    );
  }

  return { x, y };
}
