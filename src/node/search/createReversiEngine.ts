import { AlphaBetaEngine } from '../../shared/engine/AlphaBetaEngine';
import { composeObservers, type SearchObserver } from '../../shared/engine/searchObserver';
import { ReversiPosition } from '../../shared/engine/reversi/ReversiPosition';
import { formatReversiMove } from '../../shared/engine/reversi/notation';
import type { ReversiMove, ReversiScoring } from '../../shared/engine/reversi/types';
import { config as appConfig, type AppConfig } from '../config';
import { logger as defaultLogger } from '../utils/logger';
import { createLoggingSearchObserver, type SearchLogSink } from './loggingObserver';

export type ReversiEngine = AlphaBetaEngine<ReversiMove, ReversiPosition>;

export interface CreateReversiEngineOptions {
  /** Default search depth; falls back to SEARCH_DEFAULT_PLY */
  ply?: number;
  /** Board size for a fresh game; falls back to REVERSI_BOARD_SIZE */
  boardSize?: number;
  /** Evaluation mode; falls back to REVERSI_SCORING */
  scoring?: ReversiScoring;
  /** Start from this position instead of the standard opening */
  initialPosition?: ReversiPosition;
  /** Attach the logging observer; falls back to SEARCH_TRACE */
  trace?: boolean;
  /** Additional observer, invoked alongside the logging one */
  observer?: SearchObserver<ReversiMove>;
  logger?: SearchLogSink;
  config?: Pick<AppConfig, 'search' | 'reversi'>;
}

/**
 * Build an alpha-beta engine playing Reversi, with defaults taken from
 * the application config.
 */
export function createReversiEngine(options: CreateReversiEngineOptions = {}): ReversiEngine {
  const settings = options.config ?? appConfig;
  const position =
    options.initialPosition ??
    new ReversiPosition({
      size: options.boardSize ?? settings.reversi.boardSize,
      scoring: options.scoring ?? settings.reversi.scoring,
    });

  const trace = options.trace ?? settings.search.trace;
  const loggingObserver = trace
    ? createLoggingSearchObserver<ReversiMove>({
        logger: options.logger ?? defaultLogger,
        formatMove: formatReversiMove,
        meta: { game: 'reversi', boardSize: position.size },
      })
    : undefined;

  const observer =
    loggingObserver && options.observer
      ? composeObservers(loggingObserver, options.observer)
      : loggingObserver ?? options.observer;

  return new AlphaBetaEngine<ReversiMove, ReversiPosition>(position, {
    ply: options.ply ?? settings.search.defaultPly,
    observer,
  });
}
