import type { SearchObserver } from '../../shared/engine/searchObserver';
import type { LogMeta } from '../utils/logger';

/**
 * The subset of a winston logger the observer writes to.
 */
export interface SearchLogSink {
  debug(message: string, meta?: LogMeta): unknown;
  info(message: string, meta?: LogMeta): unknown;
}

export interface LoggingObserverOptions<TMove> {
  logger: SearchLogSink;
  /** Renders moves in log metadata; defaults to JSON.stringify */
  formatMove?: (move: TMove) => string;
  /** Extra metadata attached to every entry (e.g. a game id) */
  meta?: LogMeta;
}

/**
 * Search observer that writes a trace of each search to the logger.
 *
 * Search start and every scored root move are logged at debug level.
 * Cutoffs are only counted, and the total is reported with the info
 * entry written when the search completes.
 */
export function createLoggingSearchObserver<TMove>(
  options: LoggingObserverOptions<TMove>
): SearchObserver<TMove> {
  const { logger, meta = {} } = options;
  const formatMove = options.formatMove ?? ((move: TMove) => JSON.stringify(move));
  let cutoffs = 0;

  return {
    onSearchStart(event) {
      cutoffs = 0;
      logger.debug('Search started', { ...meta, ...event });
    },

    onRootMoveScored(event) {
      logger.debug('Root move scored', {
        ...meta,
        move: formatMove(event.move),
        index: event.index,
        score: event.score,
        bestScoreBefore: event.bestScoreBefore,
        isNewBest: event.isNewBest,
      });
    },

    onCutoff() {
      cutoffs++;
    },

    onSearchComplete(result) {
      logger.info('Search completed', {
        ...meta,
        status: result.status,
        move: result.status === 'found' ? formatMove(result.move) : null,
        reason: result.status === 'no_move' ? result.reason : undefined,
        score: result.score,
        ply: result.ply,
        nodesVisited: result.stats.nodesVisited,
        terminalHits: result.stats.terminalHits,
        cutoffs,
      });
    },
  };
}
