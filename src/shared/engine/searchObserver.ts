/**
 * Observer hooks invoked by AlphaBetaEngine at well-defined points of a
 * search. Observers see the search; they never influence its result.
 */

export interface SearchStats {
  /** Interior and leaf nodes visited below the root */
  nodesVisited: number;
  /** Nodes that were terminal positions */
  terminalHits: number;
}

export type NoMoveReason = 'no_legal_moves' | 'no_improvement';

interface SearchResultBase {
  /** Effective ply used by this search */
  ply: number;
  /** Best score found, or the lower search bound when nothing improved it */
  score: number;
  stats: SearchStats;
}

export interface SearchFound<TMove> extends SearchResultBase {
  status: 'found';
  move: TMove;
  /** Index of the chosen move in the root enumeration */
  moveIndex: number;
}

export interface SearchNoMove extends SearchResultBase {
  status: 'no_move';
  reason: NoMoveReason;
}

export type SearchResult<TMove> = SearchFound<TMove> | SearchNoMove;

export interface SearchStartEvent {
  ply: number;
  /** True when the caller passed a ply for this search only */
  explicitPly: boolean;
  defaultPly: number;
  rootMoveCount: number;
}

export interface RootMoveScoredEvent<TMove> {
  move: TMove;
  index: number;
  score: number;
  /** Best root score before this move was scored */
  bestScoreBefore: number;
  isNewBest: boolean;
}

export interface CutoffEvent {
  depthRemaining: number;
  alpha: number;
  beta: number;
}

export interface SearchObserver<TMove> {
  onSearchStart?(event: SearchStartEvent): void;
  onRootMoveScored?(event: RootMoveScoredEvent<TMove>): void;
  onCutoff?(event: CutoffEvent): void;
  onSearchComplete?(result: SearchResult<TMove>): void;
}

/**
 * Combine several observers into one that forwards every event to each
 * of them in order.
 */
export function composeObservers<TMove>(
  ...observers: ReadonlyArray<SearchObserver<TMove> | undefined>
): SearchObserver<TMove> {
  const active = observers.filter(
    (observer): observer is SearchObserver<TMove> => observer !== undefined
  );

  return {
    onSearchStart: (event) => active.forEach((o) => o.onSearchStart?.(event)),
    onRootMoveScored: (event) => active.forEach((o) => o.onRootMoveScored?.(event)),
    onCutoff: (event) => active.forEach((o) => o.onCutoff?.(event)),
    onSearchComplete: (result) => active.forEach((o) => o.onSearchComplete?.(result)),
  };
}
