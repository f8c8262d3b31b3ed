import type { CoordSet } from './CoordSet';

// =============================================================================
// COORDINATES & DIMENSIONS
// =============================================================================

export interface Coord {
  readonly row: number;
  readonly col: number;
}

export interface BoardDimensions {
  readonly rows: number;
  readonly cols: number;
}

/**
 * Source of uniform floats in [0, 1). `Math.random` satisfies it; tests and
 * seeded sessions pass a deterministic generator instead.
 */
export type RandomSource = () => number;

// =============================================================================
// BOARD STATE
// =============================================================================

export type GameOutcome = 'playing' | 'won' | 'lost';

/**
 * Adjacent-mine counts in row-major order. Mine cells hold `null`; every
 * other cell holds its 0–8 count. Computed once when mines are laid.
 */
export type AdjacencyGrid = ReadonlyArray<ReadonlyArray<number | null>>;

/**
 * A board whose mines have not been laid yet. Mine placement is deferred
 * to the first reveal so that the first click (and its neighbours) is
 * always safe.
 */
export interface UninitializedBoard extends BoardDimensions {
  readonly phase: 'uninitialized';
  readonly flagged: CoordSet;
}

export interface InitializedBoard extends BoardDimensions {
  readonly phase: 'initialized';
  readonly mines: CoordSet;
  readonly revealed: CoordSet;
  readonly flagged: CoordSet;
  /** Flags placed by the Clue power-up. Always a subset of `flagged`. */
  readonly immuneFlags: CoordSet;
  readonly adjacentCounts: AdjacencyGrid;
  readonly outcome: GameOutcome;
}

export type BoardState = UninitializedBoard | InitializedBoard;

// =============================================================================
// ACTIONS
// =============================================================================

export type BoardActionType = 'reveal' | 'flag' | 'chord' | 'clue';

export interface BoardAction {
  readonly type: BoardActionType;
  readonly row: number;
  readonly col: number;
}

export interface BoardActionOptions {
  /** Mines to lay if the board is still uninitialized. */
  mineCount?: number | undefined;
  random?: RandomSource | undefined;
}

// =============================================================================
// CLIENT PROJECTION
// =============================================================================

export type CoveredCellState = 'hidden' | 'flagged' | 'flagged_immune' | 'mine' | 'mine_hit';

/** A covered-cell marker, or the adjacent-mine count of a revealed cell. */
export type CellState = CoveredCellState | number;

export interface ClientView {
  rows: number;
  cols: number;
  cells: CellState[][];
  gameOver: boolean;
  won: boolean;
  initialized: boolean;
  flagsCount: number;
  minesCount: number;
  revealedCount: number;
}
