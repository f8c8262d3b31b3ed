// =============================================================================
// BOARD ENGINE - PUBLIC API
// =============================================================================
// Hosts (the game session layer, tests) should only import from this file.
//
// Every operation is pure: it takes a board value and returns a new one, or
// the very same object when the action is a no-op. Nothing here performs
// I/O, logs, or keeps state between calls.
// =============================================================================

// Types
export type {
  Coord,
  BoardDimensions,
  RandomSource,
  GameOutcome,
  AdjacencyGrid,
  UninitializedBoard,
  InitializedBoard,
  BoardState,
  BoardActionType,
  BoardAction,
  BoardActionOptions,
  CoveredCellState,
  CellState,
  ClientView,
} from './types';

export { CoordSet } from './CoordSet';

// Geometry & predicates
export {
  NEIGHBOR_OFFSETS,
  coord,
  isInBounds,
  getNeighbors,
  totalCells,
  allCells,
  isInitialized,
  isGameOver,
  isWon,
  adjacentCountAt,
} from './boardGeometry';

// Board lifecycle
export { createBoard, initializeBoard, safeZone, computeAdjacentCounts } from './minePlacement';
export { revealCell, floodFill, evaluateWin, safeCellCount } from './revealLogic';
export { toggleFlag, applyClue } from './flagLogic';
export { chordReveal } from './chordLogic';
export { applyBoardAction } from './actions';

// Projection & scoring
export { renderForClient } from './clientProjection';
export {
  computeScore,
  computeLevelScore,
  SCORE_PER_LEVEL,
  SCORE_PER_CELL,
  TIME_BONUS_SECONDS,
  CLUE_PENALTY,
  WIN_BONUS_PER_LEVEL,
} from './scoring';
export type { ScoreInput } from './scoring';

// Level progression
export {
  DEFAULT_LEVEL_POLICY,
  MAX_MINE_DENSITY_DIVISOR,
  levelDimensions,
  levelMineCount,
  levelConfig,
} from './levelProgression';
export type { LevelPolicy, LevelConfig } from './levelProgression';

// Snapshots
export { BoardSnapshotSchema, toBoardSnapshot, fromBoardSnapshot } from './boardSnapshot';
export type { BoardSnapshot } from './boardSnapshot';

// Errors
export {
  EngineErrorCode,
  EngineError,
  InvalidConfiguration,
  MissingConfiguration,
  InvalidState,
  isEngineError,
  isInvalidConfiguration,
  isMissingConfiguration,
  isInvalidState,
} from './errors';
export type { EngineErrorJSON } from './errors';
