import { CoordSet, CoordSetBuilder } from './CoordSet';
import { allCells, coord, getNeighbors, isInBounds } from './boardGeometry';
import { EngineErrorCode, InvalidConfiguration } from './errors';
import type {
  AdjacencyGrid,
  BoardDimensions,
  Coord,
  InitializedBoard,
  RandomSource,
  UninitializedBoard,
} from './types';

function assertDimensions(rows: number, cols: number): void {
  if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows < 1 || cols < 1) {
    throw new InvalidConfiguration(
      EngineErrorCode.CONFIG_INVALID_DIMENSIONS,
      `Board dimensions must be positive integers, got ${rows}x${cols}`,
      { rows, cols },
      'MinePlacement'
    );
  }
}

/**
 * Fresh board with only its dimensions known. Mines are laid by the first
 * reveal (or clue), which becomes the guaranteed-safe cell.
 */
export function createBoard(rows: number, cols: number): UninitializedBoard {
  assertDimensions(rows, cols);
  return { phase: 'uninitialized', rows, cols, flagged: CoordSet.empty(cols) };
}

/** The safe cell plus its in-bounds neighbours. */
export function safeZone(dims: BoardDimensions, safeCell: Coord): CoordSet {
  return CoordSet.of(dims.cols, [safeCell, ...getNeighbors(dims, safeCell)]);
}

/**
 * Lay `mineCount` mines uniformly at random outside the safe zone and
 * precompute every adjacency count.
 *
 * Sampling is a partial Fisher–Yates shuffle over the candidate cells, so
 * each call consumes exactly `mineCount` values from `random`.
 *
 * @throws InvalidConfiguration when the grid, safe cell or mine count cannot
 *   produce a board.
 */
export function initializeBoard(
  rows: number,
  cols: number,
  mineCount: number,
  safeCell: Coord,
  random: RandomSource = Math.random
): InitializedBoard {
  assertDimensions(rows, cols);
  const dims: BoardDimensions = { rows, cols };

  if (!isInBounds(dims, safeCell.row, safeCell.col)) {
    throw new InvalidConfiguration(
      EngineErrorCode.CONFIG_INVALID_SAFE_CELL,
      `Safe cell (${safeCell.row}, ${safeCell.col}) is outside a ${rows}x${cols} board`,
      { rows, cols, safeCell },
      'MinePlacement'
    );
  }

  const excluded = safeZone(dims, safeCell);
  const candidates: Coord[] = [];
  for (const cell of allCells(dims)) {
    if (!excluded.has(cell)) {
      candidates.push(cell);
    }
  }

  if (!Number.isInteger(mineCount) || mineCount < 0 || mineCount > candidates.length) {
    throw new InvalidConfiguration(
      EngineErrorCode.CONFIG_INVALID_MINE_COUNT,
      `Cannot place ${mineCount} mines. Only ${candidates.length} cells available after excluding safe zone.`,
      { rows, cols, mineCount, available: candidates.length },
      'MinePlacement'
    );
  }

  const builder = new CoordSetBuilder(cols);
  for (let i = 0; i < mineCount; i++) {
    const remaining = candidates.length - i;
    const j = i + Math.min(remaining - 1, Math.floor(random() * remaining));
    const picked = candidates[j];
    candidates[j] = candidates[i];
    candidates[i] = picked;
    builder.add(picked);
  }
  const mines = builder.build();

  return {
    phase: 'initialized',
    rows,
    cols,
    mines,
    revealed: CoordSet.empty(cols),
    flagged: CoordSet.empty(cols),
    immuneFlags: CoordSet.empty(cols),
    adjacentCounts: computeAdjacentCounts(dims, mines),
    outcome: 'playing',
  };
}

export function computeAdjacentCounts(dims: BoardDimensions, mines: CoordSet): AdjacencyGrid {
  const grid: Array<Array<number | null>> = [];
  for (let row = 0; row < dims.rows; row++) {
    const line: Array<number | null> = [];
    for (let col = 0; col < dims.cols; col++) {
      const cell = coord(row, col);
      line.push(
        mines.has(cell) ? null : getNeighbors(dims, cell).filter((n) => mines.has(n)).length
      );
    }
    grid.push(line);
  }
  return grid;
}
